import { z } from "zod";

/**
 * Subset of a NewsAPI article consumed by the gateway.
 * Absent or null fields fall back to the documented defaults.
 */
export const NewsApiArticleSchema = z.object({
  title: z.string().nullish().transform((v) => v ?? ""),
  source: z
    .object({ name: z.string().nullish() })
    .nullish()
    .transform((s) => s?.name || "Unknown"),
  publishedAt: z.string().nullish().transform((v) => v ?? ""),
  url: z.string().nullish().transform((v) => v ?? ""),
  description: z.string().nullish(),
  content: z.string().nullish(),
});

/**
 * Successful `/v2/everything` payload
 */
export const NewsApiResponseSchema = z.object({
  status: z.string().optional(),
  totalResults: z.number().int().nonnegative().default(0),
  articles: z.array(NewsApiArticleSchema).default([]),
});

export type NewsApiArticle = z.infer<typeof NewsApiArticleSchema>;
export type NewsApiResponse = z.infer<typeof NewsApiResponseSchema>;
