import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { GATEWAY_TIMEOUT_MS } from '@/config';
import type { Article, SearchParams } from '@/interfaces/article';

const ArticleSchema = z.object({
  title: z.string().min(1).catch('No title'),
  source: z.string().min(1).catch('Unknown source'),
  publishedAt: z.string().catch(''),
  url: z.string().catch(''),
  description: z.string().optional().catch(undefined),
  content: z.string().optional().catch(undefined),
});

const EnvelopeSchema = z.discriminatedUnion('ok', [
  z.object({
    ok: z.literal(true),
    totalResults: z.number().catch(0),
    articles: z.array(ArticleSchema).catch([]),
  }),
  z.object({
    ok: z.literal(false),
    error: z.unknown(),
  }),
]);

export type SearchOutcome =
  | { kind: 'success'; totalResults: number; articles: Article[] }
  | { kind: 'error'; message: string };

export const gatewayClient = axios.create({ timeout: GATEWAY_TIMEOUT_MS });

/**
 * Gateway errors are a plain string, a NewsAPI error body
 * (`{ status, code, message }`) or anything else.
 */
export function describeGatewayError(error: unknown): string {
  if (error === undefined || error === null) return 'Unknown error';
  if (typeof error === 'string') return error;
  if (typeof error === 'object') {
    if ('message' in error && typeof error.message === 'string') {
      return error.message;
    }
    return JSON.stringify(error);
  }
  return String(error);
}

export function describeTransportError(err: unknown, baseUrl: string): string {
  if (axios.isAxiosError(err)) {
    if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
      return 'Request timed out. Please try again.';
    }
    if (!err.response) {
      return `Could not connect to backend at ${baseUrl}. Make sure the backend server is running.`;
    }
  }
  return `Error: ${err instanceof Error ? err.message : String(err)}`;
}

/**
 * Calls the gateway's `/search`. Never rejects: every failure comes back
 * as a message ready to show.
 */
export async function searchArticles(
  baseUrl: string,
  params: SearchParams,
  client: AxiosInstance = gatewayClient
): Promise<SearchOutcome> {
  try {
    const response = await client.get<unknown>(`${baseUrl}/search`, {
      params,
      timeout: GATEWAY_TIMEOUT_MS,
      validateStatus: () => true,
    });

    if (response.status !== 200) {
      return { kind: 'error', message: `Backend returned status code: ${response.status}` };
    }

    const parsed = EnvelopeSchema.safeParse(response.data);
    if (!parsed.success) {
      return { kind: 'error', message: 'Error: Unexpected response from backend.' };
    }

    const envelope = parsed.data;
    if (!envelope.ok) {
      return { kind: 'error', message: `API Error: ${describeGatewayError(envelope.error)}` };
    }

    return {
      kind: 'success',
      totalResults: envelope.totalResults,
      articles: envelope.articles,
    };
  } catch (err) {
    return { kind: 'error', message: describeTransportError(err, baseUrl) };
  }
}
