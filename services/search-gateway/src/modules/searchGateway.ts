import type pino from "pino";
import { isAxiosError } from "axios";
import { z } from "zod";
import type { GatewayConfig } from "../config";
import type { NewsApiClient, RawSearchResponse } from "./newsApiClient";
import { NewsApiResponse, NewsApiResponseSchema } from "../schemas/newsApi.schema";
import type {
  ArticleSummary,
  CountEnvelope,
  GatewayFailure,
  RawQuery,
  SearchEnvelope,
  ValidatedQuery,
} from "../interfaces/search";

export const DEFAULT_LIMIT = 20;
export const MAX_LIMIT = 100;
// `/count` only needs totalResults
export const COUNT_PAGE_SIZE = 1;
export const DEFAULT_LANGUAGE = "en";

export const SCHEMA_MISMATCH_ERROR = "News API schema mismatch";

export interface SearchGatewayDeps {
  config: GatewayConfig;
  client: Pick<NewsApiClient, "search">;
  logger: pino.Logger;
}

type Validation = { ok: true; value: ValidatedQuery } | GatewayFailure;

/**
 * True for a real `YYYY-MM-DD` calendar date (2024-02-30 is rejected).
 */
export function isCalendarDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;

  const [year, month, day] = value.split("-").map(Number);
  if (year < 1) return false;

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);

  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

const IsoDateSchema = z.string().refine(isCalendarDate);

function readParam(query: RawQuery, name: string): string | undefined {
  const value = query[name];
  const first = Array.isArray(value) ? value[0] : value;
  return typeof first === "string" ? first : undefined;
}

export function parseLimit(raw: string | undefined): number {
  const parsed = parseInt(raw ?? "", 10);
  const limit = isNaN(parsed) ? DEFAULT_LIMIT : parsed;
  return Math.min(Math.max(limit, 1), MAX_LIMIT);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// AxiosError carries the request config, and with it the apiKey param
export function loggableError(err: unknown): unknown {
  if (!isAxiosError(err)) return err;
  return {
    type: err.name,
    code: err.code,
    message: err.message,
    status: err.response?.status,
  };
}

function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

export class SearchGateway {
  private readonly config: GatewayConfig;
  private readonly client: Pick<NewsApiClient, "search">;
  private readonly logger: pino.Logger;

  constructor({ config, client, logger }: SearchGatewayDeps) {
    this.config = config;
    this.client = client;
    this.logger = logger;
  }

  health(): { ok: true } {
    return { ok: true };
  }

  /**
   * Total number of articles whose title matches the query.
   */
  async count(query: RawQuery): Promise<CountEnvelope> {
    const checked = this.validate(query);
    if (!checked.ok) return checked;
    const { value } = checked;

    try {
      const result = await this.client.search({
        query: value.q,
        fromDate: value.from,
        toDate: value.to,
        language: value.language,
        domains: value.domains,
        pageSize: COUNT_PAGE_SIZE,
        page: 1,
        titleOnly: true,
      });

      if (!isSuccessStatus(result.statusCode)) {
        return this.upstreamFailure("count", result);
      }

      const body = this.parseBody("count", result.data);
      if (!body) return { ok: false, error: SCHEMA_MISMATCH_ERROR };

      return {
        ok: true,
        q: value.q,
        from: value.from,
        to: value.to,
        totalResults: body.totalResults,
      };
    } catch (err) {
      return this.failure("count", err);
    }
  }

  /**
   * Most recent articles matching the query in title or body,
   * capped at `limit` (default 20, clamped to 1..100).
   */
  async search(query: RawQuery): Promise<SearchEnvelope> {
    const checked = this.validate(query);
    if (!checked.ok) return checked;
    const { value } = checked;

    const limit = parseLimit(readParam(query, "limit"));

    try {
      const result = await this.client.search({
        query: value.q,
        fromDate: value.from,
        toDate: value.to,
        language: value.language,
        domains: value.domains,
        pageSize: limit,
        page: 1,
        titleOnly: false,
      });

      if (!isSuccessStatus(result.statusCode)) {
        return this.upstreamFailure("search", result);
      }

      const body = this.parseBody("search", result.data);
      if (!body) return { ok: false, error: SCHEMA_MISMATCH_ERROR };

      // upstream page size is not trusted
      const articles = body.articles.slice(0, limit).map(toSummary);

      this.logger.debug(
        { q: value.q, totalResults: body.totalResults, returned: articles.length },
        "Search completed"
      );

      return {
        ok: true,
        q: value.q,
        from: value.from,
        to: value.to,
        totalResults: body.totalResults,
        articles,
      };
    } catch (err) {
      return this.failure("search", err);
    }
  }

  private validate(query: RawQuery): Validation {
    if (!this.config.newsApiKey) {
      return { ok: false, error: "NEWSAPI_KEY is not configured." };
    }

    const q = readParam(query, "q");
    if (!q || !q.trim()) {
      return { ok: false, error: "Missing required query parameter: q." };
    }

    const from = readParam(query, "from");
    if (from === undefined) {
      return { ok: false, error: "Missing required query parameter: from." };
    }
    if (!IsoDateSchema.safeParse(from).success) {
      return {
        ok: false,
        error: `Invalid from date format: ${from}. Expected YYYY-MM-DD.`,
      };
    }

    const to = readParam(query, "to");
    if (to === undefined) {
      return { ok: false, error: "Missing required query parameter: to." };
    }
    if (!IsoDateSchema.safeParse(to).success) {
      return {
        ok: false,
        error: `Invalid to date format: ${to}. Expected YYYY-MM-DD.`,
      };
    }

    // zero-padded ISO dates compare lexicographically
    if (from > to) {
      return {
        ok: false,
        error: `Invalid date range: from ${from} is after to ${to}.`,
      };
    }

    const language = readParam(query, "language")?.trim() || DEFAULT_LANGUAGE;
    const domains = readParam(query, "domains")?.trim() || undefined;

    return { ok: true, value: { q, from, to, language, domains } };
  }

  private parseBody(operation: string, data: unknown): NewsApiResponse | null {
    const parsed = NewsApiResponseSchema.safeParse(data);
    if (!parsed.success) {
      this.logger.warn(
        { operation, issues: parsed.error.issues },
        SCHEMA_MISMATCH_ERROR
      );
      return null;
    }
    return parsed.data;
  }

  private upstreamFailure(
    operation: string,
    result: RawSearchResponse
  ): GatewayFailure {
    this.logger.warn(
      { operation, statusCode: result.statusCode },
      "News API returned an error status"
    );
    return {
      ok: false,
      error: result.data,
      status_code: result.statusCode,
    };
  }

  private failure(operation: string, err: unknown): GatewayFailure {
    this.logger.error(
      { err: loggableError(err), operation },
      "News API request failed"
    );
    return { ok: false, error: errorMessage(err) };
  }
}

function toSummary(article: NewsApiResponse["articles"][number]): ArticleSummary {
  const summary: ArticleSummary = {
    title: article.title,
    source: article.source,
    publishedAt: article.publishedAt,
    url: article.url,
  };
  if (article.description) summary.description = article.description;
  if (article.content) summary.content = article.content;
  return summary;
}
