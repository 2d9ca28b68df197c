/**
 * Article as returned by `/search`
 */
export interface ArticleSummary {
  title: string;
  source: string;
  publishedAt: string;
  url: string;
  description?: string;
  content?: string;
}

export interface CountSuccess {
  ok: true;
  q: string;
  from: string;
  to: string;
  totalResults: number;
}

export interface SearchSuccess extends CountSuccess {
  articles: ArticleSummary[];
}

/**
 * `error` carries the upstream body verbatim when the external
 * service answered with a non-success status.
 */
export interface GatewayFailure {
  ok: false;
  error: unknown;
  status_code?: number;
}

export type CountEnvelope = CountSuccess | GatewayFailure;
export type SearchEnvelope = SearchSuccess | GatewayFailure;

/** Raw query-string record as express hands it over */
export type RawQuery = Record<string, unknown>;

export interface ValidatedQuery {
  q: string;
  from: string;
  to: string;
  language: string;
  domains?: string;
}
