import axios, { AxiosInstance } from "axios";
import https from "https";
import type { GatewayConfig } from "../config";

export const NEWSAPI_TIMEOUT_MS = 30_000;

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export interface ArticleSearchParams {
  query: string;
  fromDate: string;
  toDate: string;
  language: string;
  domains?: string;
  pageSize: number;
  page: number;
  /** Match the query against article titles only instead of title + body */
  titleOnly: boolean;
}

export interface RawSearchResponse {
  statusCode: number;
  data: unknown;
}

export const httpsAgent = new https.Agent({
  keepAlive: true,
  maxSockets: 10,
});

export function createNewsApiAxios(): AxiosInstance {
  return axios.create({
    timeout: NEWSAPI_TIMEOUT_MS,
    httpsAgent,
    responseType: "json",
    // malformed JSON must reject instead of coming back as a string
    transitional: { silentJSONParsing: false },
  });
}

/**
 * Thin wrapper over the NewsAPI `/v2/everything` endpoint.
 * Status and body are returned as-is; framing them as success or
 * failure is the gateway's job.
 */
export class NewsApiClient {
  constructor(
    private readonly config: GatewayConfig,
    private readonly axiosClient: AxiosInstance = createNewsApiAxios()
  ) {}

  async search(params: ArticleSearchParams): Promise<RawSearchResponse> {
    const apiKey = this.config.newsApiKey;
    if (!apiKey) {
      throw new ConfigurationError("NEWSAPI_KEY is not configured.");
    }

    const query: Record<string, string | number> = {
      q: params.query,
      from: params.fromDate,
      to: params.toDate,
      language: params.language,
      pageSize: params.pageSize,
      page: params.page,
      sortBy: "publishedAt",
      apiKey,
    };

    if (params.titleOnly) {
      query.searchIn = "title";
    }

    const domains = params.domains?.trim();
    if (domains) {
      query.domains = domains;
    }

    const response = await this.axiosClient.get<unknown>(
      this.config.newsApiBaseUrl,
      {
        params: query,
        timeout: NEWSAPI_TIMEOUT_MS,
        validateStatus: () => true,
      }
    );

    return {
      statusCode: response.status,
      data: response.data,
    };
  }
}
