import { AxiosError, AxiosInstance } from 'axios';
import {
  ConfigurationError,
  createNewsApiAxios,
  NEWSAPI_TIMEOUT_MS,
  NewsApiClient,
  ArticleSearchParams,
} from '../../src/modules/newsApiClient';
import type { GatewayConfig } from '../../src/config';

const createAxiosClient = () => {
  const get = jest.fn();
  return { get, client: { get } as unknown as AxiosInstance };
};

const createConfig = (overrides: Partial<GatewayConfig> = {}): GatewayConfig => ({
  newsApiKey: 'test-secret',
  newsApiBaseUrl: 'https://newsapi.example/v2/everything',
  port: 8000,
  corsOrigin: '*',
  nodeEnv: 'test',
  ...overrides,
});

const baseParams: ArticleSearchParams = {
  query: 'healthcare OR "health care"',
  fromDate: '2024-01-01',
  toDate: '2024-01-07',
  language: 'en',
  pageSize: 20,
  page: 1,
  titleOnly: false,
};

describe('NewsApiClient (unit)', () => {
  /**
   * Purpose:
   * The credential is checked on every call, before any network access.
   */
  test('fails fast with a configuration error when no credential is set', async () => {
    const { get, client } = createAxiosClient();
    const newsApi = new NewsApiClient(createConfig({ newsApiKey: undefined }), client);

    await expect(newsApi.search(baseParams)).rejects.toBeInstanceOf(ConfigurationError);
    expect(get).not.toHaveBeenCalled();
  });

  test('sends query, dates, paging, recency sort and credential', async () => {
    const { get, client } = createAxiosClient();
    get.mockResolvedValue({ status: 200, data: { totalResults: 0, articles: [] } });

    await new NewsApiClient(createConfig(), client).search(baseParams);

    expect(get).toHaveBeenCalledTimes(1);
    const [url, options] = get.mock.calls[0];
    expect(url).toBe('https://newsapi.example/v2/everything');
    expect(options.timeout).toBe(NEWSAPI_TIMEOUT_MS);
    expect(options.params).toEqual({
      q: 'healthcare OR "health care"',
      from: '2024-01-01',
      to: '2024-01-07',
      language: 'en',
      pageSize: 20,
      page: 1,
      sortBy: 'publishedAt',
      apiKey: 'test-secret',
    });
  });

  test('restricts matching to titles when titleOnly is set', async () => {
    const { get, client } = createAxiosClient();
    get.mockResolvedValue({ status: 200, data: {} });

    await new NewsApiClient(createConfig(), client).search({ ...baseParams, titleOnly: true });

    expect(get.mock.calls[0][1].params.searchIn).toBe('title');
  });

  test('adds trimmed domains and omits blank ones entirely', async () => {
    const { get, client } = createAxiosClient();
    get.mockResolvedValue({ status: 200, data: {} });
    const newsApi = new NewsApiClient(createConfig(), client);

    await newsApi.search({ ...baseParams, domains: ' reuters.com,kffhealthnews.org ' });
    await newsApi.search({ ...baseParams, domains: '   ' });

    expect(get.mock.calls[0][1].params.domains).toBe('reuters.com,kffhealthnews.org');
    expect(get.mock.calls[1][1].params).not.toHaveProperty('domains');
  });

  /**
   * Purpose:
   * Non-2xx answers are data, not exceptions.
   */
  test('returns status and body of an error response unchanged', async () => {
    const { get, client } = createAxiosClient();
    const body = { status: 'error', code: 'apiKeyInvalid', message: 'Your API key is invalid.' };
    get.mockResolvedValue({ status: 401, data: body });

    const result = await new NewsApiClient(createConfig(), client).search(baseParams);

    expect(result).toEqual({ statusCode: 401, data: body });
    expect(get.mock.calls[0][1].validateStatus(500)).toBe(true);
  });

  test('propagates timeouts as errors', async () => {
    const { get, client } = createAxiosClient();
    get.mockRejectedValue(new AxiosError('timeout of 30000ms exceeded', 'ECONNABORTED'));

    await expect(
      new NewsApiClient(createConfig(), client).search(baseParams)
    ).rejects.toThrow('timeout of 30000ms exceeded');
  });

  test('default axios instance carries the 30 second timeout', () => {
    expect(createNewsApiAxios().defaults.timeout).toBe(30_000);
  });
});
