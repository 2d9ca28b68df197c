import { normalizeBaseUrl } from '@/utils';

// Replaced at build time by Vite (see vite.config.ts)
const rawGatewayUrl = process.env.GATEWAY_URL;

export const GATEWAY_URL_OVERRIDE: string | undefined =
  rawGatewayUrl && rawGatewayUrl.trim() ? normalizeBaseUrl(rawGatewayUrl) : undefined;

export const DEFAULT_GATEWAY_URL = 'http://localhost:8000';
export const GATEWAY_URL_STORAGE_KEY = 'gatewayUrl';
export const GATEWAY_TIMEOUT_MS = 60_000;

export const DEFAULT_QUERY = 'healthcare OR "health care"';
export const DEFAULT_LIMIT = 20;
export const MAX_LIMIT = 50;
export const DEFAULT_RANGE_DAYS = 7;

export const EXAMPLE_QUERIES = [
  'healthcare AND medicare',
  '(hospital OR clinic) AND staffing',
  '"artificial intelligence"',
  'technology OR innovation',
];

export const SEARCH_TIPS = [
  'Use AND to require both terms',
  'Use OR for either term',
  'Use quotes for exact phrases',
  'Add domains to filter by source',
  'Select a date range to search across multiple days',
];
