import type { SearchFormValues, SearchParams } from '@/interfaces/article';
import { isIsoDate } from '@/utils/time';

/**
 * Local checks run before any request; returns the message to show,
 * or null when the form can be submitted.
 */
export function validateSearchForm(values: SearchFormValues, gatewayUrl: string): string | null {
  if (!values.query.trim()) {
    return 'Please enter a search query.';
  }
  if (!isIsoDate(values.from) || !isIsoDate(values.to)) {
    return 'Please select both a start and end date.';
  }
  if (values.from > values.to) {
    return 'The start date must not be after the end date.';
  }
  if (!gatewayUrl) {
    return 'Please enter the backend URL.';
  }
  return null;
}

export function toSearchParams(values: SearchFormValues): SearchParams {
  const params: SearchParams = {
    q: values.query,
    from: values.from,
    to: values.to,
    limit: values.limit,
  };

  const domains = values.domains.trim();
  if (domains) params.domains = domains;

  return params;
}
