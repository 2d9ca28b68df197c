import { useState } from 'react';
import { DEFAULT_GATEWAY_URL, GATEWAY_URL_OVERRIDE, GATEWAY_URL_STORAGE_KEY } from '@/config';
import { LocalStorage, normalizeBaseUrl } from '@/utils';

function initialUrl(): string {
  const stored = LocalStorage.get(GATEWAY_URL_STORAGE_KEY);
  return typeof stored === 'string' ? stored : DEFAULT_GATEWAY_URL;
}

/**
 * Gateway base URL: the build-time override when present,
 * otherwise a user-editable value remembered in local storage.
 */
export function useGatewayUrl() {
  const [draft, setDraft] = useState<string>(initialUrl);

  if (GATEWAY_URL_OVERRIDE) {
    return { gatewayUrl: GATEWAY_URL_OVERRIDE, draft: GATEWAY_URL_OVERRIDE, editable: false, setDraft };
  }

  const update = (value: string) => {
    setDraft(value);
    LocalStorage.set(GATEWAY_URL_STORAGE_KEY, value);
  };

  return { gatewayUrl: normalizeBaseUrl(draft), draft, editable: true, setDraft: update };
}
