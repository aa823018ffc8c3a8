/**
 * Builders for captured calls used across tests
 */

import type { CapturedCall, Header } from '../src/types/data-model.js';

export interface CallOptions {
  url: string;
  method?: string;
  headers?: Array<[string, string]>;
  requestBody?: string;
  responseBody?: string;
  status?: number;
}

export function makeCall(options: CallOptions): CapturedCall {
  const headers: Header[] = (options.headers ?? []).map(([name, value]) => ({ name, value }));
  const query = options.url.includes('?') ? options.url.split('?')[1].split('#')[0] : '';

  return {
    url: options.url,
    method: options.method ?? 'GET',
    request: {
      headers,
      query,
      ...(options.requestBody !== undefined ? { body: { text: options.requestBody } } : {}),
    },
    response: {
      status: options.status ?? 200,
      ...(options.responseBody !== undefined ? { body: { text: options.responseBody } } : {}),
    },
  };
}

export function json(value: unknown): string {
  return JSON.stringify(value);
}
