/**
 * HTTP seam of the push client. The default transport uses the global fetch.
 */

export interface PushRequest {
  method: 'POST';
  headers: Record<string, string>;
  body: Uint8Array;
  signal?: AbortSignal;
}

export interface PushResponse {
  status: number;
  text(): Promise<string>;
}

export type PushTransport = (endpoint: string, request: PushRequest) => Promise<PushResponse>;

/**
 * Reads the whole response body before resolving; an unread body keeps its socket out of the keep-alive pool
 */
export const fetchTransport: PushTransport = async (endpoint, { method, headers, body, signal }) => {
  const response = await fetch(endpoint, { method, headers, body, signal });
  const text = await response.text();
  return {
    status: response.status,
    text: async () => text,
  };
};
