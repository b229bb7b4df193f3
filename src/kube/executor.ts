/**
 * Transport contract consumed by the resource client.
 *
 * Implementations must keep every call independent: no buffers, decoders or
 * abort state shared between two requests.
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface ApiRequest {
  method: HttpMethod;
  /** Absolute API path, e.g. `/apis/apps/v1/namespaces/default/deployments`. */
  path: string;
  query: Record<string, string>;
  body?: string;
  contentType?: string;
  signal?: AbortSignal;
}

export interface ApiResponse {
  status: number;
  body: string;
}

export interface ApiStream {
  status: number;
  body: AsyncIterable<Uint8Array | string>;
  /** Releases the connection. Safe to call from another task. */
  close(): void;
}

export interface RequestExecutor {
  execute(request: ApiRequest): Promise<ApiResponse>;
  openStream(request: ApiRequest): Promise<ApiStream>;
}

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}
