/**
 * Transport contract
 *
 * The executor hands a built request to an HttpClient and gets back a
 * status and raw body, or an ApiClientError. Connection pooling, TLS and
 * proxies are the client's business.
 */
import type { Result } from '@payroute/kernel';
import type { Secret } from '@payroute/masking';
import type { ApiClientError } from '@payroute/errors';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

/** Header values that carry credentials stay wrapped until the socket */
export type HeaderValue = string | Secret<string>;

export interface ConnectorHttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, HeaderValue>;
  /** Already encoded in the connector's wire format */
  body?: string;
}

export interface HttpResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

export interface SendOptions {
  timeoutMs: number;
}

/**
 * HTTP client interface for dependency injection
 * Tests pass a stub; production uses UndiciHttpClient.
 */
export interface HttpClient {
  send(request: ConnectorHttpRequest, options: SendOptions): Promise<Result<HttpResponse, ApiClientError>>;
}
