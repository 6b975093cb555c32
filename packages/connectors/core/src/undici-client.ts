import { request, errors, type Dispatcher } from 'undici';
import { ok, err, type Result, type Logger } from '@payroute/kernel';
import { reveal } from '@payroute/masking';
import { ApiClientError } from '@payroute/errors';
import type { ConnectorHttpRequest, HttpClient, HttpResponse, SendOptions } from './http.js';

export interface UndiciHttpClientOptions {
  /** Custom dispatcher (proxy agent, connection pool, mock) */
  dispatcher?: Dispatcher;
  logger?: Logger;
  userAgent?: string;
}

const DEFAULT_USER_AGENT = 'payroute/0.4.0';

function flattenHeaders(headers: Record<string, string | string[] | undefined>): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value !== undefined) {
      flat[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
    }
  }
  return flat;
}

/**
 * Classify a failure to get a response at all
 */
function classifySendFailure(error: unknown): ApiClientError {
  if (
    error instanceof errors.HeadersTimeoutError ||
    error instanceof errors.BodyTimeoutError ||
    error instanceof errors.ConnectTimeoutError
  ) {
    return new ApiClientError('request_timeout_received', {}, { cause: error });
  }
  if (error instanceof errors.InvalidArgumentError) {
    return new ApiClientError('url_encoding_failed', {}, { cause: error });
  }
  return new ApiClientError('request_not_sent', {}, { cause: error });
}

export class UndiciHttpClient implements HttpClient {
  private readonly dispatcher?: Dispatcher;
  private readonly logger?: Logger;
  private readonly userAgent: string;

  constructor(options: UndiciHttpClientOptions = {}) {
    this.dispatcher = options.dispatcher;
    this.logger = options.logger;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  }

  async send(
    connectorRequest: ConnectorHttpRequest,
    options: SendOptions
  ): Promise<Result<HttpResponse, ApiClientError>> {
    const headers: Record<string, string> = { 'user-agent': this.userAgent };
    for (const [name, value] of Object.entries(connectorRequest.headers)) {
      headers[name] = reveal(value);
    }

    let response: Dispatcher.ResponseData;
    try {
      response = await request(connectorRequest.url, {
        method: connectorRequest.method,
        headers,
        body: connectorRequest.body,
        dispatcher: this.dispatcher,
        headersTimeout: options.timeoutMs,
        bodyTimeout: options.timeoutMs,
      });
    } catch (error) {
      const classified = classifySendFailure(error);
      this.logger?.warn({ url: connectorRequest.url, code: classified.code }, 'connector request failed');
      return err(classified);
    }

    let body: string;
    try {
      body = await response.body.text();
    } catch (error) {
      const classified =
        error instanceof errors.BodyTimeoutError
          ? new ApiClientError('request_timeout_received', { statusCode: response.statusCode }, { cause: error })
          : new ApiClientError('response_decoding_failed', { statusCode: response.statusCode }, { cause: error });
      return err(classified);
    }

    this.logger?.debug(
      { url: connectorRequest.url, statusCode: response.statusCode },
      'connector response received'
    );

    return ok({
      statusCode: response.statusCode,
      headers: flattenHeaders(response.headers),
      body,
    });
  }
}
