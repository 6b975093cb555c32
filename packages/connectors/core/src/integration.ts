/**
 * Connector integration interface
 *
 * One integration per (connector, flow) pair. The executor is written
 * once against this interface; connectors supply the pieces that differ
 * (URL, headers, body encoding, response reduction).
 */
import { ok, chain, type Result } from '@payroute/kernel';
import type { ErrorResponse, Flow, FlowRequest, FlowResponse, RouterData } from '@payroute/domain';
import type { ConnectorError, ParsingError } from '@payroute/errors';
import type { ConnectorHttpRequest, HeaderValue, HttpMethod, HttpResponse } from './http.js';

export interface ConnectorIntegration<F extends Flow, Req = FlowRequest<F>, Res = FlowResponse<F>> {
  getHttpMethod(): HttpMethod;

  getContentType(): string;

  getHeaders(data: RouterData<F, Req, Res>): Result<Record<string, HeaderValue>, ConnectorError>;

  /**
   * @param baseUrl - connector base URL from configuration, with trailing slash
   */
  getUrl(data: RouterData<F, Req, Res>, baseUrl: string): Result<string, ConnectorError>;

  /** `undefined` for body-less requests */
  getRequestBody(data: RouterData<F, Req, Res>): Result<string | undefined, ConnectorError>;

  buildRequest(data: RouterData<F, Req, Res>, baseUrl: string): Result<ConnectorHttpRequest, ConnectorError>;

  /**
   * Reduce a 2xx response into a new RouterData carrying the outcome.
   * The input is left untouched.
   */
  handleResponse(
    data: RouterData<F, Req, Res>,
    response: HttpResponse
  ): Result<RouterData<F, Req, Res>, ConnectorError | ParsingError>;

  /** Parse a non-2xx body into the connector's structured error */
  getErrorResponse(response: HttpResponse): Result<ErrorResponse, ParsingError>;
}

/**
 * Defaults shared by JSON-over-POST connectors. Subclasses override what
 * their wire format does differently; `buildRequest` is assembled from
 * the other methods and is rarely overridden.
 */
export abstract class BaseConnectorIntegration<F extends Flow, Req = FlowRequest<F>, Res = FlowResponse<F>>
  implements ConnectorIntegration<F, Req, Res>
{
  getHttpMethod(): HttpMethod {
    return 'POST';
  }

  getContentType(): string {
    return 'application/json';
  }

  getHeaders(_data: RouterData<F, Req, Res>): Result<Record<string, HeaderValue>, ConnectorError> {
    return ok({ 'Content-Type': this.getContentType() });
  }

  getRequestBody(_data: RouterData<F, Req, Res>): Result<string | undefined, ConnectorError> {
    return ok(undefined);
  }

  buildRequest(data: RouterData<F, Req, Res>, baseUrl: string): Result<ConnectorHttpRequest, ConnectorError> {
    return chain(this.getUrl(data, baseUrl), (url) =>
      chain(this.getHeaders(data), (headers) =>
        chain(this.getRequestBody(data), (body) => {
          const request: ConnectorHttpRequest = { method: this.getHttpMethod(), url, headers };
          if (body !== undefined) {
            request.body = body;
          }
          return ok(request);
        })
      )
    );
  }

  abstract getUrl(data: RouterData<F, Req, Res>, baseUrl: string): Result<string, ConnectorError>;

  abstract handleResponse(
    data: RouterData<F, Req, Res>,
    response: HttpResponse
  ): Result<RouterData<F, Req, Res>, ConnectorError | ParsingError>;

  abstract getErrorResponse(response: HttpResponse): Result<ErrorResponse, ParsingError>;
}
