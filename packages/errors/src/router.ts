/**
 * Top-level router error
 *
 * The only error the HTTP edge sees. Its status code is a function of its
 * kind alone. Following RFC 9457 problem+json for the rendered shape.
 */

export type RouterErrorKind =
  | 'authentication'
  | 'authorisation'
  | 'parsing'
  | 'validation'
  | 'not_implemented_by_connector'
  | 'unexpected'
  | 'configuration'
  | 'database'
  | 'encryption'
  | 'metrics'
  | 'io';

const DESCRIPTIONS: Record<RouterErrorKind, string> = {
  authentication: 'Error while Authenticating',
  authorisation: 'Error while Authorizing',
  parsing: 'Error while parsing',
  validation: 'Error while validating',
  not_implemented_by_connector: 'Connector implementation missing',
  unexpected: 'Unexpected error',
  configuration: 'Environment configuration error',
  database: 'Database operation failed',
  encryption: 'Encryption module operation failed',
  metrics: 'Metrics error',
  io: 'I/O error',
};

/**
 * Client-caused kinds map to 400, everything else to 500.
 */
export function statusCodeForKind(kind: RouterErrorKind): 400 | 500 {
  switch (kind) {
    case 'authentication':
    case 'authorisation':
    case 'parsing':
    case 'validation':
      return 400;
    case 'not_implemented_by_connector':
    case 'unexpected':
    case 'configuration':
    case 'database':
    case 'encryption':
    case 'metrics':
    case 'io':
      return 500;
  }
}

export interface ProblemJson {
  type: string;
  title: string;
  status: number;
  detail: string;
}

export class RouterError extends Error {
  readonly layer = 'router';
  readonly kind: RouterErrorKind;

  /**
   * @param cause - the lower-layer error this one wraps; kept as-is
   */
  constructor(kind: RouterErrorKind, cause: unknown) {
    super(`${DESCRIPTIONS[kind]}: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.name = 'RouterError';
    this.kind = kind;
  }

  get statusCode(): 400 | 500 {
    return statusCodeForKind(this.kind);
  }

  get title(): string {
    return DESCRIPTIONS[this.kind];
  }

  toProblemJson(): ProblemJson {
    return {
      type: `urn:payroute:error:${this.kind}`,
      title: this.title,
      status: this.statusCode,
      detail: this.message,
    };
  }
}
