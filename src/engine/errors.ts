/**
 * Error taxonomy for the provisioning pipeline.
 * Components return these inside a Result instead of throwing; the runner decides what to do with them.
 */
export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Credentials are missing, partial or rejected */
export class AuthError extends PipelineError {
  readonly category = 'auth';
}

/** Any storage, catalog or query-service failure that is not an "already exists" outcome */
export class ProviderError extends PipelineError {
  readonly category = 'provider';
  readonly operation: string;
  readonly providerCode: string;

  constructor(operation: string, providerCode: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.operation = operation;
    this.providerCode = providerCode;
  }
}

export type NetworkErrorKind = 'http' | 'connection' | 'timeout' | 'request';

export class NetworkError extends PipelineError {
  readonly category = 'network';
  readonly kind: NetworkErrorKind;
  readonly status?: number;

  constructor(kind: NetworkErrorKind, message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.kind = kind;
    this.status = options?.status;
  }
}

export class SerializationError extends PipelineError {
  readonly category = 'serialization';
  readonly index: number;
  readonly path: string;

  constructor(index: number, path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.index = index;
    this.path = path;
  }
}

export class ConfigError extends PipelineError {
  readonly category = 'config';
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.issues = issues;
  }
}

export type Result<T, E extends Error = PipelineError> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });

export const fail = <E extends Error>(error: E): { ok: false; error: E } => ({ ok: false, error });

// Names the SDK uses when the credential chain yields nothing or the keys are rejected
const AUTH_ERROR_NAMES: ReadonlySet<string> = new Set([
  'CredentialsProviderError',
  'CredentialsError',
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'UnrecognizedClientException',
  'InvalidSignatureException',
  'ExpiredToken',
  'ExpiredTokenException',
  'MissingAuthenticationToken',
]);

/**
 * Map an error thrown by an AWS client call to AuthError or ProviderError.
 * "Already exists" outcomes must be handled by the caller before reaching here.
 */
export const classifyAwsError = (operation: string, err: unknown): AuthError | ProviderError => {
  if (!(err instanceof Error)) {
    return new ProviderError(operation, 'Unknown', `${operation} failed: ${String(err)}`, { cause: err });
  }

  if (AUTH_ERROR_NAMES.has(err.name)) {
    return new AuthError(`${operation} failed: AWS credentials not found or rejected (${err.name})`, { cause: err });
  }

  return new ProviderError(operation, err.name, `${operation} failed: ${err.message}`, { cause: err });
};
