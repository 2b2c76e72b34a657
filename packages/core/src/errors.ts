/**
 * Error taxonomy for the Outlook connector.
 *
 * Library code throws these; the tool dispatcher and the CLI entry points are the only
 * places that turn them into user-facing text or exit codes.
 */

export type ConnectorErrorCode =
  | 'UNAUTHENTICATED'
  | 'UNKNOWN_TOOL'
  | 'VALIDATION_FAILED'
  | 'REMOTE_CALL_FAILED'
  | 'AUTH_EXPIRED'
  | 'REMOTE_TIMEOUT'
  | 'UNSUPPORTED_RESOURCE'
  | 'CONFIGURATION_ERROR'
  | 'INTERNAL_ERROR';

/**
 * Base error class for all connector errors
 */
export class ConnectorError extends Error {
  public readonly code: ConnectorErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: ConnectorErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ConnectorError';
    this.code = code;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

/**
 * No credential is loaded, so no tool may reach the remote service.
 */
export class UnauthenticatedError extends ConnectorError {
  constructor(message = 'Not authenticated with Microsoft Graph') {
    super(message, 'UNAUTHENTICATED');
    this.name = 'UnauthenticatedError';
  }
}

export class UnknownToolError extends ConnectorError {
  public readonly toolName: string;

  constructor(toolName: string) {
    super(`Unknown tool: ${toolName}`, 'UNKNOWN_TOOL', { toolName });
    this.name = 'UnknownToolError';
    this.toolName = toolName;
  }
}

/**
 * An argument could not be turned into a value the tool accepts.
 */
export class ValidationFailedError extends ConnectorError {
  public readonly field: string;
  public readonly expected?: string;

  constructor(field: string, message: string, expected?: string) {
    super(message, 'VALIDATION_FAILED', { field, expected });
    this.name = 'ValidationFailedError';
    this.field = field;
    this.expected = expected;
  }
}

/**
 * The remote service answered with a status outside 200/201/202/204.
 */
export class RemoteCallFailedError extends ConnectorError {
  public readonly status: number;
  public readonly body: string;

  constructor(
    status: number,
    body: string,
    code: ConnectorErrorCode = 'REMOTE_CALL_FAILED',
    message = `Microsoft Graph request failed: ${status} - ${body}`
  ) {
    super(message, code, { status, body });
    this.name = 'RemoteCallFailedError';
    this.status = status;
    this.body = body;
  }
}

/**
 * HTTP 401 from the remote service: the stored token is expired or revoked.
 */
export class AuthExpiredError extends RemoteCallFailedError {
  constructor(body: string) {
    super(
      401,
      body,
      'AUTH_EXPIRED',
      'Microsoft Graph rejected the access token (401). It has probably expired.'
    );
    this.name = 'AuthExpiredError';
  }
}

export class RemoteTimeoutError extends ConnectorError {
  public readonly timeoutMs: number;

  constructor(method: string, endpoint: string, timeoutMs: number) {
    super(
      `Microsoft Graph request ${method} ${endpoint} timed out after ${timeoutMs}ms`,
      'REMOTE_TIMEOUT',
      { method, endpoint, timeoutMs }
    );
    this.name = 'RemoteTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * A remote resource exists but is of a kind the connector cannot decode.
 */
export class UnsupportedResourceError extends ConnectorError {
  constructor(resource: string, kind: string | undefined) {
    super(`Unsupported ${resource} type: ${kind ?? 'unknown'}`, 'UNSUPPORTED_RESOURCE', {
      resource,
      kind,
    });
    this.name = 'UnsupportedResourceError';
  }
}

export class ConfigurationError extends ConnectorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Type guard for connector errors
 */
export function isConnectorError(error: unknown): error is ConnectorError {
  return error instanceof ConnectorError;
}

/**
 * Wrap an unknown thrown value in a ConnectorError, keeping connector errors as they are.
 */
export function wrapError(error: unknown, code: ConnectorErrorCode, defaultMessage: string): ConnectorError {
  if (isConnectorError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new ConnectorError(error.message, code, { originalError: error.name });
  }
  return new ConnectorError(defaultMessage, code, { originalError: String(error) });
}
