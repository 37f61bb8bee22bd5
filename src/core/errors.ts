/**
 * Error kinds surfaced by the runtime.
 * Every failure that ends a tick carries one of these.
 */
export type RuntimeErrorKind =
  | "TRANSPORT_ERROR"
  | "PROVIDER_RESPONSE_ERROR"
  | "COMPLETION_FAILED"
  | "MALFORMED_COMPLETION"
  | "BUDGET_EXCEEDED"
  | "INVALID_FUNCTION_CALL"
  | "EMPTY_DECOMPOSITION"
  | "CAPABILITY_NOT_FOUND"
  | "ACTION_NOT_FOUND"
  | "INVALID_PARAMETERS"
  | "ACTION_FAILED"
  | "DUPLICATE_CAPABILITY"
  | "NO_PENDING_TASKS"
  | "CONFIG_INVALID";

/**
 * Base class for tagged runtime errors.
 */
export class RuntimeError extends Error {
  readonly kind: RuntimeErrorKind;
  readonly details?: unknown;

  constructor(
    kind: RuntimeErrorKind,
    message: string,
    options: { details?: unknown; cause?: unknown } = {},
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "RuntimeError";
    this.kind = kind;
    this.details = options.details;
  }
}

/**
 * Network failure, aborted request or timeout while talking to a provider.
 */
export class TransportError extends RuntimeError {
  readonly url: string;

  constructor(url: string, message: string, cause?: unknown) {
    super("TRANSPORT_ERROR", message, { details: { url }, cause });
    this.name = "TransportError";
    this.url = url;
  }
}

/**
 * Non-2xx answer from a provider.
 */
export class ProviderResponseError extends RuntimeError {
  readonly status: number;
  readonly body: string;

  constructor(url: string, status: number, body: string) {
    super("PROVIDER_RESPONSE_ERROR", `Provider ${url} answered ${status}: ${body}`, {
      details: { url, status },
    });
    this.name = "ProviderResponseError";
    this.status = status;
    this.body = body;
  }

  get isServerError(): boolean {
    return this.status >= 500;
  }
}

export class CompletionError extends RuntimeError {
  constructor(
    kind: "COMPLETION_FAILED" | "MALFORMED_COMPLETION" | "BUDGET_EXCEEDED",
    message: string,
    options: { details?: unknown; cause?: unknown } = {},
  ) {
    super(kind, message, options);
    this.name = "CompletionError";
  }
}

/**
 * The model produced text that does not follow the function-call protocol.
 */
export class ProtocolError extends RuntimeError {
  readonly payload: string;

  constructor(
    kind: "INVALID_FUNCTION_CALL" | "EMPTY_DECOMPOSITION",
    message: string,
    payload: string,
    details?: unknown,
  ) {
    super(kind, message, { details });
    this.name = "ProtocolError";
    this.payload = payload;
  }
}

export class DispatchError extends RuntimeError {
  readonly capabilityName: string;
  readonly actionName?: string;

  constructor(
    kind:
      | "CAPABILITY_NOT_FOUND"
      | "ACTION_NOT_FOUND"
      | "INVALID_PARAMETERS"
      | "ACTION_FAILED"
      | "DUPLICATE_CAPABILITY",
    message: string,
    target: { capabilityName: string; actionName?: string },
    options: { details?: unknown; cause?: unknown } = {},
  ) {
    super(kind, message, options);
    this.name = "DispatchError";
    this.capabilityName = target.capabilityName;
    this.actionName = target.actionName;
  }
}

/**
 * The agent state does not allow the requested step (e.g. nothing queued).
 */
export class StateError extends RuntimeError {
  constructor(kind: "NO_PENDING_TASKS", message: string) {
    super(kind, message);
    this.name = "StateError";
  }
}

export class ConfigError extends RuntimeError {
  constructor(message: string, details?: unknown) {
    super("CONFIG_INVALID", message, { details });
    this.name = "ConfigError";
  }
}

export function isRuntimeError(error: unknown): error is RuntimeError {
  return error instanceof RuntimeError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
