/**
 * Fatal error kinds for one invocation.
 * None of these are retried; the entry script reports them and exits 1.
 */

export type InvocationErrorKind = "configuration" | "not_found" | "transport";

export abstract class InvocationError extends Error {
  abstract readonly kind: InvocationErrorKind;
}

export class ConfigurationError extends InvocationError {
  readonly kind = "configuration";

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class SeedNotFoundError extends InvocationError {
  readonly kind = "not_found";

  constructor(public seedPath: string) {
    super(`Seed packet not found at: ${seedPath}`);
    this.name = "SeedNotFoundError";
  }
}

export type TransportErrorType = "provider_error" | "invalid_response";

export class TransportError extends InvocationError {
  readonly kind = "transport";

  constructor(
    public errorType: TransportErrorType,
    message: string
  ) {
    super(`Error calling OpenAI API (${errorType}): ${message}`);
    this.name = "TransportError";
  }
}

export function isInvocationError(err: unknown): err is InvocationError {
  return err instanceof InvocationError;
}
