/**
 * Error taxonomy shared by the pipeline components.
 *
 * Salvage and normalization never throw: a `MalformedInputError` is carried in
 * their results. The job poller throws `ExternalJobError` and
 * `ExternalJobTimeout`; credentials are checked where they are used and raise
 * `ConfigurationError`. The orchestrator turns every one of them into a
 * failure result.
 */

type SubmittalErrorCode =
  | "MALFORMED_INPUT"
  | "EXTERNAL_JOB_ERROR"
  | "EXTERNAL_JOB_TIMEOUT"
  | "CONFIGURATION_ERROR";

export class SubmittalError extends Error {
  constructor(
    message: string,
    readonly code: SubmittalErrorCode,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class MalformedInputError extends SubmittalError {
  constructor(
    message: string,
    readonly input: string,
  ) {
    super(message, "MALFORMED_INPUT");
  }
}

export class ExternalJobError extends SubmittalError {
  constructor(
    message: string,
    readonly identityKey?: string,
  ) {
    super(message, "EXTERNAL_JOB_ERROR");
  }
}

export class ExternalJobTimeout extends SubmittalError {
  constructor(
    readonly identityKey: string,
    readonly attempts: number,
  ) {
    super(
      `Polling timeout for ${identityKey} after ${attempts} attempts`,
      "EXTERNAL_JOB_TIMEOUT",
    );
  }
}

export class ConfigurationError extends SubmittalError {
  constructor(
    readonly variable: string,
    message: string = `${variable} environment variable not set`,
  ) {
    super(message, "CONFIGURATION_ERROR");
  }
}

/**
 * Returns a credential or raises a ConfigurationError naming the variable.
 */
export function requireCredential(
  value: string | undefined,
  variable: string,
): string {
  if (!value) {
    throw new ConfigurationError(variable);
  }
  return value;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
