/**
 * Error taxonomy for the agent.
 *
 * Every error raised by the dispatcher or its adapters derives from
 * `AgentError` and carries a stable `code` so that transports (HTTP, logs)
 * can map it without string-matching messages. Wrapped failures keep the
 * original error as `cause`.
 */
export abstract class AgentError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed or too-short command line; raised before any side effect. */
export class InvalidCommandError extends AgentError {
  readonly code = 'invalid_command';

  constructor(message = 'invalid command', options?: ErrorOptions) {
    super(message, options);
  }
}

/** Verb outside the closed set of its entry point. */
export class UnknownCommandError extends AgentError {
  readonly code = 'unknown_command';

  constructor(readonly verb: string) {
    super(`unknown command: ${verb}`);
  }
}

/** Downstream service name not in the allowlist. */
export class NoSuchServiceError extends AgentError {
  readonly code = 'no_such_service';

  constructor(readonly service: string) {
    super(`no such service: ${service}`);
  }
}

/** SenML payload could not be produced or parsed. */
export class EncodingError extends AgentError {
  readonly code = 'encoding_error';
}

/** Base64 file content in a `save` command is not valid. */
export class DecodingError extends AgentError {
  readonly code = 'decoding_error';
}

export class ExecutionError extends AgentError {
  readonly code = 'execution_error';

  constructor(
    message: string,
    readonly exitCode: number | null,
    readonly output: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

/** EdgeX responded with a non-2xx status. */
export class DeviceClientError extends AgentError {
  readonly code = 'device_client_error';

  constructor(message: string, readonly status: number) {
    super(message);
  }
}

export class SubscriptionError extends AgentError {
  readonly code = 'subscription_error';
}
