export type HarvesterErrorCode =
  | "MALFORMED_PAYLOAD"
  | "SINK_WRITE_FAILURE"
  | "TRANSPORT_FAILURE"
  | "RETRY_EXHAUSTED";

export abstract class HarvesterError extends Error {
  abstract readonly code: HarvesterErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Create event bytes could not be decoded. Scoped to one log line.
 */
export class MalformedPayloadError extends HarvesterError {
  readonly code = "MALFORMED_PAYLOAD";

  constructor(
    message: string,
    readonly field?: string,
    readonly offset?: number
  ) {
    super(message);
  }
}

export class SinkWriteError extends HarvesterError {
  readonly code = "SINK_WRITE_FAILURE";

  constructor(
    message: string,
    readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * The websocket closed, errored or refused the subscription. Ends the session.
 */
export class TransportError extends HarvesterError {
  readonly code = "TRANSPORT_FAILURE";
}

export class RetryExhaustedError extends HarvesterError {
  readonly code = "RETRY_EXHAUSTED";

  constructor(readonly attempts: number) {
    super(`Gave up after ${attempts} reconnect attempts`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
