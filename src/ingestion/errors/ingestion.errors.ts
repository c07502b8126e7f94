export type IngestionErrorCode =
  | 'DECODE_ERROR'
  | 'UNRESOLVED_TOPIC'
  | 'UNCLASSIFIED_PAYLOAD'
  | 'PERSISTENCE_FAILURE';

/**
 * Base class for per-message pipeline failures.
 * The pipeline catches these and reports them in the IngestionResult.
 */
export abstract class IngestionError extends Error {
  abstract readonly code: IngestionErrorCode;

  constructor(
    public readonly topic: string,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Payload bytes are not UTF-8 JSON.
 */
export class DecodeError extends IngestionError {
  readonly code = 'DECODE_ERROR';

  constructor(
    topic: string,
    public readonly originalError?: Error,
  ) {
    super(
      topic,
      `Payload on '${topic}' is not valid JSON${originalError ? `: ${originalError.message}` : ''}`,
    );
  }
}

/**
 * No active topic binding for the topic.
 */
export class UnresolvedTopicError extends IngestionError {
  readonly code = 'UNRESOLVED_TOPIC';

  constructor(topic: string) {
    super(topic, `No active crane bound to topic '${topic}'`);
  }
}

export class UnclassifiedPayloadError extends IngestionError {
  readonly code = 'UNCLASSIFIED_PAYLOAD';

  constructor(
    topic: string,
    public readonly reason: string,
  ) {
    super(topic, `Unrecognized payload on '${topic}': ${reason}`);
  }
}

/**
 * The message transaction failed after all retry attempts.
 */
export class PersistenceFailureError extends IngestionError {
  readonly code = 'PERSISTENCE_FAILURE';

  constructor(
    topic: string,
    public readonly craneId: number,
    public readonly attempts: number,
    public readonly originalError?: Error,
  ) {
    super(
      topic,
      `Failed to persist message for crane ${craneId} after ${attempts} attempt(s)${originalError ? `: ${originalError.message}` : ''}`,
    );
  }
}
