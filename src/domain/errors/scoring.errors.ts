/**
 * Base class for failures raised by the scoring core and its adapters.
 * `code` is stable and safe to surface to API clients.
 */
export abstract class ScoringError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidScoreError extends ScoringError {
  readonly code = 'INVALID_SCORE';

  constructor(field: string, value: number, expected = 'a finite number in [0, 1]') {
    super(`${field} must be ${expected}, received ${value}`);
  }
}

/** The LLM collaborator could not be reached or returned something unreadable. */
export class LlmClientError extends ScoringError {
  readonly code = 'LLM_CLIENT_ERROR';
}

/** The LLM reply was readable but did not have the expected scoring shape. */
export class InvalidLlmReplyError extends ScoringError {
  readonly code = 'INVALID_LLM_REPLY';
}

/** Fatal for the current scoring call; there is no degraded embedding result. */
export class EmbeddingBackendError extends ScoringError {
  readonly code = 'EMBEDDING_BACKEND_ERROR';
}
