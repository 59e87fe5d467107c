import type { RequestIdentifier } from '../model/personalIndex';

export type CollaboratorErrorKind = 'BAD_STATUS' | 'TRANSPORT' | 'INVALID_BODY';

interface CollaboratorRequestErrorOptions {
  requestId: RequestIdentifier;
  kind: CollaboratorErrorKind;
  status?: number;
  responseText?: string;
  cause?: unknown;
}

export class CollaboratorRequestError extends Error {
  readonly requestId: RequestIdentifier;
  readonly kind: CollaboratorErrorKind;
  readonly status?: number;
  readonly responseText?: string;

  constructor(message: string, options: CollaboratorRequestErrorOptions) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.requestId = options.requestId;
    this.kind = options.kind;
    this.status = options.status;
    this.responseText = options.responseText;
  }
}

export class FetchError extends CollaboratorRequestError {}

export class ReportError extends CollaboratorRequestError {}

export class UnexpectedTaskError extends Error {
  readonly requestId: RequestIdentifier;

  constructor(requestId: RequestIdentifier, cause: unknown) {
    super(
      `Unexpected error while processing request ${requestId}: ${describeError(cause)}`,
      { cause }
    );
    this.name = 'UnexpectedTaskError';
    this.requestId = requestId;
  }
}

export class TaskRunnerClosedError extends Error {
  constructor() {
    super('Task runner has been shut down and no longer accepts requests');
    this.name = 'TaskRunnerClosedError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
