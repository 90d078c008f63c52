/**
 * Error taxonomy shared by the flows.
 *
 * Only `NoChangesError` is treated as benign: flows report it as a status
 * message. Everything else ends the running flow and reaches the command.
 */

export class NoChangesError extends Error {
  constructor(message = 'No changes to commit') {
    super(message);
    this.name = 'NoChangesError';
  }
}

/** Repository read or write failure. `detail` carries git's own output. */
export class AccessError extends Error {
  constructor(
    message: string,
    public readonly detail?: string,
  ) {
    super(message);
    this.name = 'AccessError';
  }
}

/** Generation backend failure: process error, timeout or unusable output. */
export class BackendError extends Error {
  constructor(
    message: string,
    public readonly detail?: string,
  ) {
    super(message);
    this.name = 'BackendError';
  }
}

export const errorMessage = (e: unknown): string => (e instanceof Error ? e.message : String(e));

export const errorDetail = (e: unknown): string | undefined =>
  e instanceof AccessError || e instanceof BackendError ? e.detail : undefined;
