/**
 * Error taxonomy for seat-view mapping and rendering.
 *
 * Geometry ambiguities (overlapping sections, clicks outside every section)
 * are resolved by the mapper and never show up here.
 */

export class SeatViewError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

// -- Venue --

/** A venue definition failed validation. Raised at load time only. */
export class InvalidVenueConfigError extends SeatViewError {
  readonly venueId: string | null;
  readonly issues: string[];

  constructor(venueId: string | null, issues: string[]) {
    const label = venueId ? `Venue "${venueId}"` : 'Venue';
    super(`${label} is invalid: ${issues.join('; ')}`);
    this.venueId = venueId;
    this.issues = issues;
  }
}

export class UnknownVenueError extends SeatViewError {
  readonly venueId: string;

  constructor(venueId: string) {
    super(`Unknown venue: ${venueId}`);
    this.venueId = venueId;
  }
}

// -- Mapping --

/** The venue has no sections to resolve a click against. */
export class SectionResolutionError extends SeatViewError {
  readonly venueId: string;

  constructor(venueId: string) {
    super(`Venue "${venueId}" has no sections`);
    this.venueId = venueId;
  }
}

export class InvalidClickError extends SeatViewError {
  constructor(x: number, y: number) {
    super(`Click coordinates must be finite numbers, got (${x}, ${y})`);
  }
}

// -- Rendering --

export class RenderError extends SeatViewError {
  /** Whether a later attempt may succeed. */
  readonly retryable: boolean;

  constructor(message: string, retryable: boolean, options?: ErrorOptions) {
    super(message, options);
    this.retryable = retryable;
  }
}

export class RenderTimeoutError extends RenderError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Render timed out after ${timeoutMs}ms`, true);
    this.timeoutMs = timeoutMs;
  }
}

/** Network trouble, GPU cold start, overloaded backend. */
export class RenderTransientError extends RenderError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, true, options);
  }
}

/** Deterministic failure such as an unknown template. Never retried. */
export class RenderFatalError extends RenderError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, false, options);
  }
}

/** The caller stopped waiting. Other waiters on the same render are unaffected. */
export class RenderCancelledError extends RenderError {
  constructor() {
    super('Render request was cancelled', true);
  }
}

export function isRetryableRenderError(err: unknown): boolean {
  return err instanceof RenderError && err.retryable && !(err instanceof RenderCancelledError);
}
