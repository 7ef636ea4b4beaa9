import { UpstreamErrorKind } from '../types';

/**
 * A classified failure of the fetch layer.
 *
 * Returned inside a FetchResult rather than thrown, so callers handle the
 * three kinds explicitly.
 */
export class UpstreamError extends Error {
  public readonly kind: UpstreamErrorKind;
  /** Upstream HTTP status, when a response was received */
  public readonly status?: number;
  public readonly url: string;
  public readonly attempts: number;
  /** True when the overall deadline ended the fetch */
  public readonly timedOut: boolean;

  constructor(
    kind: UpstreamErrorKind,
    message: string,
    details: { url: string; attempts: number; status?: number; timedOut?: boolean }
  ) {
    super(message);
    this.name = kind;
    this.kind = kind;
    this.status = details.status;
    this.url = details.url;
    this.attempts = details.attempts;
    this.timedOut = details.timedOut ?? false;
    Object.setPrototypeOf(this, UpstreamError.prototype);
  }
}
