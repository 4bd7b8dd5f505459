/**
 * The upstream authority could not be reached, or answered with something the
 * proxy had to interpret and could not. Mapped to 503 by the HTTP layer.
 */
export class UpstreamUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UpstreamUnavailableError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
