/**
 * Raised when a security policy cannot be constructed. Fatal at startup: the
 * server never runs with a partial or unvalidated policy.
 */
export class PolicyLoadError extends Error {
  readonly source: string;

  constructor(message: string, source: string, options?: { cause?: unknown }) {
    super(`Failed to load security policy from ${source}: ${message}`, options);
    this.name = 'PolicyLoadError';
    this.source = source;
  }
}
