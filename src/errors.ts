/**
 * Error taxonomy. Per-request errors (retrieval, not found) are caught by the
 * dispatcher and turned into a reply; configuration errors only surface at
 * startup.
 */
export type AgentErrorKind = 'retrieval_failure' | 'not_found' | 'configuration';

export abstract class AgentError extends Error {
  abstract readonly kind: AgentErrorKind;
}

// ── External API unreachable, timed out or returned junk ─────
export class RetrievalFailure extends AgentError {
  readonly kind = 'retrieval_failure';

  constructor(
    readonly endpoint: string,
    readonly reason:   string,
  ) {
    super(`Request to ${endpoint} failed: ${reason}`);
    this.name = 'RetrievalFailure';
  }
}

// ── Referenced market slug is absent ─────────────────────────
export class NotFoundError extends AgentError {
  readonly kind = 'not_found';

  constructor(readonly slug: string) {
    super(`Market not found: ${slug}`);
    this.name = 'NotFoundError';
  }
}

// ── Missing/invalid env at startup ───────────────────────────
export class ConfigurationError extends AgentError {
  readonly kind = 'configuration';

  constructor(readonly key: string, detail: string) {
    super(`${detail}: ${key}`);
    this.name = 'ConfigurationError';
  }
}

export function isAgentError(err: unknown): err is AgentError {
  return err instanceof AgentError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
