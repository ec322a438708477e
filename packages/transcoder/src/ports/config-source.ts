/**
 * A source of raw configuration values.
 *
 * Sources only load; validation and coercion happen in
 * `loadTranscoderConfig`. When several sources provide the same key, the
 * later one wins.
 */
export interface ConfigSource {
  /** Human-readable name for provenance, e.g. "env" or "object:overrides" */
  readonly name: string

  /**
   * Load configuration values. A key mapped to `undefined` counts as
   * "not provided".
   */
  load(): Promise<Record<string, unknown>>
}
