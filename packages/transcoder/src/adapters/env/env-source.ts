import { transcoderConfigKeys } from "../../config/schema"
import type { ConfigSource } from "../../ports/config-source"

export type EnvSourceOptions = {
  /**
   * Prepended to every key, so one process can configure several
   * transcoders: with `"ORDERS_"` the codec comes from `ORDERS_TRANSCODER_CODEC`.
   */
  prefix?: string
  /** Default: every transcoder config key */
  keys?: readonly string[]
  /** Default: `process.env` */
  env?: Readonly<Record<string, string | undefined>>
}

/**
 * Reads transcoder settings from environment variables. Only the listed keys
 * are read; unset ones are left out so schema defaults apply.
 */
export class EnvSource implements ConfigSource {
  readonly name: string
  private readonly prefix: string
  private readonly keys: readonly string[]
  private readonly env: Readonly<Record<string, string | undefined>>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.keys = options.keys ?? transcoderConfigKeys
    this.env = options.env ?? process.env
    this.name = this.prefix ? `env:${this.prefix}` : "env"
  }

  async load(): Promise<Record<string, unknown>> {
    const values: Record<string, string> = {}

    for (const key of this.keys) {
      const value = this.env[`${this.prefix}${key}`]
      if (value !== undefined) values[key] = value
    }

    return values
  }
}
