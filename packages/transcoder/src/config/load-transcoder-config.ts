import { BaseError } from "@wirecraft/errors"
import type { LogLevelName } from "@wirecraft/logger"
import { z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { ConfigSource } from "../ports/config-source"
import type { EnvelopeKeys } from "../ports/envelope"
import {
  type NativeCodecName,
  type TranscoderEnv,
  transcoderConfigKeys,
  transcoderConfigSchema,
} from "./schema"

export type TranscoderSettings = Readonly<{
  codec: NativeCodecName
  envelope: EnvelopeKeys
  builtins: boolean
  logging: Readonly<{
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }>
}>

export interface TranscoderConfig {
  readonly value: TranscoderSettings

  /**
   * Which source supplied the final value for a key, or "default" when the
   * schema default was used.
   */
  explain(key: keyof TranscoderEnv): string

  /** Names of the sources that supplied at least one recognised key. */
  sourcesUsed(): string[]
}

export type ConfigIssue = Readonly<{ path: string; message: string }>

export class InvalidConfigError extends BaseError<"invalid_config"> {
  readonly issues: readonly ConfigIssue[]

  constructor(summary: string, issues: readonly ConfigIssue[]) {
    super(`Transcoder configuration is invalid:\n${summary}`, {
      code: "invalid_config",
      context: { issues },
      isOperational: false,
    })
    this.issues = issues
  }
}

export type LoadTranscoderConfigOptions = {
  /** Evaluated in order, later sources win. Default: the process environment */
  sources?: readonly ConfigSource[]
}

export function toSettings(env: TranscoderEnv): TranscoderSettings {
  return {
    codec: env.TRANSCODER_CODEC,
    envelope: {
      typeKey: env.TRANSCODER_TYPE_KEY,
      dataKey: env.TRANSCODER_DATA_KEY,
    },
    builtins: env.TRANSCODER_BUILTINS,
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
  }
}

/**
 * @throws InvalidConfigError when the merged values fail validation
 */
export async function loadTranscoderConfig(
  options: LoadTranscoderConfigOptions = {},
): Promise<TranscoderConfig> {
  const merged: Record<string, unknown> = {}
  const provenance = new Map<string, string>()

  for (const source of options.sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance.set(key, source.name)
      }
    }
  }

  const result = transcoderConfigSchema.safeParse(merged)

  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.map(String).join("."),
      message: issue.message,
    }))
    throw new InvalidConfigError(z.prettifyError(result.error), issues)
  }

  const env = result.data
  const explain = (key: keyof TranscoderEnv): string => provenance.get(key) ?? "default"

  return {
    value: Object.freeze(toSettings(env)),
    explain,
    sourcesUsed: () => [
      ...new Set(
        transcoderConfigKeys.flatMap((key) => (provenance.has(key) ? [explain(key)] : [])),
      ),
    ],
  }
}
