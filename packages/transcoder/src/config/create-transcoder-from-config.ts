import { createPinoLogger, type Logger } from "@wirecraft/logger"
import { createTranscoder } from "../core/create-transcoder"
import type { RecursiveTranscoder } from "../core/recursive-transcoder"
import type { Transcoding } from "../ports/transcoding"
import type { TranscoderSettings } from "./load-transcoder-config"

export type TranscoderFromConfigDeps = {
  transcodings?: readonly Transcoding[]
  /** Defaults to a pino logger built from the logging settings. */
  logger?: Logger
}

export function createTranscoderFromConfig(
  settings: TranscoderSettings,
  deps: TranscoderFromConfigDeps = {},
): RecursiveTranscoder {
  const logger =
    deps.logger ??
    createPinoLogger(
      {},
      { level: settings.logging.level, prettify: settings.logging.prettify },
      { service: settings.logging.serviceName },
    )

  return createTranscoder({
    codec: settings.codec,
    builtins: settings.builtins,
    envelope: settings.envelope,
    logger: logger.child({ module: "transcoder" }),
    ...(deps.transcodings && { transcodings: deps.transcodings }),
  })
}
