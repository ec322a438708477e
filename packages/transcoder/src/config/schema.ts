import { logLevelNames } from "@wirecraft/logger"
import { z } from "zod"

export const nativeCodecNames = ["json", "msgpack"] as const

export type NativeCodecName = (typeof nativeCodecNames)[number]

const flag = z.union([z.boolean(), z.stringbool()])

export const transcoderConfigSchema = z
  .object({
    TRANSCODER_CODEC: z.enum(nativeCodecNames).default("json"),
    TRANSCODER_TYPE_KEY: z.string().min(1).default("_type_"),
    TRANSCODER_DATA_KEY: z.string().min(1).default("_data_"),
    TRANSCODER_BUILTINS: flag.default(true),

    LOG_LEVEL: z.enum(logLevelNames).default("info"),
    LOG_PRETTY: flag.default(false),
    SERVICE_NAME: z.string().min(1).default("transcoder"),
  })
  .refine((env) => env.TRANSCODER_TYPE_KEY !== env.TRANSCODER_DATA_KEY, {
    message: "TRANSCODER_TYPE_KEY and TRANSCODER_DATA_KEY must differ",
    path: ["TRANSCODER_DATA_KEY"],
  })

export type TranscoderEnv = z.infer<typeof transcoderConfigSchema>

function isConfigKey(key: string): key is keyof TranscoderEnv {
  return Object.hasOwn(transcoderConfigSchema.shape, key)
}

/** Every key the schema recognises, in declaration order. */
export const transcoderConfigKeys: readonly (keyof TranscoderEnv)[] = Object.freeze(
  Object.keys(transcoderConfigSchema.shape).filter(isConfigKey),
)
