import type { Transcoding, TypeKey } from "../ports/transcoding"

export type TranscodingSpec<T, D> = {
  type: TypeKey<T>
  name: string
  encode: (value: T) => D
  decode: (data: D) => T
}

/**
 * Build a frozen transcoding from plain functions.
 *
 * @example
 * ```ts
 * const urlAsString = defineTranscoding({
 *   type: URL,
 *   name: "url",
 *   encode: (url) => url.href,
 *   decode: (href: string) => new URL(href),
 * })
 * ```
 */
export function defineTranscoding<T, D>(spec: TranscodingSpec<T, D>): Transcoding<T, D> {
  const { type, name, encode, decode } = spec

  return Object.freeze({ type, name, encode, decode })
}
