/**
 * The two reserved keys of a tagged envelope.
 *
 * A native map whose own key set is exactly `{typeKey, dataKey}` is read as
 * an envelope on decode. User data that happens to produce such a map is
 * misread; this ambiguity is kept for wire compatibility.
 */
export type EnvelopeKeys = Readonly<{
  typeKey: string
  dataKey: string
}>

export const DEFAULT_ENVELOPE_KEYS: EnvelopeKeys = Object.freeze({
  typeKey: "_type_",
  dataKey: "_data_",
})
