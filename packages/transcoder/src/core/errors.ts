import { BaseError } from "@wirecraft/errors"
import { typeNameOf } from "./native-kind"

export type TranscodingErrorCode =
  | "duplicate_type"
  | "duplicate_name"
  | "invalid_transcoding"
  | "unregistered_type"
  | "unregistered_name"
  | "unsupported_type"
  | "unknown_wire_name"
  | "invalid_envelope_keys"
  | "negative_zero"

/** A transcoding is already registered for this type. */
export class DuplicateTypeError extends BaseError<"duplicate_type"> {
  constructor(typeName: string, existingName: string) {
    super(`A transcoding for type ${typeName} is already registered as "${existingName}"`, {
      code: "duplicate_type",
      context: { typeName, existingName },
      isOperational: false,
    })
  }
}

/** The wire name is already taken by another transcoding. */
export class DuplicateNameError extends BaseError<"duplicate_name"> {
  constructor(wireName: string, typeName: string) {
    super(`Wire name "${wireName}" is already registered for type ${typeName}`, {
      code: "duplicate_name",
      context: { wireName, typeName },
      isOperational: false,
    })
  }
}

export class InvalidTranscodingError extends BaseError<"invalid_transcoding"> {
  constructor(typeName: string, reason: string) {
    super(`Invalid transcoding for type ${typeName}: ${reason}`, {
      code: "invalid_transcoding",
      context: { typeName },
      isOperational: false,
    })
  }
}

export class UnregisteredTypeError extends BaseError<"unregistered_type"> {
  constructor(typeName: string) {
    super(`No transcoding is registered for type ${typeName}`, {
      code: "unregistered_type",
      context: { typeName },
    })
  }
}

export class UnregisteredNameError extends BaseError<"unregistered_name"> {
  constructor(wireName: string) {
    super(`No transcoding is registered under wire name "${wireName}"`, {
      code: "unregistered_name",
      context: { wireName },
    })
  }
}

/**
 * Thrown by encode when a reachable value is neither native nor covered by a
 * registered transcoding. Nothing is serialized.
 */
export class UnsupportedTypeError extends BaseError<"unsupported_type"> {
  constructor(typeName: string) {
    super(
      `Object of type ${typeName} is not serializable. ` +
        "Define and register a transcoding for this type.",
      {
        code: "unsupported_type",
        context: { typeName },
        isOperational: false,
      },
    )
  }
}

/**
 * Thrown by decode when an envelope carries a tag this transcoder does not
 * know, usually a writer/reader schema mismatch. Registering the missing
 * transcoding and decoding again may succeed.
 */
export class UnknownWireNameError extends BaseError<"unknown_wire_name"> {
  constructor(wireName: unknown) {
    const shown = typeof wireName === "string" ? `'${wireName}'` : `of type ${typeNameOf(wireName)}`

    super(
      `Data serialized with name ${shown} is not deserializable. ` +
        "Register a transcoding for this name.",
      {
        code: "unknown_wire_name",
        context: { wireName },
        isRetryable: true,
      },
    )
  }
}

export class InvalidEnvelopeKeysError extends BaseError<"invalid_envelope_keys"> {
  constructor(typeKey: string, dataKey: string) {
    super(
      `Envelope keys must be two distinct non-empty strings, got "${typeKey}" and "${dataKey}"`,
      {
        code: "invalid_envelope_keys",
        context: { typeKey, dataKey },
        isOperational: false,
      },
    )
  }
}

/**
 * Neither JSON nor msgpackr keeps the sign of zero; both would read `-0`
 * back as `0`.
 */
export class NegativeZeroError extends BaseError<"negative_zero"> {
  constructor(codec: string) {
    super(`Cannot write -0 with the ${codec} codec; it would decode as 0`, {
      code: "negative_zero",
      context: { codec },
      isOperational: false,
    })
  }
}
