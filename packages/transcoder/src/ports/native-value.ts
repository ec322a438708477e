export type NativeScalar = null | boolean | number | string

/**
 * The value space a native codec accepts directly: scalars, ordered
 * sequences and string-keyed maps, nested arbitrarily.
 */
export type NativeValue = NativeScalar | NativeValue[] | NativeMap

export type NativeMap = { [key: string]: NativeValue }
