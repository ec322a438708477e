import { defineTranscoding } from "../core/define-transcoding"
import type { Transcoding } from "../ports/transcoding"

/**
 * An immutable, ordered, fixed-length group of values.
 *
 * Arrays always travel as native sequences; wrap values in a `Tuple` when
 * the receiving side must get a tuple back rather than a list.
 */
export class Tuple<T = unknown> implements Iterable<T> {
  readonly items: readonly T[]

  constructor(items: Iterable<T> = []) {
    this.items = Object.freeze([...items])
  }

  static of<T>(...items: T[]): Tuple<T> {
    return new Tuple(items)
  }

  get length(): number {
    return this.items.length
  }

  at(index: number): T | undefined {
    return this.items.at(index)
  }

  toArray(): T[] {
    return [...this.items]
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]()
  }
}

export function tupleAsList(): Transcoding<Tuple, unknown[]> {
  return defineTranscoding({
    type: Tuple,
    name: "tuple_as_list",
    encode: (tuple: Tuple) => tuple.toArray(),
    decode: (items: unknown[]) => new Tuple(items),
  })
}
