import { type Logger, NullLogger } from "@wirecraft/logger"
import type { Transcoding, TypeKey } from "../ports/transcoding"
import {
  DuplicateNameError,
  DuplicateTypeError,
  InvalidTranscodingError,
  UnregisteredNameError,
  UnregisteredTypeError,
} from "./errors"
import { describeTypeKey } from "./native-kind"

export type TranscodingRegistryDeps = {
  logger?: Logger
}

/**
 * Transcodings indexed by source type and by wire name.
 *
 * @remarks
 * Append-only. Both indexes are checked before either is written, so a
 * rejected registration leaves the registry as it was. Populate it before
 * use; lookups afterwards are plain map reads and safe to share.
 */
export class TranscodingRegistry {
  private readonly byType = new Map<unknown, Transcoding>()
  private readonly byName = new Map<string, Transcoding>()
  private readonly logger: Logger

  constructor(deps: TranscodingRegistryDeps = {}) {
    this.logger = deps.logger ?? new NullLogger()
  }

  get size(): number {
    return this.byName.size
  }

  /**
   * @throws DuplicateTypeError if `transcoding.type` already has a transcoding
   * @throws DuplicateNameError if `transcoding.name` is taken
   * @throws InvalidTranscodingError if the type is not a constructor or the name is empty
   */
  register<T, D>(transcoding: Transcoding<T, D>): void {
    const { type, name } = transcoding

    if (typeof type !== "function") {
      throw new InvalidTranscodingError(String(type), "type must be a constructor")
    }

    const typeName = describeTypeKey(type)

    if (typeof name !== "string" || name.length === 0) {
      throw new InvalidTranscodingError(typeName, "wire name must be a non-empty string")
    }

    const existing = this.byType.get(type)
    if (existing) throw new DuplicateTypeError(typeName, existing.name)

    const clash = this.byName.get(name)
    if (clash) throw new DuplicateNameError(name, describeTypeKey(clash.type))

    this.byType.set(type, transcoding)
    this.byName.set(name, transcoding)

    this.logger.debug("transcoding registered", { wireName: name, typeName })
  }

  /** @throws UnregisteredTypeError */
  lookupByType<T>(type: TypeKey<T>): Transcoding {
    const transcoding = this.byType.get(type)
    if (!transcoding) throw new UnregisteredTypeError(describeTypeKey(type))

    return transcoding
  }

  /** @throws UnregisteredNameError */
  lookupByName(name: string): Transcoding {
    const transcoding = this.byName.get(name)
    if (!transcoding) throw new UnregisteredNameError(name)

    return transcoding
  }

  findByType(type: unknown): Transcoding | undefined {
    return this.byType.get(type)
  }

  findByName(name: string): Transcoding | undefined {
    return this.byName.get(name)
  }

  has(type: unknown): boolean {
    return this.byType.has(type)
  }

  /** Registered wire names, in registration order. */
  names(): string[] {
    return [...this.byName.keys()]
  }
}
