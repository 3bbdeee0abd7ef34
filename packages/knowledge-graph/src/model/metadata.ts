/**
 * Metadata Conversion
 *
 * Turns arbitrary caller-supplied values into the MetadataValue union.
 * The result is a fresh copy; nothing the caller holds is retained.
 */

import type { Metadata, MetadataValue } from "./types"

/**
 * Raised while walking a value that cannot be represented as metadata.
 */
export class MetadataConversionError extends Error {
  constructor(
    public readonly path: string,
    public readonly reason: string,
  ) {
    super(`${path}: ${reason}`)
    this.name = "MetadataConversionError"
  }
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

function describe(value: unknown): string {
  if (value === undefined) return "undefined"
  if (typeof value === "object" && value !== null) {
    return value.constructor?.name ?? "object"
  }
  return typeof value
}

function convert(value: unknown, path: string, ancestors: Set<object>): MetadataValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return value
  }

  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new MetadataConversionError(path, `non-finite number ${value}`)
    }
    return value
  }

  if (typeof value !== "object") {
    throw new MetadataConversionError(path, `${describe(value)} is not representable`)
  }

  if (ancestors.has(value)) {
    throw new MetadataConversionError(path, "cyclic reference")
  }

  if (Array.isArray(value)) {
    ancestors.add(value)
    const items: MetadataValue[] = []
    for (let i = 0; i < value.length; i++) {
      items.push(convert(value[i], `${path}[${i}]`, ancestors))
    }
    ancestors.delete(value)
    return items
  }

  if (!isPlainObject(value)) {
    throw new MetadataConversionError(path, `${describe(value)} is not representable`)
  }

  ancestors.add(value)
  const entries = Object.entries(value).map(
    ([key, child]): [string, MetadataValue] => [key, convert(child, `${path}.${key}`, ancestors)],
  )
  ancestors.delete(value)
  return Object.fromEntries(entries)
}

/**
 * Convert a value into a Metadata mapping.
 * @throws MetadataConversionError naming the first offending path
 */
export function toMetadata(value: unknown, path = "metadata"): Metadata {
  if (typeof value !== "object" || value === null || Array.isArray(value) || !isPlainObject(value)) {
    throw new MetadataConversionError(path, `expected a mapping, received ${describe(value)}`)
  }

  const ancestors = new Set<object>([value])
  const entries = Object.entries(value).map(
    ([key, child]): [string, MetadataValue] => [key, convert(child, `${path}.${key}`, ancestors)],
  )
  return Object.fromEntries(entries)
}

/**
 * Key-by-key merge: new keys are added, existing keys take the incoming value.
 */
export function mergeMetadata(current: Metadata, incoming: Metadata | undefined): Metadata {
  if (!incoming) return current
  return { ...current, ...incoming }
}
