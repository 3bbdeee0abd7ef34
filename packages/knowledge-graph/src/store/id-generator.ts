/**
 * Identifier Generator
 *
 * Per-kind monotonically increasing counters. Ids look like
 * `entity_1`, `relationship_4`, `pattern_2`, `convention_3`.
 */

import type { RecordType } from "../model"

export type IdCounters = Record<RecordType, number>

const ID_PREFIXES: Record<RecordType, string> = {
  entity: "entity",
  relationship: "relationship",
  pattern: "pattern",
  styleConvention: "convention",
}

export function initialCounters(): IdCounters {
  return { entity: 0, relationship: 0, pattern: 0, styleConvention: 0 }
}

export class IdGenerator {
  private counters: IdCounters

  constructor(counters: IdCounters = initialCounters()) {
    this.counters = { ...counters }
  }

  /**
   * Allocate the next id for a record kind.
   */
  next(kind: RecordType): string {
    const value = this.counters[kind] + 1
    this.counters[kind] = value
    return `${ID_PREFIXES[kind]}_${value}`
  }

  snapshot(): IdCounters {
    return { ...this.counters }
  }

  restore(counters: IdCounters): void {
    this.counters = { ...counters }
  }

  /**
   * Back to the state of a freshly created graph.
   */
  reset(): void {
    this.counters = initialCounters()
  }
}
