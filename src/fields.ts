/**
 * Structured field output for serializers.
 */

import { NullArgumentError } from './errors'

/** Receives one named field at a time from `writeFields`. */
export interface FieldSink {
  addValue(name: string, value: unknown): void
}

/** Collects written fields in insertion order. */
export class FieldMap implements FieldSink {
  readonly values = new Map<string, unknown>()

  addValue(name: string, value: unknown): void {
    this.values.set(name, value)
  }

  get(name: string): unknown {
    return this.values.get(name)
  }
}

export function requireSink(sink: FieldSink | null | undefined, argument: string): FieldSink {
  if (sink === null || sink === undefined) {
    throw new NullArgumentError(argument)
  }
  return sink
}
