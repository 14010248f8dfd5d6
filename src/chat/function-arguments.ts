import type {z} from 'zod'
import {errorMessage} from '../core/errors.js'

export type ArgumentValue<T> = {
  value: T
  /** Present when the parameter was missing, malformed or failed the schema. */
  error?: Error
}

/**
 * Read access to the accumulated arguments string of one tool call.
 *
 * Nothing here throws: a bad payload or a bad parameter yields the fallback
 * together with the captured error, so a tool can still run on partial data.
 */
export class FunctionArguments {
  private readonly values: Record<string, unknown>
  readonly parseError?: Error

  constructor(raw: string) {
    const parsed = FunctionArguments.parse(raw)
    this.values = parsed.values
    this.parseError = parsed.error
  }

  private static parse(raw: string): {values: Record<string, unknown>; error?: Error} {
    if (!raw.trim()) return {values: {}}
    try {
      const value: unknown = JSON.parse(raw)
      if (value && typeof value === 'object' && !Array.isArray(value)) {
        return {values: Object.fromEntries(Object.entries(value))}
      }
      return {values: {}, error: new Error('Tool arguments must be a JSON object.')}
    } catch (error) {
      return {values: {}, error: new Error(`Tool arguments are not valid JSON: ${errorMessage(error)}`)}
    }
  }

  has(name: string): boolean {
    return Object.hasOwn(this.values, name)
  }

  get<T>(name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T): ArgumentValue<T> {
    if (!this.has(name)) {
      return {value: fallback, error: this.parseError ?? new Error(`Missing argument '${name}'.`)}
    }

    const result = schema.safeParse(this.values[name])
    if (result.success) return {value: result.data}
    const issue = result.error.issues[0]
    return {value: fallback, error: new Error(`Invalid argument '${name}': ${issue?.message ?? 'rejected'}`)}
  }

  toJSON(): Record<string, unknown> {
    return {...this.values}
  }
}
