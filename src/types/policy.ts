import type { z } from 'zod'
import type { PolicySchema } from '../core/policy/schema.js'

/**
 * Recursively readonly view of a value
 */
export type DeepReadonly<T> = T extends readonly (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T

/**
 * Recursively optional view of a value. Lists stay whole.
 */
export type DeepPartial<T> = T extends readonly (infer U)[]
  ? readonly U[]
  : T extends object
    ? { [K in keyof T]?: DeepPartial<T[K]> }
    : T

/**
 * Immutable policy snapshot threaded through every scan call
 */
export type ScanPolicy = DeepReadonly<z.infer<typeof PolicySchema>>

/**
 * Partial policy accepted by createPolicy(), merged over the bundled defaults
 */
export type PolicyOverrides = DeepPartial<z.input<typeof PolicySchema>>
