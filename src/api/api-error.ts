/**
 * The platform's application-level error object.
 *
 * Failed REST calls return `{ code, message, errors? }` where `errors` is a
 * tree keyed by field name whose leaves are `{ _errors: [{ code, message }] }`.
 */

import { Type, type Static } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'

export const ApiErrorSchema = Type.Object({
  code: Type.Integer(),
  message: Type.String(),
  errors: Type.Optional(Type.Unknown()),
})
export type ApiError = Static<typeof ApiErrorSchema>

const FieldErrorSchema = Type.Object({
  code: Type.String(),
  message: Type.String(),
})

const FieldErrorLeafSchema = Type.Object({
  _errors: Type.Array(FieldErrorSchema),
})

/** One flattened validation failure */
export interface FieldError {
  /** Dotted path to the offending field, e.g. `ticket` or `settings.locale` */
  path: string
  code: string
  message: string
}

/** Narrow an unknown response body to an ApiError, or null if it is not one. */
export function parseApiError(body: unknown): ApiError | null {
  return Value.Check(ApiErrorSchema, body) ? body : null
}

/** Flatten the nested `errors` tree into a list of field errors. */
export function collectFieldErrors(errors: unknown, prefix = ''): FieldError[] {
  if (errors === null || typeof errors !== 'object' || Array.isArray(errors)) return []

  if (Value.Check(FieldErrorLeafSchema, errors)) {
    return errors._errors.map((e) => ({ path: prefix, code: e.code, message: e.message }))
  }

  const result: FieldError[] = []
  for (const [key, value] of Object.entries(errors)) {
    result.push(...collectFieldErrors(value, prefix ? `${prefix}.${key}` : key))
  }
  return result
}
