/**
 * Key-sorted JSON encoding used for hashing session event entries.
 *
 * Object keys are emitted in sorted order and `undefined` members are
 * dropped, so two entries with the same content always hash the same.
 * Array order is preserved.
 */
export function canonicalize(value: unknown): string {
  switch (typeof value) {
    case 'undefined':
      return 'null'
    case 'boolean':
    case 'number':
    case 'string':
      return JSON.stringify(value)
    case 'object': {
      if (value === null) return 'null'
      if (Array.isArray(value)) {
        return `[${value.map((el) => canonicalize(el)).join(',')}]`
      }
      const members = Object.entries(value)
        .filter(([, v]) => v !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`)
      return `{${members.join(',')}}`
    }
    default:
      return JSON.stringify(String(value))
  }
}
