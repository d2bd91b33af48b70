/**
 * Pull a number out of display text such as `$1,234.56`.
 *
 * Everything except digits, `.` and `-` is dropped before parsing, so
 * accounting parentheses and thousands separators are lost: `($12.00)` reads
 * as `12`. An empty residue reads as `0`; a residue that is not a number
 * (`1.2.3`, `-`) throws.
 */
export function extractNumberFromText(text: string): number {
  const cleaned = text.replace(/[^0-9.-]/g, '')
  if (cleaned === '') return 0

  const value = Number(cleaned)
  if (Number.isNaN(value)) {
    throw new Error(`Cannot read a number from "${text}"`)
  }
  return value
}
