/**
 * Ordering and rendering of dimension records, shared by error messages and
 * the public `Dimension` module.
 */

const CANONICAL_ORDER: ReadonlyArray<string> = ["L", "M", "T", "I", "Θ", "N", "J"]

export const compareIds = (left: string, right: string): number => {
  const l = CANONICAL_ORDER.indexOf(left)
  const r = CANONICAL_ORDER.indexOf(right)
  if (l >= 0 && r >= 0) {
    return l - r
  }
  if (l >= 0) {
    return -1
  }
  if (r >= 0) {
    return 1
  }
  return left < right ? -1 : left > right ? 1 : 0
}

export const entries = (
  dimensions: Readonly<Record<string, number>>,
): ReadonlyArray<readonly [id: string, exponent: number]> =>
  Object.keys(dimensions)
    .sort(compareIds)
    .map((id) => [id, dimensions[id] ?? 0] as const)

export const formatFactor = (symbol: string, exponent: number): string =>
  exponent === 1 ? symbol : `${symbol}^${exponent}`

export const formatDimensions = (dimensions: Readonly<Record<string, number>>): string => {
  const parts = entries(dimensions).map(([id, exponent]) => formatFactor(id, exponent))
  return parts.length === 0 ? "1" : parts.join(" ")
}
