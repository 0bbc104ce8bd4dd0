export const isFiniteNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value)

export const roundTo = (value: number, digits: number): number => {
  const factor = 10 ** digits
  return Math.round(value * factor) / factor
}

export const toCount = (value: unknown): number =>
  isFiniteNumber(value) && value > 0 ? Math.floor(value) : 0

export const elapsedSecondsSince = (
  startedAt: number,
  now: () => number,
): number => roundTo(Math.max(0, now() - startedAt) / 1000, 3)
