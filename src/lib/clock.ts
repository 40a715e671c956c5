/** Source of "now" for expiry and timestamps. Injected so tests can pin time. */
export type Clock = () => Date

export const systemClock: Clock = () => new Date()

const DAY_MS = 24 * 60 * 60 * 1000

/** `days` whole days after `from`. */
export function addDays(from: Date, days: number): Date {
  return new Date(from.getTime() + days * DAY_MS)
}
