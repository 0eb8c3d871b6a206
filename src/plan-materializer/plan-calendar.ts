export type Weekday = 'mon' | 'tue' | 'wed' | 'thu' | 'fri' | 'sat' | 'sun'

export const WEEKDAYS: Weekday[] = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun']

const WEEKDAY_NAMES = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday']

const MS_PER_DAY = 24 * 60 * 60 * 1000

/** YYYY-MM-DD of the UTC calendar day. */
export function toDateKey(date: Date): string {
  return date.toISOString().split('T')[0] ?? ''
}

export function parseDateKey(dateKey: string): Date {
  return new Date(`${dateKey}T00:00:00.000Z`)
}

export function addDays(dateKey: string, days: number): string {
  return toDateKey(new Date(parseDateKey(dateKey).getTime() + days * MS_PER_DAY))
}

/**
 * Monday of the ISO week containing dateKey.
 */
export function weekStartOf(dateKey: string): string {
  // getUTCDay: 0=Sunday .. 6=Saturday -> ISO offset 0=Monday .. 6=Sunday
  const dayOfWeek = parseDateKey(dateKey).getUTCDay()
  const isoOffset = dayOfWeek === 0 ? 6 : dayOfWeek - 1
  return addDays(dateKey, -isoOffset)
}

/**
 * Offset from Monday (0..6) for a weekday label, or null when the label is
 * not a weekday. Accepts full names and three-letter abbreviations.
 */
export function weekdayOffset(label: string | null | undefined): number | null {
  if (typeof label !== 'string') return null
  const key = label.trim().toLowerCase()
  if (key.length === 0) return null

  const full = WEEKDAY_NAMES.indexOf(key)
  if (full >= 0) return full

  const short = WEEKDAYS.findIndex((d) => d === key)
  return short >= 0 ? short : null
}

export function compareDateKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}
