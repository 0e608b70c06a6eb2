import {
  addDays,
  addMilliseconds,
  parseISO,
  parse,
  isValid,
  startOfDay,
  eachDayOfInterval,
  eachWeekOfInterval,
  eachMonthOfInterval,
  format,
} from 'date-fns'

export type TimeUnit = 'day' | 'week' | 'month'

const MS_PER_DAY = 24 * 60 * 60 * 1000

const LENIENT_FORMATS = [
  'yyyy/M/d H:mm:ss',
  'yyyy/M/d H:mm',
  'yyyy/M/d',
  'yyyy.M.d',
  'M/d/yyyy H:mm',
  'M/d/yyyy',
]

// Spreadsheet serial day 0 (the 1900 date system with its leap-year bug baked in).
const SERIAL_EPOCH = { year: 1899, month: 11, day: 30 }

function fromSerial(serial: number): Date | null {
  if (!Number.isFinite(serial) || serial <= 0) return null
  const whole = Math.floor(serial)
  const base = new Date(SERIAL_EPOCH.year, SERIAL_EPOCH.month, SERIAL_EPOCH.day + whole)
  const date = addMilliseconds(base, Math.round((serial - whole) * MS_PER_DAY))
  // serials past year 275760 overflow the Date range
  return isValid(date) ? date : null
}

/** Lenient date parsing for spreadsheet cells; null when nothing sensible comes out. */
export function parseTaskDate(value: unknown): Date | null {
  if (value instanceof Date) return isValid(value) ? value : null
  if (typeof value === 'number') return fromSerial(value)
  if (typeof value !== 'string') return null
  const text = value.trim()
  if (text === '') return null
  if (/^\d+(\.\d+)?$/.test(text)) {
    // bare numbers are serials unless they look like a compact yyyyMMdd date
    if (/^\d{8}$/.test(text)) {
      const compact = parse(text, 'yyyyMMdd', new Date(2000, 0, 1))
      return isValid(compact) ? compact : null
    }
    return fromSerial(Number(text))
  }
  const iso = parseISO(text)
  if (isValid(iso)) return iso
  for (const pattern of LENIENT_FORMATS) {
    const parsed = parse(text, pattern, new Date(2000, 0, 1))
    if (isValid(parsed)) return parsed
  }
  return null
}

/** Canonical text for a task timestamp: date-only at local midnight, seconds precision otherwise. */
export function formatTaskDate(date: Date): string {
  const isMidnight =
    date.getHours() === 0 && date.getMinutes() === 0 && date.getSeconds() === 0
  return isMidnight ? format(date, 'yyyy-MM-dd') : format(date, "yyyy-MM-dd'T'HH:mm:ss")
}

/** Day-precision text used on export; empty when the date is missing. */
export function formatDay(value: string | null): string {
  if (value == null) return ''
  const date = parseTaskDate(value)
  return date ? format(date, 'yyyy-MM-dd') : ''
}

export function toEpoch(value: string | null): number | null {
  if (value == null) return null
  const date = parseTaskDate(value)
  return date ? date.getTime() : null
}

export function addOneDay(epoch: number): number {
  return addDays(new Date(epoch), 1).getTime()
}

/** Calendar days from the day of `start` to the day of `end`, both inclusive. */
export function eachDayInRange(start: number, end: number): Date[] {
  const first = startOfDay(new Date(start))
  const last = startOfDay(new Date(end))
  if (last < first) return []
  return eachDayOfInterval({ start: first, end: last })
}

// ── Chart axis ───────────────────────────────────────────────

const DAYS_PER_UNIT: Record<TimeUnit, number> = {
  day: 1,
  week: 7,
  month: 30,
}

export function getDaysPerUnit(unit: TimeUnit): number {
  return DAYS_PER_UNIT[unit]
}

/** Horizontal offset of an instant, in units from `min` (fractional, can be negative). */
export function timeToUnitOffset(epoch: number, min: number, unit: TimeUnit): number {
  return (epoch - min) / MS_PER_DAY / getDaysPerUnit(unit)
}

export function getTotalUnits(min: number, max: number, unit: TimeUnit): number {
  return Math.max(0, timeToUnitOffset(max, min, unit))
}

export interface AxisTick {
  date: Date
  label: string
  offsetUnits: number
}

export function getAxisTicks(min: number, max: number, unit: TimeUnit): AxisTick[] {
  const start = startOfDay(new Date(min))
  const end = new Date(max)
  if (end < start) return []

  if (unit === 'day') {
    return eachDayOfInterval({ start, end }).map((d) => ({
      date: d,
      label: format(d, 'MM-dd'),
      offsetUnits: timeToUnitOffset(d.getTime(), min, unit),
    }))
  }

  if (unit === 'week') {
    return eachWeekOfInterval({ start, end }, { weekStartsOn: 1 }).map((d) => ({
      date: d,
      label: format(d, 'MMM d'),
      offsetUnits: timeToUnitOffset(d.getTime(), min, unit),
    }))
  }

  return eachMonthOfInterval({ start, end }).map((d) => ({
    date: d,
    label: format(d, 'MMM yyyy'),
    offsetUnits: timeToUnitOffset(d.getTime(), min, unit),
  }))
}
