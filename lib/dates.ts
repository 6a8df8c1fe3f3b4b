import type { CellValue, ChartBlock, DateStats } from './types'
import { formatDay, isMissing, isValidDate, looksNumeric } from './table'

// ========== Permissive date parsing ==========

const MONTH_NAMES = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
]

const TIME = String.raw`(?:[T\s]+(\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?\s*([AaPp][Mm])?\s*(Z|[+-]\d{2}:?\d{2})?)?`

const ISO_RE = new RegExp(String.raw`^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})${TIME}$`)
const NUMERIC_DMY_RE = new RegExp(String.raw`^(\d{1,2})[-/.](\d{1,2})[-/.](\d{2}|\d{4})${TIME}$`)
const DAY_MONTH_NAME_RE = /^(\d{1,2})(?:st|nd|rd|th)?[\s\-/]+([A-Za-z]{3,9})\.?,?[\s\-/]+(\d{2}|\d{4})$/
const MONTH_NAME_DAY_RE = /^(?:[A-Za-z]{3,9},?\s+)?([A-Za-z]{3,9})\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})$/
const MONTH_NAME_YEAR_RE = /^([A-Za-z]{3,9})\.?[\s\-/,]+(\d{4})$/

// Accepts full names and any prefix of at least three letters ("Sep", "Sept", "Septem").
function monthFromName(name: string): number | null {
  const key = name.toLowerCase()
  const index = MONTH_NAMES.findIndex(full => full.startsWith(key))
  return index === -1 ? null : index + 1
}

function expandYear(text: string): number {
  const year = Number(text)
  if (text.length > 2) return year
  return year <= 68 ? 2000 + year : 1900 + year
}

function buildDate(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
  meridiem?: string,
  zone?: string,
): Date | null {
  if (meridiem) {
    // 12-hour clock: 1 through 12 only
    if (hour < 1 || hour > 12) return null
    if (meridiem === 'pm' && hour < 12) hour += 12
    if (meridiem === 'am' && hour === 12) hour = 0
  }
  if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59 || second > 59) return null
  const ms = Date.UTC(year, month - 1, day, hour, minute, second)
  const date = new Date(ms)
  // rejects Feb 30 and friends, which Date.UTC would roll over
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return null
  if (zone && zone !== 'Z') {
    const sign = zone.startsWith('-') ? -1 : 1
    const digits = zone.slice(1).replace(':', '')
    const offset = Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2))
    return new Date(ms - sign * offset * 60_000)
  }
  return date
}

function timeParts(
  match: RegExpMatchArray,
  from: number,
): [number, number, number, string | undefined, string | undefined] {
  return [
    match[from] ? Number(match[from]) : 0,
    match[from + 1] ? Number(match[from + 1]) : 0,
    match[from + 2] ? Number(match[from + 2]) : 0,
    match[from + 3]?.toLowerCase(),
    match[from + 4],
  ]
}

/**
 * Parses a cell as a calendar date, accepting the mixed formats found in exported spreadsheets:
 * ISO (`2024-03-05`, `2024/03/05 14:30`), numeric month-first (`3/5/2024`, day-first when the
 * first field exceeds 12) and month names (`5 Mar 2024`, `Mar 5, 2024`, `March 2024`).
 * Numbers and bare numeric strings are never dates.
 */
export function parseDate(value: CellValue): Date | null {
  if (value instanceof Date) return isValidDate(value) ? value : null
  if (typeof value !== 'string') return null

  const text = value.trim()
  if (text === '' || looksNumeric(text)) return null

  let m = text.match(ISO_RE)
  if (m) {
    return buildDate(Number(m[1]), Number(m[2]), Number(m[3]), ...timeParts(m, 4))
  }

  m = text.match(NUMERIC_DMY_RE)
  if (m) {
    const first = Number(m[1])
    const second = Number(m[2])
    const year = expandYear(m[3])
    return first > 12
      ? buildDate(year, second, first, ...timeParts(m, 4))
      : buildDate(year, first, second, ...timeParts(m, 4))
  }

  m = text.match(DAY_MONTH_NAME_RE)
  if (m) {
    const month = monthFromName(m[2])
    return month === null ? null : buildDate(expandYear(m[3]), month, Number(m[1]))
  }

  m = text.match(MONTH_NAME_DAY_RE)
  if (m) {
    const month = monthFromName(m[1])
    return month === null ? null : buildDate(Number(m[3]), month, Number(m[2]))
  }

  m = text.match(MONTH_NAME_YEAR_RE)
  if (m) {
    const month = monthFromName(m[1])
    return month === null ? null : buildDate(Number(m[2]), month, 1)
  }

  return null
}

// ========== Date summary ==========

const DAY_MS = 86_400_000

type Granularity = 'day' | 'month' | 'year'

function pickGranularity(spanDays: number): Granularity {
  if (spanDays <= 62) return 'day'
  if (spanDays <= 3 * 366) return 'month'
  return 'year'
}

function bucketLabel(date: Date, granularity: Granularity): string {
  const day = formatDay(date)
  if (granularity === 'day') return day
  if (granularity === 'month') return day.slice(0, 7)
  return day.slice(0, 4)
}

// Walks every bucket between min and max so gaps show up as zeros on the timeline.
function bucketRange(min: Date, max: Date, granularity: Granularity): string[] {
  const labels: string[] = []
  const cursor = new Date(Date.UTC(min.getUTCFullYear(), granularity === 'year' ? 0 : min.getUTCMonth(), granularity === 'day' ? min.getUTCDate() : 1))
  while (cursor.getTime() <= max.getTime()) {
    labels.push(bucketLabel(cursor, granularity))
    if (granularity === 'day') cursor.setUTCDate(cursor.getUTCDate() + 1)
    else if (granularity === 'month') cursor.setUTCMonth(cursor.getUTCMonth() + 1)
    else cursor.setUTCFullYear(cursor.getUTCFullYear() + 1)
  }
  return labels
}

export interface DateSummary {
  stats: DateStats
  timeline: ChartBlock | null
}

export function summarizeDates(values: CellValue[], columnName = ''): DateSummary {
  const parsed: Date[] = []
  let unparsed = 0
  for (const v of values) {
    if (isMissing(v)) continue
    const d = parseDate(v)
    if (d) parsed.push(d)
    else unparsed++
  }

  if (parsed.length === 0) {
    return { stats: { parsed: 0, unparsed }, timeline: null }
  }

  let min = parsed[0]
  let max = parsed[0]
  for (const d of parsed) {
    if (d.getTime() < min.getTime()) min = d
    if (d.getTime() > max.getTime()) max = d
  }

  const granularity = pickGranularity((max.getTime() - min.getTime()) / DAY_MS)
  const labels = bucketRange(min, max, granularity)
  const counts = new Map<string, number>(labels.map(l => [l, 0]))
  for (const d of parsed) {
    const label = bucketLabel(d, granularity)
    counts.set(label, (counts.get(label) ?? 0) + 1)
  }

  return {
    stats: { min: formatDay(min), max: formatDay(max), parsed: parsed.length, unparsed },
    timeline: {
      kind: 'timeline',
      title: columnName ? `${columnName} per ${granularity}` : `Entries per ${granularity}`,
      labels,
      values: labels.map(l => counts.get(l) ?? 0),
    },
  }
}
