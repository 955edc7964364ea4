/**
 * Small natural-language time parser. Returns a local Date or null.
 *
 * Supported examples:
 * - "tomorrow at 8AM", "tomorrow 17:30", "tomorrow" (09:00)
 * - "today at 14:00", "at 14:00", "at 3pm"
 * - "in 30 minutes", "in 2 hours"
 * - "2025-10-01 14:00"
 * - "8:00" or "8AM" (next future occurrence)
 *
 * Rules are tried in a fixed order and the first match wins, wherever in the
 * string it occurs.
 */

const AMPM = /\b(1[0-2]|0?[1-9])\s*(am|pm)\b/i
const HHMM = /\b(\d{1,2}):(\d{2})\b/
const IN_X = /\bin\s+(\d+)\s+(minute|minutes|hour|hours)\b/i
const DATE_TIME = /\b(\d{4})-(\d{2})-(\d{2})\s+(\d{1,2}):(\d{2})\b/

const MINUTE_MS = 60_000
const HOUR_MS = 60 * MINUTE_MS

interface ClockTime {
    hour: number
    minute: number
}

function toHour24(hour: number, meridiem: string): number {
    if (meridiem.toLowerCase() === 'am') return hour === 12 ? 0 : hour
    return hour === 12 ? 12 : hour + 12
}

function findAmPm(text: string): ClockTime | null {
    const m = AMPM.exec(text)
    if (!m?.[1] || !m[2]) return null
    return { hour: toHour24(Number(m[1]), m[2]), minute: 0 }
}

// An out-of-range H:MM is not a clock time
function findHhMm(text: string): ClockTime | null {
    const m = HHMM.exec(text)
    if (!m?.[1] || !m[2]) return null
    const hour = Number(m[1])
    const minute = Number(m[2])
    if (hour > 23 || minute > 59) return null
    return { hour, minute }
}

function findClockTime(text: string): ClockTime | null {
    return findAmPm(text) ?? findHhMm(text)
}

function at(base: Date, time: ClockTime): Date {
    const d = new Date(base)
    d.setHours(time.hour, time.minute, 0, 0)
    return d
}

function addDays(base: Date, days: number): Date {
    const d = new Date(base)
    d.setDate(d.getDate() + days)
    return d
}

// Today's occurrence if it is still ahead of `now`, otherwise tomorrow's
function nextOccurrence(now: Date, time: ClockTime): Date {
    const candidate = at(now, time)
    return candidate.getTime() > now.getTime() ? candidate : addDays(candidate, 1)
}

function parseAbsolute(text: string): Date | null {
    const m = DATE_TIME.exec(text)
    if (!m) return null
    const [year = 0, month = 0, day = 0, hour = 0, minute = 0] = m.slice(1).map(Number)
    if (hour > 23 || minute > 59) return null

    const d = new Date(year, month - 1, day, hour, minute, 0, 0)
    // Reject calendar overflow such as 2025-02-30
    if (d.getFullYear() !== year || d.getMonth() !== month - 1 || d.getDate() !== day) return null
    return d
}

// Dates past the JS range (e.g. "in 9999999999999 hours") are Invalid Date, not a time
export function parseNaturalTime(input: string, now: Date = new Date()): Date | null {
    const d = applyRules(input.trim(), now)
    return d && !Number.isNaN(d.getTime()) ? d : null
}

function applyRules(text: string, now: Date): Date | null {

    // 1. Absolute date time: YYYY-MM-DD HH:MM
    const absolute = parseAbsolute(text)
    if (absolute) return absolute

    // 2. in X minutes/hours
    const rel = IN_X.exec(text)
    if (rel?.[1] && rel[2]) {
        const unit = rel[2].toLowerCase().startsWith('minute') ? MINUTE_MS : HOUR_MS
        return new Date(now.getTime() + Number(rel[1]) * unit)
    }

    const lower = text.toLowerCase()

    // 3. tomorrow [at H(am|pm) | H:MM], 09:00 by default
    if (lower.includes('tomorrow')) {
        const base = addDays(now, 1)
        return at(base, findClockTime(lower) ?? { hour: 9, minute: 0 })
    }

    // 4. today / "at ..." with a clock time; without one, fall through
    if (lower.includes('today') || lower.startsWith('at ') || lower.includes(' at ')) {
        const time = findClockTime(lower)
        if (time) return nextOccurrence(now, time)
    }

    // 5. bare clock time
    const bare = findClockTime(lower)
    if (bare) return nextOccurrence(now, bare)

    return null
}

const pad = (n: number) => String(n).padStart(2, '0')

// ISO-8601 local time at minute precision, no zone: 2025-10-01T14:00
export function formatLocalTimestamp(d: Date): string {
    return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}T${pad(d.getHours())}:${pad(d.getMinutes())}`
}
