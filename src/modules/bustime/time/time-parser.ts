import { tz } from "@date-fns/tz"
import { format, isValid, parse, parseISO } from "date-fns"
import type {
  LogSink,
  ParsedTimestamp,
} from "../interfaces/arrival.interface"

export const DISPLAY_TIME_FORMAT = "MMMM dd, yyyy 'at' hh:mm a"

// The offset is only meaningful after a time component; a bare date such as
// 2024-06-01 must not have its day read as "-01".
const OFFSET_PATTERN =
  /[T ]\d{2}(?::?\d{2}){0,2}(?:[.,]\d+)?(Z|([+-])(\d{2})(?::?(\d{2}))?)$/i

function readOffsetMinutes(raw: string, instant: Date): number {
  const match = OFFSET_PATTERN.exec(raw)
  if (!match) {
    // No offset in the source: parseISO read it as local time
    return -instant.getTimezoneOffset()
  }

  const [, designator, sign, hours, minutes] = match
  if (designator.toUpperCase() === "Z") {
    return 0
  }

  const magnitude = parseInt(hours, 10) * 60 + parseInt(minutes ?? "0", 10)
  return sign === "-" ? -magnitude : magnitude
}

/**
 * Parses an ISO-8601 timestamp from the feed, keeping the offset it was
 * written in so it can be displayed as the provider intended.
 *
 * Returns null for a missing value. An unparsable value is logged and also
 * yields null; it never throws.
 */
export function parseTimestamp(
  raw: string | null | undefined,
  field: string,
  logger: LogSink,
  context?: string,
): ParsedTimestamp | null {
  if (!raw) {
    return null
  }

  const trimmed = raw.trim()
  const instant = parseISO(trimmed)
  if (!isValid(instant)) {
    logger.warn(
      `Error parsing ${field}${context ? ` for ${context}` : ""}: "${raw}" is not an ISO-8601 timestamp`,
    )
    return null
  }

  return { instant, offsetMinutes: readOffsetMinutes(trimmed, instant) }
}

// @date-fns/tz takes fixed offsets written as "+HH:MM"
function offsetZone(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? "-" : "+"
  const magnitude = Math.abs(offsetMinutes)
  const hours = String(Math.floor(magnitude / 60)).padStart(2, "0")
  const minutes = String(magnitude % 60).padStart(2, "0")

  return `${sign}${hours}:${minutes}`
}

/**
 * Formats a timestamp in its own offset, e.g. "June 01, 2024 at 02:05 PM".
 * The host's time zone plays no part.
 */
export function formatDisplayTime({
  instant,
  offsetMinutes,
}: ParsedTimestamp): string {
  return format(instant, DISPLAY_TIME_FORMAT, {
    in: tz(offsetZone(offsetMinutes)),
  })
}

/**
 * Reads back a string produced by {@link formatDisplayTime}. The display
 * format carries no offset, so the caller supplies the one it was written in.
 */
export function parseDisplayTime(
  text: string,
  offsetMinutes: number,
): ParsedTimestamp | null {
  const parsed = parse(text, DISPLAY_TIME_FORMAT, new Date(0), {
    in: tz(offsetZone(offsetMinutes)),
  })
  if (!isValid(parsed)) {
    return null
  }

  return { instant: new Date(parsed.getTime()), offsetMinutes }
}
