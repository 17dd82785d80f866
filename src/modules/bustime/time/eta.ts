export const ETA_NOT_AVAILABLE = "N/A"
export const ETA_DEPARTED = "Departed"

/**
 * Countdown text for an expected arrival, rounded down to whole minutes
 * (89s is "in 1 minutes", 30s ago is already "Departed").
 */
export function computeEta(expected: Date | null, now: Date): string {
  if (!expected) {
    return ETA_NOT_AVAILABLE
  }

  const minutes = Math.floor((expected.getTime() - now.getTime()) / 60_000)
  return minutes >= 0 ? `in ${minutes} minutes` : ETA_DEPARTED
}
