import { setTimeout as delay } from 'node:timers/promises'
import { intervalToDuration } from 'date-fns'

/**
 * Accrue `rate` per second from lastTs to currentTimeSec, capped at maxStore
 * Returns: { accrued, newStore, overflow }
 */
export function accrueSince(
  lastTs: number,
  rate: number,
  maxStore: number,
  currentStore: number,
  currentTimeSec: number
): { accrued: number; newStore: number; overflow: number } {
  const elapsed = currentTimeSec - lastTs
  if (elapsed <= 0) {
    return { accrued: 0, newStore: currentStore, overflow: 0 }
  }

  const rawAccrued = rate * elapsed
  const newStore = Math.min(currentStore + rawAccrued, maxStore)
  const overflow = Math.max(0, currentStore + rawAccrued - maxStore)

  return {
    accrued: newStore - currentStore,
    newStore,
    overflow,
  }
}

/**
 * Format seconds as "1h 2m 5s"
 */
export function formatSeconds(seconds: number): string {
  const whole = Math.floor(seconds)
  if (!Number.isFinite(whole) || whole <= 0) return '0s'

  const d = intervalToDuration({ start: 0, end: whole * 1000 })
  const parts: string[] = []
  if (d.years) parts.push(`${d.years}y`)
  if (d.months) parts.push(`${d.months}mo`)
  if (d.days) parts.push(`${d.days}d`)
  if (d.hours) parts.push(`${d.hours}h`)
  if (d.minutes) parts.push(`${d.minutes}m`)
  if (d.seconds || parts.length === 0) parts.push(`${d.seconds ?? 0}s`)

  return parts.join(' ')
}

export type Sleep = (seconds: number, signal?: AbortSignal) => Promise<void>

/**
 * Wait the given number of seconds; rejects with an AbortError when the signal fires
 */
export const sleep: Sleep = async (seconds, signal) => {
  await delay(seconds * 1000, undefined, { signal })
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError'
}
