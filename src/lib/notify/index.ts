import { describeError } from '../errors'
import { Logger } from '../logger'
import type { Notifier } from '../../types/provider'

/**
 * Deliver a notification; delivery failures are logged and never reach the caller
 */
export async function safeNotify(notifier: Notifier | undefined, message: string): Promise<void> {
  if (!notifier) return
  try {
    await notifier.notify(message)
  } catch (error) {
    Logger.add('notify_failed', { message, reason: describeError(error) }, 'error')
  }
}

/**
 * Notifier that only records into the log buffer, for runs without a channel
 */
export const logNotifier: Notifier = {
  async notify(message) {
    Logger.add('notification', { message })
  },
}
