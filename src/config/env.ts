import { z } from 'zod'
import { config } from './recruitConfig'
import type { RecruitPolicy } from './recruitConfig'
import { ConfigError } from '../lib/errors'
import type { LogLevel } from '../lib/logger'

const seconds = z.string().pipe(z.coerce.number().int().positive()).optional()
const count = z.string().pipe(z.coerce.number().int().positive()).optional()
const ratio = z.string().pipe(z.coerce.number().gt(0).lte(1)).optional()

const EnvSchema = z.object({
  RECRUIT_TOLERANCE_SEC: seconds,
  RECRUIT_MAX_ITERATIONS: count,
  RECRUIT_MAX_MOVE_UNITS: count,
  RECRUIT_ORDER_OVERHEAD_SEC: z.string().pipe(z.coerce.number().int().nonnegative()).optional(),
  RECRUIT_THRESHOLD_RATIO: ratio,
  RECRUIT_CITIZEN_WAIT_FACTOR: ratio,
  RECRUIT_BACKOFF_SEC: seconds,
  RECRUIT_CYCLE_SEC: seconds,
  RECRUIT_STALL_CYCLES: count,
  RECRUIT_LOG_LEVEL: z.enum(['info', 'warn', 'error', 'silent']).optional(),
})

export interface AppConfig {
  policy: RecruitPolicy
  logLevel: LogLevel | 'silent'
}

/**
 * Policy constants with RECRUIT_* overrides applied
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    throw new ConfigError(`Invalid environment: ${issues}`)
  }
  const e = parsed.data

  return {
    policy: {
      distribution: {
        toleranceSec: e.RECRUIT_TOLERANCE_SEC ?? config.distribution.toleranceSec,
        maxIterations: e.RECRUIT_MAX_ITERATIONS ?? config.distribution.maxIterations,
        maxMoveUnits: e.RECRUIT_MAX_MOVE_UNITS ?? config.distribution.maxMoveUnits,
        orderOverheadSec: e.RECRUIT_ORDER_OVERHEAD_SEC ?? config.distribution.orderOverheadSec,
      },
      threshold: {
        minFulfillmentRatio: e.RECRUIT_THRESHOLD_RATIO ?? config.threshold.minFulfillmentRatio,
      },
      estimate: {
        citizenWaitFactor: e.RECRUIT_CITIZEN_WAIT_FACTOR ?? config.estimate.citizenWaitFactor,
      },
      loop: {
        backoffSec: e.RECRUIT_BACKOFF_SEC ?? config.loop.backoffSec,
        cycleSec: e.RECRUIT_CYCLE_SEC ?? config.loop.cycleSec,
        stallNotifyCycles: e.RECRUIT_STALL_CYCLES ?? config.loop.stallNotifyCycles,
      },
    },
    logLevel: e.RECRUIT_LOG_LEVEL ?? 'info',
  }
}
