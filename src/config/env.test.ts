import { describe, it, expect } from 'vitest'
import { loadConfig } from './env'
import { config } from './recruitConfig'
import { ConfigError } from '../lib/errors'

describe('loadConfig', () => {
  it('uses the built-in policy when nothing is set', () => {
    const loaded = loadConfig({})

    expect(loaded.policy).toEqual(config)
    expect(loaded.logLevel).toBe('info')
  })

  it('applies overrides and leaves other values alone', () => {
    const loaded = loadConfig({
      RECRUIT_THRESHOLD_RATIO: '0.5',
      RECRUIT_BACKOFF_SEC: '120',
      RECRUIT_LOG_LEVEL: 'warn',
      PATH: '/usr/bin',
    })

    expect(loaded.policy.threshold.minFulfillmentRatio).toBe(0.5)
    expect(loaded.policy.loop).toEqual({ backoffSec: 120, cycleSec: 60, stallNotifyCycles: 12 })
    expect(loaded.logLevel).toBe('warn')
  })

  it('accepts a zero order overhead', () => {
    expect(loadConfig({ RECRUIT_ORDER_OVERHEAD_SEC: '0' }).policy.distribution.orderOverheadSec).toBe(0)
  })

  it('rejects values that are not numbers', () => {
    expect(() => loadConfig({ RECRUIT_CYCLE_SEC: 'soon' })).toThrow(ConfigError)
  })

  it('rejects a ratio above 1', () => {
    expect(() => loadConfig({ RECRUIT_THRESHOLD_RATIO: '1.5' })).toThrow(/RECRUIT_THRESHOLD_RATIO/)
  })
})
