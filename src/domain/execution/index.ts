import { config } from '../../config/recruitConfig'
import type { RecruitPolicy } from '../../config/recruitConfig'
import { addCost, emptyCost, maxAffordable, scaleCost, subtractCost } from '../costs'
import { fetchSnapshots } from '../audit'
import { fetchGrowthRates, refreshBuilding } from '../discovery'
import { TokenExpiredError, isRecoverable } from '../../lib/errors'
import { Logger } from '../../lib/logger'
import { safeNotify } from '../../lib/notify'
import { formatSeconds, isAbortError, sleep as defaultSleep } from '../../lib/time'
import type { Sleep } from '../../lib/time'
import type {
  AuditResult,
  CityId,
  CitySnapshot,
  CostVector,
  Distribution,
  PlannedBuilding,
  UnitCost,
  UnitTypeId,
} from '../../types/core'
import type { GameDataProvider, Notifier } from '../../types/provider'

export type ExecutionMode = 'immediate' | 'loop'

export interface ExecutionBuilding extends PlannedBuilding {
  remaining: Map<UnitTypeId, number>
}

export interface BuildingEvaluation {
  toRecruit: Map<UnitTypeId, number>
  total: number
  threshold: number
  remainingUnits: number
  cost: CostVector
}

export interface OrderResult {
  cityId: CityId
  cityName: string
  position: number
  units: number
  success: boolean
}

export interface ImmediateResult {
  success: boolean
  results: OrderResult[]
}

export interface LoopProgress {
  cycle: number
  placedThisCycle: number
  unitsPlaced: number
  unitsRemaining: number
}

export interface LoopOptions {
  policy?: RecruitPolicy
  sleep?: Sleep
  signal?: AbortSignal
  notifier?: Notifier
  /** Fetched from the provider when not given */
  growthRates?: ReadonlyMap<CityId, number>
  onStatus?: (status: string) => void
  onProgress?: (progress: LoopProgress) => void
}

export interface LoopResult {
  outcome: 'completed' | 'cancelled'
  cycles: number
  unitsPlaced: number
  buildings: ExecutionBuilding[]
}

/**
 * Wait for the game whenever something is short or a building still has a queue
 */
export function selectExecutionMode(audit: AuditResult, distribution: Distribution): ExecutionMode {
  const hasShortage =
    audit.missingResources.size > 0 ||
    audit.missingCitizens.size > 0 ||
    audit.unavailableCities.length > 0
  const anyBusy = distribution.buildings.some((b) => b.assignments.size > 0 && b.isBusy)
  return hasShortage || anyBusy ? 'loop' : 'immediate'
}

export function createExecutionState(distribution: Distribution): ExecutionBuilding[] {
  return distribution.buildings.map((b) => ({
    ...b,
    assignments: new Map(b.assignments),
    remaining: new Map(b.assignments),
  }))
}

export function totalRemaining(buildings: readonly ExecutionBuilding[]): number {
  let total = 0
  for (const building of buildings) {
    for (const qty of building.remaining.values()) total += qty
  }
  return total
}

export function computeThreshold(remainingUnits: number, policy: RecruitPolicy = config): number {
  return Math.max(1, Math.floor(remainingUnits * policy.threshold.minFulfillmentRatio))
}

/**
 * How much of a building's remaining work the pool pays for right now.
 * Unit types are served in remaining order, each one shrinking the pool
 * the next one sees.
 */
export function evaluateBuilding(
  building: { remaining: ReadonlyMap<UnitTypeId, number>; units: ReadonlyMap<UnitTypeId, UnitCost> },
  available: CitySnapshot,
  policy: RecruitPolicy = config
): BuildingEvaluation {
  let working: CostVector = { ...available }
  let cost = emptyCost()
  const toRecruit = new Map<UnitTypeId, number>()
  let total = 0
  let remainingUnits = 0

  for (const [unitTypeId, needed] of building.remaining) {
    remainingUnits += needed
    const unit = building.units.get(unitTypeId)
    if (!unit) continue

    const qty = maxAffordable(unit, working, needed)
    if (qty > 0) {
      const spent = scaleCost(unit, qty)
      toRecruit.set(unitTypeId, qty)
      total += qty
      working = subtractCost(working, spent)
      cost = addCost(cost, spent)
    }
  }

  return { toRecruit, total, threshold: computeThreshold(remainingUnits, policy), remainingUnits, cost }
}

/**
 * Use the cached token or read a fresh one. Null when the building cannot be read.
 */
async function ensureToken(provider: GameDataProvider, building: PlannedBuilding): Promise<string | null> {
  if (building.actionToken) return building.actionToken

  const detail = await refreshBuilding(provider, building)
  building.actionToken = detail?.actionToken ?? null
  if (!building.actionToken) {
    Logger.add('token_unavailable', { cityId: building.cityId, position: building.position }, 'warn')
  }
  return building.actionToken
}

/**
 * Submit one order. Tokens are single use; a rejected token is replaced
 * once and the order retried.
 */
async function placeOrder(
  provider: GameDataProvider,
  building: PlannedBuilding,
  token: string,
  quantities: ReadonlyMap<UnitTypeId, number>
): Promise<boolean> {
  let current: string | null = token

  for (let attempt = 0; attempt < 2; attempt++) {
    if (!current) return false
    building.actionToken = null
    try {
      await provider.submitOrder(building.cityId, building.position, current, quantities)
      return true
    } catch (error) {
      if (error instanceof TokenExpiredError && attempt === 0) {
        Logger.add('token_rejected', { cityId: building.cityId, position: building.position }, 'warn')
        current = await ensureToken(provider, building)
        continue
      }
      if (!isRecoverable(error) && !(error instanceof TokenExpiredError)) throw error
      Logger.add(
        'order_failed',
        { cityId: building.cityId, position: building.position, reason: error.message },
        'warn'
      )
      return false
    }
  }
  return false
}

function sumUnits(quantities: ReadonlyMap<UnitTypeId, number>): number {
  let total = 0
  for (const qty of quantities.values()) total += qty
  return total
}

/**
 * Place every building's full assignment in one go
 */
export async function executeImmediate(
  provider: GameDataProvider,
  distribution: Distribution
): Promise<ImmediateResult> {
  const results: OrderResult[] = []

  for (const building of distribution.buildings) {
    if (building.assignments.size === 0) continue

    const units = sumUnits(building.assignments)
    const token = await ensureToken(provider, building)
    const success = token !== null && (await placeOrder(provider, building, token, building.assignments))

    Logger.add(
      success ? 'order_submitted' : 'order_skipped',
      { cityId: building.cityId, position: building.position, units },
      success ? 'info' : 'warn'
    )
    results.push({
      cityId: building.cityId,
      cityName: building.cityName,
      position: building.position,
      units,
      success,
    })
  }

  return { success: results.every((r) => r.success), results }
}

function citizenEta(
  buildings: readonly ExecutionBuilding[],
  pools: ReadonlyMap<CityId, CitySnapshot>,
  growthRates: ReadonlyMap<CityId, number>
): number | null {
  let needed = 0
  const cityIds = new Set<CityId>()
  for (const building of buildings) {
    if (building.remaining.size === 0) continue
    cityIds.add(building.cityId)
    for (const [unitTypeId, qty] of building.remaining) {
      needed += (building.units.get(unitTypeId)?.citizens ?? 0) * qty
    }
  }

  let available = 0
  let growth = 0
  for (const cityId of cityIds) {
    available += pools.get(cityId)?.citizens ?? 0
    growth += growthRates.get(cityId) ?? 0
  }

  const deficit = needed - available
  if (deficit <= 0 || growth <= 0) return null
  return (deficit / growth) * 3600
}

/**
 * Place the distribution piece by piece as citizens and resources allow.
 * Runs until everything is placed or the signal fires; there is no timeout.
 */
export async function runRecruitmentLoop(
  provider: GameDataProvider,
  distribution: Distribution,
  options: LoopOptions = {}
): Promise<LoopResult> {
  const policy = options.policy ?? config
  const sleep = options.sleep ?? defaultSleep
  const { signal, notifier } = options
  const report = (status: string) => {
    Logger.add('loop_status', { status })
    options.onStatus?.(status)
  }

  const buildings = createExecutionState(distribution)
  const growthRates =
    options.growthRates ?? (await fetchGrowthRates(provider, new Set(buildings.map((b) => b.cityId))))
  const thresholdPct = Math.round(policy.threshold.minFulfillmentRatio * 100)

  let cycles = 0
  let unitsPlaced = 0
  let emptyStreak = 0
  const result = (outcome: LoopResult['outcome']): LoopResult => ({ outcome, cycles, unitsPlaced, buildings })
  const cancelled = () => {
    report('Recruitment cancelled')
    return result('cancelled')
  }

  try {
    for (;;) {
      const remainingBefore = totalRemaining(buildings)
      if (remainingBefore === 0) {
        report('Recruitment complete!')
        await safeNotify(notifier, `Auto recruitment completed: ${unitsPlaced} units placed`)
        return result('completed')
      }
      if (signal?.aborted) return cancelled()

      cycles++
      const active = buildings.filter((b) => b.remaining.size > 0)
      const pools = await fetchSnapshots(provider, active.map((b) => b.cityId))
      const eta = citizenEta(buildings, pools, growthRates)
      let placedThisCycle = 0
      let metThreshold = false

      for (const building of active) {
        if (signal?.aborted) return cancelled()

        if (!pools.has(building.cityId)) continue

        if (building.isBusy) {
          const detail = await refreshBuilding(provider, building)
          if (detail) {
            building.isBusy = detail.isBusy
            building.queueRemainingSec = detail.queueRemainingSec
            building.actionToken = detail.actionToken
          }
          if (building.isBusy) continue
        }

        const pool = pools.get(building.cityId) ?? emptyCost()
        const evaluation = evaluateBuilding(building, pool, policy)
        if (evaluation.total < evaluation.threshold) {
          Logger.add('below_threshold', {
            cityId: building.cityId,
            position: building.position,
            affordable: evaluation.total,
            threshold: evaluation.threshold,
          })
          continue
        }
        metThreshold = true

        const token = await ensureToken(provider, building)
        if (!token) continue

        pools.set(building.cityId, subtractCost(pool, evaluation.cost))
        if (!(await placeOrder(provider, building, token, evaluation.toRecruit))) continue

        for (const [unitTypeId, qty] of evaluation.toRecruit) {
          const left = (building.remaining.get(unitTypeId) ?? 0) - qty
          if (left > 0) {
            building.remaining.set(unitTypeId, left)
          } else {
            building.remaining.delete(unitTypeId)
          }
        }
        building.isBusy = true
        placedThisCycle += evaluation.total

        Logger.add('order_submitted', {
          cityId: building.cityId,
          position: building.position,
          units: evaluation.total,
          percentOfRemaining: Math.round((evaluation.total / evaluation.remainingUnits) * 100),
        })
      }

      unitsPlaced += placedThisCycle
      const unitsRemaining = totalRemaining(buildings)
      options.onProgress?.({ cycle: cycles, placedThisCycle, unitsPlaced, unitsRemaining })

      if (placedThisCycle === 0) {
        emptyStreak++
        const anyBusy = active.some((b) => b.isBusy)
        let status = anyBusy
          ? `Waiting for queues... ${remainingBefore} units remaining`
          : `Waiting for ${thresholdPct}% threshold... ${remainingBefore} units remaining`
        if (eta !== null) status += ` (~${formatSeconds(eta)} for citizens)`
        report(status)

        if (emptyStreak === policy.loop.stallNotifyCycles) {
          Logger.add('loop_stalled', { cycles: emptyStreak, unitsRemaining }, 'warn')
          await safeNotify(
            notifier,
            `Auto recruitment: no building reached its threshold for ${emptyStreak} cycles, ${unitsRemaining} units still waiting`
          )
        }
      } else {
        emptyStreak = 0
        let status = `Recruiting ${placedThisCycle}/${remainingBefore} units`
        if (eta !== null && remainingBefore > placedThisCycle) status += ` (~${formatSeconds(eta)} remaining)`
        report(status)
      }

      // A building that met its threshold is retried soon even if its order did not go through
      const waitSec = metThreshold ? policy.loop.cycleSec : policy.loop.backoffSec

      if (signal?.aborted) return cancelled()
      await sleep(waitSec, signal)
    }
  } catch (error) {
    if (isAbortError(error)) return cancelled()
    throw error
  }
}
