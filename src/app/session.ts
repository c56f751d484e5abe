import { config } from '../config/recruitConfig'
import type { BuildingKind, RecruitPolicy } from '../config/recruitConfig'
import { auditResources } from '../domain/audit'
import { excludeCities, fetchBuildingDetails, fetchGrowthRates, findBuildings } from '../domain/discovery'
import type { BuildingLocation, DetailScan } from '../domain/discovery'
import { estimateRecruitmentTime } from '../domain/estimate'
import {
  executeImmediate,
  runRecruitmentLoop,
  selectExecutionMode,
  totalRemaining,
  createExecutionState,
} from '../domain/execution'
import type { ExecutionMode } from '../domain/execution'
import { planDistribution } from '../domain/planner'
import { describeError } from '../lib/errors'
import { Logger } from '../lib/logger'
import { safeNotify } from '../lib/notify'
import type { Sleep } from '../lib/time'
import type { AuditResult, CityId, Distribution, RecruitmentEstimate, RecruitmentOrder } from '../types/core'
import type { GameDataProvider, Notifier } from '../types/provider'
import { renderReport } from './report'
import { runStore } from './store'
import type { RunStoreApi } from './store'

export interface RecruitRequest {
  kind: BuildingKind
  order: RecruitmentOrder
  excludedCities?: ReadonlySet<CityId>
  /** Plan busy buildings too and wait for their queues; otherwise leave them out */
  waitForBusy?: boolean
}

export interface PreparedRun {
  request: RecruitRequest
  distribution: Distribution
  audit: AuditResult
  growthRates: Map<CityId, number>
  estimate: RecruitmentEstimate
  mode: ExecutionMode
  failedBuildings: BuildingLocation[]
  report: string
}

export type RunOutcome =
  | { outcome: 'completed' | 'cancelled'; unitsPlaced: number }
  | { outcome: 'failed'; unitsPlaced: number; error: unknown }

export interface SessionOptions {
  policy?: RecruitPolicy
  notifier?: Notifier
  sleep?: Sleep
  signal?: AbortSignal
  store?: RunStoreApi
}

/**
 * Plan an order over already scanned buildings and work out what it will
 * take. Null when no building can take any of the ordered units.
 */
export async function planRun(
  provider: GameDataProvider,
  request: RecruitRequest,
  scan: DetailScan,
  policy: RecruitPolicy = config
): Promise<PreparedRun | null> {
  const candidates = request.waitForBusy ? [...scan.ready, ...scan.busy] : scan.ready
  if (!request.waitForBusy && scan.busy.length > 0) {
    Logger.add('busy_buildings_ignored', { count: scan.busy.length })
  }

  const distribution = planDistribution(candidates, request.order, policy)
  if (!distribution) return null

  const audit = await auditResources(provider, distribution)
  const growthRates = await fetchGrowthRates(
    provider,
    distribution.buildings.filter((b) => b.assignments.size > 0).map((b) => b.cityId)
  )
  const estimate = estimateRecruitmentTime(distribution, audit.available, growthRates, policy)
  const mode = selectExecutionMode(audit, distribution)

  return {
    request,
    distribution,
    audit,
    growthRates,
    estimate,
    mode,
    failedBuildings: scan.failed,
    report: renderReport({ order: request.order, distribution, audit, estimate, growthRates }),
  }
}

/**
 * Discover buildings of the requested kind and plan the order over them
 */
export async function prepareRun(
  provider: GameDataProvider,
  request: RecruitRequest,
  policy: RecruitPolicy = config
): Promise<PreparedRun | null> {
  const cities = await provider.listCities()
  const found = excludeCities(
    await findBuildings(provider, cities, request.kind),
    request.excludedCities ?? new Set()
  )
  return planRun(provider, request, await fetchBuildingDetails(provider, found), policy)
}

export function describeRun(run: PreparedRun): string {
  const buildings = run.distribution.buildings.filter((b) => b.assignments.size > 0).length
  const units = totalRemaining(createExecutionState(run.distribution))
  const noun = run.request.kind === 'barracks' ? 'barracks' : buildings === 1 ? 'shipyard' : 'shipyards'
  return `${units} units over ${buildings} ${noun}`
}

/**
 * Buildings whose immediate order did not go through, ready for the loop
 */
function unplacedPart(distribution: Distribution, failed: ReadonlySet<string>): Distribution {
  return {
    buildings: distribution.buildings.filter((b) => failed.has(`${b.cityId}/${b.position}`)),
    droppedUnitTypes: [],
  }
}

/**
 * Run a prepared plan to the end. Errors are reported through the notifier
 * and the provider session is always closed.
 */
export async function runRecruitment(
  provider: GameDataProvider,
  run: PreparedRun,
  options: SessionOptions = {}
): Promise<RunOutcome> {
  const store = options.store ?? runStore
  const { notifier } = options
  const info = describeRun(run)
  const total = totalRemaining(createExecutionState(run.distribution))
  let unitsPlaced = 0

  store.getState().setInfo(info)
  store.getState().setPhase('running')
  Logger.add('run_started', { info, mode: run.mode })

  try {
    let pending = run.distribution
    if (run.mode === 'immediate') {
      const immediate = await executeImmediate(provider, run.distribution)
      const failed = new Set<string>()
      for (const r of immediate.results) {
        if (r.success) {
          unitsPlaced += r.units
        } else {
          failed.add(`${r.cityId}/${r.position}`)
        }
      }
      store.getState().recordProgress({
        cycle: 1,
        placedThisCycle: unitsPlaced,
        unitsPlaced,
        unitsRemaining: total - unitsPlaced,
      })

      if (immediate.success) {
        store.getState().setStatus('Recruitment complete!')
        store.getState().setPhase('completed')
        await safeNotify(notifier, `Auto recruitment completed: ${unitsPlaced} units placed`)
        return { outcome: 'completed', unitsPlaced }
      }
      Logger.add('immediate_incomplete', { failed: [...failed] }, 'warn')
      pending = unplacedPart(run.distribution, failed)
    }

    const loop = await runRecruitmentLoop(provider, pending, {
      policy: options.policy,
      sleep: options.sleep,
      signal: options.signal,
      notifier,
      growthRates: run.growthRates,
      onStatus: (status) => store.getState().setStatus(status),
      onProgress: (progress) =>
        store.getState().recordProgress({
          ...progress,
          unitsPlaced: unitsPlaced + progress.unitsPlaced,
        }),
    })
    unitsPlaced += loop.unitsPlaced
    store.getState().setPhase(loop.outcome)
    return { outcome: loop.outcome, unitsPlaced }
  } catch (error) {
    store.getState().setPhase('failed')
    Logger.add('run_failed', { info, reason: describeError(error) }, 'error')
    await safeNotify(notifier, `Auto recruitment failed: ${info}\n${describeError(error)}`)
    return { outcome: 'failed', unitsPlaced, error }
  } finally {
    try {
      await provider.logout()
    } catch (error) {
      Logger.add('logout_failed', { reason: describeError(error) }, 'error')
    }
  }
}
