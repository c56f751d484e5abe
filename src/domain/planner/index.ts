import { config } from '../../config/recruitConfig'
import type { RecruitPolicy } from '../../config/recruitConfig'
import { Logger } from '../../lib/logger'
import type {
  Building,
  Distribution,
  PlannedBuilding,
  RecruitmentOrder,
  UnitTypeId,
} from '../../types/core'

/**
 * Units per second; a non-positive build time counts as speed 1
 */
export function calcSpeed(timeSec: number): number {
  return timeSec > 0 ? 1 / timeSec : 1.0
}

/**
 * Split a quantity proportionally to speed. The last entry absorbs the
 * rounding remainder; with no speed at all the split is even.
 */
export function splitQuantity(total: number, speeds: number[]): number[] {
  const totalSpeed = speeds.reduce((sum, s) => sum + s, 0)

  if (totalSpeed === 0) {
    const perBuilding = Math.floor(total / speeds.length)
    const remainder = total % speeds.length
    return speeds.map((_, i) => perBuilding + (i < remainder ? 1 : 0))
  }

  let remaining = total
  return speeds.map((speed, i) => {
    if (i === speeds.length - 1) return remaining
    const qty = Math.floor(total * (speed / totalSpeed))
    remaining -= qty
    return qty
  })
}

/**
 * Estimated seconds until a building finishes its assignments, including
 * the per-order overhead and any queue it is already working through
 */
export function calcEstimatedTime(
  building: PlannedBuilding,
  policy: RecruitPolicy = config
): number {
  let total = 0
  for (const [unitTypeId, qty] of building.assignments) {
    const unit = building.units.get(unitTypeId)
    if (unit) total += unit.timeSec * qty
  }
  if (building.isBusy) {
    total += building.queueRemainingSec
  }
  total += policy.distribution.orderOverheadSec * building.assignments.size
  return total
}

function moveUnits(from: PlannedBuilding, to: PlannedBuilding, maxMove: number): boolean {
  for (const [unitTypeId, qty] of from.assignments) {
    if (!to.units.has(unitTypeId)) continue
    if (qty <= 1) continue

    const moveQty = Math.min(maxMove, qty - 1)
    from.assignments.set(unitTypeId, qty - moveQty)
    to.assignments.set(unitTypeId, (to.assignments.get(unitTypeId) ?? 0) + moveQty)
    return true
  }
  return false
}

/**
 * Greedy skew reduction: repeatedly shift a batch of one shared unit type
 * from the slowest building to the fastest one until the spread is within
 * tolerance, nothing can move, or the iteration cap is hit. Not globally
 * optimal. Ties go to the first building in list order.
 *
 * Returns the number of moves made.
 */
export function balanceDistribution(
  buildings: PlannedBuilding[],
  order: RecruitmentOrder,
  policy: RecruitPolicy = config
): number {
  const { toleranceSec, maxIterations, maxMoveUnits } = policy.distribution
  const participants = buildings.filter((b) =>
    [...order.keys()].some((unitTypeId) => b.units.has(unitTypeId))
  )
  let moves = 0

  for (let iteration = 0; iteration < maxIterations && participants.length > 0; iteration++) {
    const times = participants.map((b) => calcEstimatedTime(b, policy))
    const maxTime = Math.max(...times)
    const minTime = Math.min(...times)

    if (maxTime - minTime <= toleranceSec) break

    const slowest = participants[times.indexOf(maxTime)]
    const fastest = participants[times.indexOf(minTime)]
    if (!moveUnits(slowest, fastest, maxMoveUnits)) break
    moves++
  }

  for (const building of buildings) {
    building.estimatedTimeSec = calcEstimatedTime(building, policy)
  }
  return moves
}

/**
 * Distribute an order over the buildings proportionally to their build speed,
 * then balance completion times. Returns null when nothing can be planned.
 */
export function planDistribution(
  buildings: readonly Building[],
  order: RecruitmentOrder,
  policy: RecruitPolicy = config
): Distribution | null {
  if (buildings.length === 0 || order.size === 0) return null

  const planned: PlannedBuilding[] = buildings.map((b) => ({
    ...b,
    assignments: new Map<UnitTypeId, number>(),
    estimatedTimeSec: 0,
  }))
  const droppedUnitTypes: UnitTypeId[] = []
  let placedTypes = 0

  for (const [unitTypeId, totalQty] of order) {
    if (totalQty <= 0) continue

    const capable = planned.filter((b) => b.units.has(unitTypeId))
    if (capable.length === 0) {
      droppedUnitTypes.push(unitTypeId)
      Logger.add('unit_type_unplaceable', { unitTypeId, quantity: totalQty }, 'warn')
      continue
    }

    const speeds = capable.map((b) => calcSpeed(b.units.get(unitTypeId)?.timeSec ?? 0))
    const quantities = splitQuantity(totalQty, speeds)
    capable.forEach((building, i) => {
      if (quantities[i] > 0) {
        building.assignments.set(unitTypeId, quantities[i])
      }
    })
    placedTypes++
  }

  if (placedTypes === 0) {
    Logger.add('distribution_failed', { requested: [...order.keys()] }, 'error')
    return null
  }

  const moves = balanceDistribution(planned, order, policy)
  Logger.add('distribution_planned', {
    buildings: planned.filter((b) => b.assignments.size > 0).length,
    moves,
    dropped: droppedUnitTypes,
  })

  return { buildings: planned, droppedUnitTypes }
}

export function totalAssigned(distribution: Distribution, unitTypeId: UnitTypeId): number {
  return distribution.buildings.reduce((sum, b) => sum + (b.assignments.get(unitTypeId) ?? 0), 0)
}
