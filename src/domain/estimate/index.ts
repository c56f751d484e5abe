import { config } from '../../config/recruitConfig'
import type { RecruitPolicy } from '../../config/recruitConfig'
import type {
  CityEstimate,
  CityId,
  CitySnapshot,
  Distribution,
  RecruitmentEstimate,
} from '../../types/core'

/**
 * Seconds until a citizen deficit is covered by growth. Null when there is
 * a deficit and no growth to cover it.
 */
export function calcCitizenWait(needed: number, available: number, growthPerHour: number): number | null {
  if (needed <= available) return 0
  if (growthPerHour <= 0) return null
  return ((needed - available) / growthPerHour) * 3600
}

/**
 * Recruitment starts once most of the deficit is covered, so only part of
 * the citizen wait counts toward completion
 */
export function calcTotalTime(
  citizenWaitSec: number | null,
  buildTimeSec: number,
  policy: RecruitPolicy = config
): number | null {
  if (citizenWaitSec === null) return null
  return citizenWaitSec * policy.estimate.citizenWaitFactor + buildTimeSec
}

export function estimateRecruitmentTime(
  distribution: Distribution,
  available: ReadonlyMap<CityId, CitySnapshot>,
  growthRates: ReadonlyMap<CityId, number>,
  policy: RecruitPolicy = config
): RecruitmentEstimate {
  const byCity = new Map<CityId, CityEstimate>()

  for (const building of distribution.buildings) {
    const cityEstimate = byCity.get(building.cityId) ?? {
      cityName: building.cityName,
      citizensNeeded: 0,
      citizensAvailable: available.get(building.cityId)?.citizens ?? 0,
      growthRate: growthRates.get(building.cityId) ?? 0,
      citizenWaitSec: 0,
      buildTimeSec: 0,
      totalTimeSec: 0,
    }

    for (const [unitTypeId, qty] of building.assignments) {
      const unit = building.units.get(unitTypeId)
      if (!unit) continue
      cityEstimate.citizensNeeded += unit.citizens * qty
      cityEstimate.buildTimeSec += unit.timeSec * qty
    }
    cityEstimate.buildTimeSec += policy.distribution.orderOverheadSec * building.assignments.size

    byCity.set(building.cityId, cityEstimate)
  }

  let totalTimeSec: number | null = 0
  let bottleneck: CityId | null = null

  for (const [cityId, est] of byCity) {
    est.citizenWaitSec = calcCitizenWait(est.citizensNeeded, est.citizensAvailable, est.growthRate)
    est.totalTimeSec = calcTotalTime(est.citizenWaitSec, est.buildTimeSec, policy)

    if (totalTimeSec === null) continue
    if (est.totalTimeSec === null) {
      totalTimeSec = null
      bottleneck = cityId
    } else if (bottleneck === null || est.totalTimeSec > totalTimeSec) {
      totalTimeSec = est.totalTimeSec
      bottleneck = cityId
    }
  }

  return { byCity, totalTimeSec, bottleneck }
}
