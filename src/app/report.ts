import { RESOURCES } from '../config/recruitConfig'
import { unitName } from '../config/units'
import { calcCitizenWait } from '../domain/estimate'
import { formatSeconds } from '../lib/time'
import type {
  AuditResult,
  CityId,
  Distribution,
  RecruitmentEstimate,
  RecruitmentOrder,
} from '../types/core'

const num = (value: number): string => Math.round(value).toLocaleString('en-US')

export function formatOrderSummary(order: RecruitmentOrder): string[] {
  const lines = ['Order:']
  let total = 0
  for (const [unitTypeId, qty] of order) {
    lines.push(`  ${unitName(unitTypeId)}: ${num(qty)}`)
    total += qty
  }
  lines.push(`  Total: ${num(total)} units`)
  return lines
}

export function formatDistribution(distribution: Distribution): string[] {
  const lines = ['Distribution:']
  for (const building of distribution.buildings) {
    if (building.assignments.size === 0) continue
    const units = [...building.assignments]
      .map(([unitTypeId, qty]) => `${unitName(unitTypeId)} x${num(qty)}`)
      .join(', ')
    const waiting = building.isBusy ? ' (WAITING)' : ''
    lines.push(
      `  ${building.cityName} #${building.position} lvl ${building.level}${waiting}: ${units} ~${formatSeconds(building.estimatedTimeSec)}`
    )
  }
  for (const unitTypeId of distribution.droppedUnitTypes) {
    lines.push(`  ${unitName(unitTypeId)}: no building can recruit it`)
  }
  return lines
}

/**
 * Missing citizens and resources per city; empty when nothing is short
 */
export function formatShortages(
  audit: AuditResult,
  cityNames: ReadonlyMap<CityId, string>,
  growthRates: ReadonlyMap<CityId, number>
): string[] {
  const lines: string[] = []
  const name = (cityId: CityId) => cityNames.get(cityId) ?? cityId

  for (const [cityId, missing] of audit.missingCitizens) {
    const rate = growthRates.get(cityId) ?? 0
    const wait = calcCitizenWait(missing, 0, rate)
    const eta = wait === null ? 'no growth' : `~${formatSeconds(wait)} at ${rate.toFixed(2)}/h`
    lines.push(`  ${name(cityId)}: ${num(missing)} citizens missing (${eta})`)
  }

  for (const [cityId, missing] of audit.missingResources) {
    const parts: string[] = []
    for (const resource of RESOURCES) {
      const amount = missing[resource]
      if (amount) parts.push(`${resource} ${num(amount)}`)
    }
    lines.push(`  ${name(cityId)}: missing ${parts.join(', ')}`)
  }

  for (const cityId of audit.unavailableCities) {
    lines.push(`  ${name(cityId)}: could not be read`)
  }

  return lines.length > 0 ? ['Shortages:', ...lines] : []
}

export function formatEstimate(estimate: RecruitmentEstimate): string[] {
  const lines = ['Estimate:']
  for (const city of estimate.byCity.values()) {
    const total = city.totalTimeSec === null ? 'unknown' : `~${formatSeconds(city.totalTimeSec)}`
    const citizens = `citizens ${num(city.citizensNeeded)}/${num(city.citizensAvailable)}`
    lines.push(`  ${city.cityName}: ${total} (${citizens}, build ${formatSeconds(city.buildTimeSec)})`)
  }

  const bottleneck = estimate.bottleneck === null ? undefined : estimate.byCity.get(estimate.bottleneck)
  if (estimate.totalTimeSec === null) {
    const reason = bottleneck ? ` (${bottleneck.cityName} has no population growth)` : ''
    lines.push(`Estimated completion: unknown${reason}`)
  } else {
    const reason = bottleneck ? ` (bottleneck: ${bottleneck.cityName})` : ''
    lines.push(`Estimated completion: ~${formatSeconds(estimate.totalTimeSec)}${reason}`)
  }
  return lines
}

export interface ReportInput {
  order: RecruitmentOrder
  distribution: Distribution
  audit: AuditResult
  estimate: RecruitmentEstimate
  growthRates: ReadonlyMap<CityId, number>
}

export function renderReport(input: ReportInput): string {
  const cityNames = new Map<CityId, string>()
  for (const building of input.distribution.buildings) {
    cityNames.set(building.cityId, building.cityName)
  }

  return [
    ...formatOrderSummary(input.order),
    ...formatDistribution(input.distribution),
    ...formatShortages(input.audit, cityNames, input.growthRates),
    ...formatEstimate(input.estimate),
  ].join('\n')
}
