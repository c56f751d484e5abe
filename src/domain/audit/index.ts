import { addCost, emptyCost, resourceShortage, scaleCost } from '../costs'
import { isRecoverable } from '../../lib/errors'
import { Logger } from '../../lib/logger'
import type { AuditResult, CityId, CitySnapshot, CostVector, Distribution } from '../../types/core'
import type { GameDataProvider } from '../../types/provider'

/**
 * Sum the cost of every planned assignment per city. Cities with no
 * assignment have no requirement.
 */
export function computeRequirements(distribution: Distribution): Map<CityId, CostVector> {
  const requirements = new Map<CityId, CostVector>()

  for (const building of distribution.buildings) {
    if (building.assignments.size === 0) continue
    let cityTotal = requirements.get(building.cityId) ?? emptyCost()
    for (const [unitTypeId, qty] of building.assignments) {
      const unit = building.units.get(unitTypeId)
      if (unit) {
        cityTotal = addCost(cityTotal, scaleCost(unit, qty))
      }
    }
    requirements.set(building.cityId, cityTotal)
  }

  return requirements
}

/**
 * Compare requirements against snapshots already read. Cities with no
 * snapshot are reported as unavailable.
 */
export function compareWithSnapshot(
  requirements: Map<CityId, CostVector>,
  snapshots: Map<CityId, CitySnapshot>
): AuditResult {
  const result: AuditResult = {
    canFulfill: true,
    missingResources: new Map(),
    missingCitizens: new Map(),
    available: new Map(),
    unavailableCities: [],
  }

  for (const [cityId, required] of requirements) {
    const available = snapshots.get(cityId)
    if (!available) {
      result.unavailableCities.push(cityId)
      result.canFulfill = false
      continue
    }
    result.available.set(cityId, available)

    if (required.citizens > available.citizens) {
      result.missingCitizens.set(cityId, required.citizens - available.citizens)
      result.canFulfill = false
    }

    const missing = resourceShortage(required, available)
    if (Object.keys(missing).length > 0) {
      result.missingResources.set(cityId, missing)
      result.canFulfill = false
    }
  }

  return result
}

/**
 * Read one snapshot per city that hosts a planned building
 */
export async function fetchSnapshots(
  provider: GameDataProvider,
  cityIds: Iterable<CityId>
): Promise<Map<CityId, CitySnapshot>> {
  const snapshots = new Map<CityId, CitySnapshot>()
  for (const cityId of cityIds) {
    if (snapshots.has(cityId)) continue
    try {
      snapshots.set(cityId, await provider.fetchCitySnapshot(cityId))
    } catch (error) {
      if (!isRecoverable(error)) throw error
      Logger.add('snapshot_unavailable', { cityId, reason: error.message }, 'warn')
    }
  }
  return snapshots
}

export async function auditResources(
  provider: GameDataProvider,
  distribution: Distribution
): Promise<AuditResult> {
  const requirements = computeRequirements(distribution)
  const snapshots = await fetchSnapshots(provider, requirements.keys())
  const result = compareWithSnapshot(requirements, snapshots)

  Logger.add('audit_complete', {
    cities: requirements.size,
    canFulfill: result.canFulfill,
    citizenShortages: result.missingCitizens.size,
    resourceShortages: result.missingResources.size,
  })
  return result
}
