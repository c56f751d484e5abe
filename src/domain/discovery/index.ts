import type { BuildingKind } from '../../config/recruitConfig'
import { DataError, isRecoverable } from '../../lib/errors'
import { Logger } from '../../lib/logger'
import type { Building, City, CityId } from '../../types/core'
import type { BuildingDetail, GameDataProvider } from '../../types/provider'

export interface BuildingLocation {
  cityId: CityId
  cityName: string
  position: number
  kind: BuildingKind
  level: number
  isBusy: boolean
}

export interface CitySummary {
  cityId: CityId
  cityName: string
  count: number
  levels: number[]
}

export interface DetailScan {
  ready: Building[]
  busy: Building[]
  failed: BuildingLocation[]
}

/**
 * Tried in order against the town hall population display; first match wins
 */
const GROWTH_PATTERNS = [
  /population[_\s]?growth[^0-9]*?([\d,.]+)\s*(?:citizens?)?\s*\/\s*h/i,
  /growth[^0-9]*?([\d,.]+)\s*(?:citizens?)?\s*\/\s*h/i,
  /citizens?\s*\/\s*h[^0-9]*?([\d,.]+)/i,
  /(\d+[.,]?\d*)\s*citizens?\s*\/\s*h/i,
]

/**
 * Extract citizens per hour from a population display; 0 when nothing matches
 */
export function parseGrowthRate(text: string): number {
  for (const pattern of GROWTH_PATTERNS) {
    const match = pattern.exec(text)
    if (!match) continue
    const rate = Number.parseFloat(match[1].replace(/,/g, '.'))
    if (Number.isFinite(rate)) return rate
  }
  return 0
}

/**
 * Scan every city for production buildings of one kind
 */
export async function findBuildings(
  provider: GameDataProvider,
  cities: City[],
  kind: BuildingKind
): Promise<BuildingLocation[]> {
  const found: BuildingLocation[] = []

  for (const city of cities) {
    try {
      const buildings = await provider.listBuildings(city.id)
      for (const b of buildings) {
        if (b.kind !== kind) continue
        found.push({
          cityId: city.id,
          cityName: city.name,
          position: b.position,
          kind: b.kind,
          level: b.level,
          isBusy: b.isBusy,
        })
      }
    } catch (error) {
      if (!isRecoverable(error)) throw error
      Logger.add('city_scan_failed', { cityId: city.id, reason: error.message }, 'warn')
    }
  }

  return found
}

/**
 * Group buildings per city, in the order the cities were scanned
 */
export function summarizeCities(locations: BuildingLocation[]): CitySummary[] {
  const byCity = new Map<CityId, CitySummary>()
  for (const location of locations) {
    const summary = byCity.get(location.cityId) ?? {
      cityId: location.cityId,
      cityName: location.cityName,
      count: 0,
      levels: [],
    }
    summary.count++
    summary.levels.push(location.level)
    byCity.set(location.cityId, summary)
  }
  for (const summary of byCity.values()) {
    summary.levels.sort((a, b) => a - b)
  }
  return [...byCity.values()]
}

export function excludeCities(
  locations: BuildingLocation[],
  ignored: ReadonlySet<CityId>
): BuildingLocation[] {
  return locations.filter((l) => !ignored.has(l.cityId))
}

async function readDetail(
  provider: GameDataProvider,
  location: BuildingLocation
): Promise<BuildingDetail> {
  const detail = await provider.fetchBuildingDetail(location.cityId, location.position, location.kind)
  if (detail.units.size === 0) {
    throw new DataError(`No cost table in ${location.kind} of ${location.cityName}`)
  }
  return detail
}

/**
 * Fetch cost tables and queue state for every building. Buildings that
 * cannot be read are reported as failed and left out of planning.
 */
export async function fetchBuildingDetails(
  provider: GameDataProvider,
  locations: BuildingLocation[]
): Promise<DetailScan> {
  const scan: DetailScan = { ready: [], busy: [], failed: [] }

  for (const location of locations) {
    try {
      const detail = await readDetail(provider, location)
      const building: Building = {
        ...location,
        units: detail.units,
        isBusy: detail.isBusy || location.isBusy,
        queueRemainingSec: detail.queueRemainingSec,
        actionToken: detail.actionToken,
      }
      if (building.isBusy) {
        scan.busy.push(building)
      } else {
        scan.ready.push(building)
      }
    } catch (error) {
      if (!isRecoverable(error)) throw error
      Logger.add(
        'building_unavailable',
        { cityId: location.cityId, position: location.position, reason: error.message },
        'warn'
      )
      scan.failed.push(location)
    }
  }

  return scan
}

/**
 * Re-read a building's queue state and token. Null when it cannot be read
 * this time.
 */
export async function refreshBuilding(
  provider: GameDataProvider,
  building: Pick<Building, 'cityId' | 'position' | 'kind'>
): Promise<BuildingDetail | null> {
  try {
    return await provider.fetchBuildingDetail(building.cityId, building.position, building.kind)
  } catch (error) {
    if (!isRecoverable(error)) throw error
    Logger.add(
      'building_refresh_failed',
      { cityId: building.cityId, position: building.position, reason: error.message },
      'warn'
    )
    return null
  }
}

/**
 * Growth rates per city; a city whose rate cannot be read counts as 0
 */
export async function fetchGrowthRates(
  provider: GameDataProvider,
  cityIds: Iterable<CityId>
): Promise<Map<CityId, number>> {
  const rates = new Map<CityId, number>()
  for (const cityId of cityIds) {
    if (rates.has(cityId)) continue
    try {
      rates.set(cityId, await provider.fetchGrowthRate(cityId))
    } catch (error) {
      if (!isRecoverable(error)) throw error
      Logger.add('growth_rate_unavailable', { cityId, reason: error.message }, 'warn')
      rates.set(cityId, 0)
    }
  }
  return rates
}
