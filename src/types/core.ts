import type { BuildingKind, CostKey, Resource } from '../config/recruitConfig'

export type UnitTypeId = number
export type CityId = string

export type CostVector = Record<CostKey, number>

export interface UnitCost extends CostVector {
  name: string
  upkeep: number
  timeSec: number
}

/**
 * Requested quantity per unit type, in entry order
 */
export type RecruitmentOrder = ReadonlyMap<UnitTypeId, number>

export interface City {
  id: CityId
  name: string
}

export interface Building {
  cityId: CityId
  cityName: string
  position: number
  kind: BuildingKind
  level: number
  isBusy: boolean
  queueRemainingSec: number
  units: ReadonlyMap<UnitTypeId, UnitCost>
  actionToken: string | null
}

export interface PlannedBuilding extends Building {
  assignments: Map<UnitTypeId, number>
  estimatedTimeSec: number
}

export interface Distribution {
  buildings: PlannedBuilding[]
  droppedUnitTypes: UnitTypeId[]
}

export type CitySnapshot = CostVector

export interface AuditResult {
  canFulfill: boolean
  missingResources: Map<CityId, Partial<Record<Resource, number>>>
  missingCitizens: Map<CityId, number>
  available: Map<CityId, CitySnapshot>
  /** Cities whose snapshot could not be read */
  unavailableCities: CityId[]
}

export interface CityEstimate {
  cityName: string
  citizensNeeded: number
  citizensAvailable: number
  growthRate: number
  /** null when citizens are missing and the growth rate is unknown */
  citizenWaitSec: number | null
  buildTimeSec: number
  totalTimeSec: number | null
}

export interface RecruitmentEstimate {
  byCity: Map<CityId, CityEstimate>
  totalTimeSec: number | null
  bottleneck: CityId | null
}
