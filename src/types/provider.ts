import type { BuildingKind } from '../config/recruitConfig'
import type { City, CityId, CitySnapshot, UnitCost, UnitTypeId } from './core'

export interface BuildingSummary {
  position: number
  kind: BuildingKind
  level: number
  isBusy: boolean
}

export interface BuildingDetail {
  units: ReadonlyMap<UnitTypeId, UnitCost>
  isBusy: boolean
  queueRemainingSec: number
  actionToken: string | null
}

/**
 * Everything the planner needs from the live game. Implementations throw
 * TransportError or DataError from lib/errors; submitOrder throws
 * TokenExpiredError when the game rejects the token.
 */
export interface GameDataProvider {
  listCities(): Promise<City[]>
  listBuildings(cityId: CityId): Promise<BuildingSummary[]>
  fetchBuildingDetail(cityId: CityId, position: number, kind: BuildingKind): Promise<BuildingDetail>
  fetchCitySnapshot(cityId: CityId): Promise<CitySnapshot>
  /** Citizens per hour, 0 when it cannot be determined */
  fetchGrowthRate(cityId: CityId): Promise<number>
  submitOrder(
    cityId: CityId,
    position: number,
    token: string,
    quantities: ReadonlyMap<UnitTypeId, number>
  ): Promise<void>
  logout(): Promise<void>
}

export interface Notifier {
  notify(message: string): Promise<void>
}
