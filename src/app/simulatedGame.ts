import type { BuildingKind } from '../config/recruitConfig'
import { addCost, emptyCost, scaleCost, subtractCost } from '../domain/costs'
import { parseGrowthRate } from '../domain/discovery'
import { DataError, TokenExpiredError, TransportError } from '../lib/errors'
import { Logger } from '../lib/logger'
import type { Scenario, ScenarioBuilding, ScenarioCity } from '../lib/persist'
import { accrueSince } from '../lib/time'
import type { City, CityId, CitySnapshot, CostVector, UnitCost, UnitTypeId } from '../types/core'
import type { BuildingDetail, BuildingSummary, GameDataProvider } from '../types/provider'

interface SimBuilding {
  position: number
  kind: BuildingKind
  level: number
  units: Map<UnitTypeId, UnitCost>
  queueEndsAt: number
  token: string | null
}

interface SimCity {
  id: CityId
  name: string
  citizens: number
  maxCitizens: number
  growthPerHour: number
  pool: CostVector
  buildings: SimBuilding[]
}

export interface PlacedOrder {
  atSec: number
  cityId: CityId
  position: number
  quantities: Map<UnitTypeId, number>
}

function toSimBuilding(b: ScenarioBuilding, startTimeSec: number): SimBuilding {
  const units = new Map<UnitTypeId, UnitCost>()
  for (const { unitTypeId, ...cost } of b.units) {
    units.set(unitTypeId, cost)
  }
  return {
    position: b.position,
    kind: b.kind,
    level: b.level,
    units,
    queueEndsAt: startTimeSec + b.queueRemainingSec,
    token: null,
  }
}

function toSimCity(c: ScenarioCity, startTimeSec: number): SimCity {
  return {
    id: c.id,
    name: c.name,
    citizens: c.citizens,
    maxCitizens: c.maxCitizens,
    growthPerHour: c.growthPerHour,
    pool: { ...c.resources, citizens: 0 },
    buildings: c.buildings.map((b) => toSimBuilding(b, startTimeSec)),
  }
}

/**
 * In-process stand-in for the live game. Time only moves through advance();
 * citizens grow toward each city's cap, queues drain, and every detail read
 * hands out a fresh single-use token.
 */
export class SimulatedGame implements GameDataProvider {
  readonly orders: PlacedOrder[] = []
  readonly offlineCities = new Set<CityId>()
  loggedOut = false

  private now: number
  private cities: SimCity[]
  private tokenCounter = 0

  constructor(scenario: Scenario) {
    this.now = scenario.startTimeSec
    this.cities = scenario.cities.map((c) => toSimCity(c, scenario.startTimeSec))
  }

  get clock(): number {
    return this.now
  }

  advance(seconds: number): void {
    const target = this.now + seconds
    for (const city of this.cities) {
      const { newStore } = accrueSince(
        this.now,
        city.growthPerHour / 3600,
        Math.max(city.maxCitizens, city.citizens),
        city.citizens,
        target
      )
      city.citizens = newStore
    }
    this.now = target
  }

  /**
   * Put resources into a city, e.g. a delivery arriving
   */
  deliver(cityId: CityId, resources: Partial<CitySnapshot>): void {
    const city = this.city(cityId)
    city.pool = addCost(city.pool, { ...emptyCost(), ...resources, citizens: 0 })
    city.citizens += resources.citizens ?? 0
  }

  async listCities(): Promise<City[]> {
    return this.cities.map((c) => ({ id: c.id, name: c.name }))
  }

  async listBuildings(cityId: CityId): Promise<BuildingSummary[]> {
    return this.city(cityId).buildings.map((b) => ({
      position: b.position,
      kind: b.kind,
      level: b.level,
      isBusy: b.queueEndsAt > this.now,
    }))
  }

  async fetchBuildingDetail(
    cityId: CityId,
    position: number,
    kind: BuildingKind
  ): Promise<BuildingDetail> {
    const building = this.building(cityId, position)
    if (building.kind !== kind) {
      throw new DataError(`Position ${position} in ${cityId} is a ${building.kind}`)
    }
    this.tokenCounter++
    building.token = `tok-${this.tokenCounter}`
    return {
      units: new Map(building.units),
      isBusy: building.queueEndsAt > this.now,
      queueRemainingSec: Math.max(0, building.queueEndsAt - this.now),
      actionToken: building.token,
    }
  }

  async fetchCitySnapshot(cityId: CityId): Promise<CitySnapshot> {
    const city = this.city(cityId)
    return { ...city.pool, citizens: Math.floor(city.citizens) }
  }

  async fetchGrowthRate(cityId: CityId): Promise<number> {
    const city = this.city(cityId)
    const display =
      city.growthPerHour > 0
        ? `Population growth: ${city.growthPerHour.toFixed(2)} citizens/h`
        : 'Population is stable'
    return parseGrowthRate(display)
  }

  async submitOrder(
    cityId: CityId,
    position: number,
    token: string,
    quantities: ReadonlyMap<UnitTypeId, number>
  ): Promise<void> {
    const city = this.city(cityId)
    const building = this.building(cityId, position)
    if (building.token === null || building.token !== token) {
      throw new TokenExpiredError(`Token ${token} rejected for ${cityId}/${position}`)
    }
    building.token = null

    let cost = emptyCost()
    let buildTime = 0
    for (const [unitTypeId, qty] of quantities) {
      const unit = building.units.get(unitTypeId)
      if (!unit) throw new TransportError(`Unit ${unitTypeId} cannot be built at ${cityId}/${position}`)
      cost = addCost(cost, scaleCost(unit, qty))
      buildTime += unit.timeSec * qty
    }

    const remainingPool = subtractCost({ ...city.pool, citizens: Math.floor(city.citizens) }, cost)
    if (Object.values(remainingPool).some((v) => v < 0)) {
      throw new TransportError(`Not enough resources in ${city.name}`)
    }

    city.pool = { ...remainingPool, citizens: 0 }
    city.citizens -= cost.citizens
    building.queueEndsAt = Math.max(this.now, building.queueEndsAt) + buildTime
    this.orders.push({ atSec: this.now, cityId, position, quantities: new Map(quantities) })
    Logger.add('sim_order_accepted', { cityId, position, units: Object.fromEntries(quantities) })
  }

  async logout(): Promise<void> {
    this.loggedOut = true
  }

  private city(cityId: CityId): SimCity {
    if (this.offlineCities.has(cityId)) {
      throw new TransportError(`City ${cityId} did not respond`)
    }
    const city = this.cities.find((c) => c.id === cityId)
    if (!city) throw new DataError(`Unknown city ${cityId}`)
    return city
  }

  private building(cityId: CityId, position: number): SimBuilding {
    const building = this.city(cityId).buildings.find((b) => b.position === position)
    if (!building) throw new DataError(`No building at ${cityId}/${position}`)
    return building
  }
}
