import { describe, it, expect, beforeEach } from 'vitest'
import {
  selectExecutionMode,
  createExecutionState,
  totalRemaining,
  computeThreshold,
  evaluateBuilding,
  executeImmediate,
  runRecruitmentLoop,
} from './index'
import type { LoopProgress } from './index'
import { config } from '../../config/recruitConfig'
import type { BuildingKind } from '../../config/recruitConfig'
import { auditResources } from '../audit'
import { findBuildings, fetchBuildingDetails } from '../discovery'
import { planDistribution } from '../planner'
import { SimulatedGame } from '../../app/simulatedGame'
import { TransportError } from '../../lib/errors'
import { Logger } from '../../lib/logger'
import { parseScenario } from '../../lib/persist'
import { HOPLITE, makePlanned, makeScenario, makeUnit } from '../../test/builders'
import type { CityId, Distribution, RecruitmentOrder, UnitTypeId } from '../../types/core'
import type { BuildingDetail, Notifier } from '../../types/provider'

function singleCityScenario(citizens: number, growthPerHour: number, positions: number[]) {
  return parseScenario({
    version: 1,
    cities: [
      {
        id: 'c1',
        name: 'Alpha',
        citizens,
        maxCitizens: 5000,
        growthPerHour,
        resources: { wood: 100000, sulfur: 100000 },
        buildings: positions.map((position) => ({ position, kind: 'barracks', level: 6, units: [HOPLITE] })),
      },
    ],
  })
}

async function planFor(game: SimulatedGame, order: RecruitmentOrder): Promise<Distribution> {
  const found = await findBuildings(game, await game.listCities(), 'barracks')
  const scan = await fetchBuildingDetails(game, found)
  const distribution = planDistribution([...scan.ready, ...scan.busy], order)
  if (!distribution) throw new Error('expected a distribution')
  return distribution
}

function collectingNotifier(): Notifier & { messages: string[] } {
  const messages: string[] = []
  return {
    messages,
    async notify(message) {
      messages.push(message)
    },
  }
}

/**
 * Game whose next detail read or order for one position fails with a transport error
 */
class FlakyGame extends SimulatedGame {
  failDetailAt: number | null = null
  failOrderAt: number | null = null

  override async fetchBuildingDetail(cityId: CityId, position: number, kind: BuildingKind): Promise<BuildingDetail> {
    if (this.failDetailAt === position) {
      this.failDetailAt = null
      throw new TransportError(`Detail page for ${position} timed out`)
    }
    return super.fetchBuildingDetail(cityId, position, kind)
  }

  override async submitOrder(
    cityId: CityId,
    position: number,
    token: string,
    quantities: ReadonlyMap<UnitTypeId, number>
  ): Promise<void> {
    if (this.failOrderAt === position) {
      this.failOrderAt = null
      throw new TransportError(`Order for ${position} timed out`)
    }
    return super.submitOrder(cityId, position, token, quantities)
  }
}

describe('execution', () => {
  beforeEach(() => {
    Logger.clear()
    Logger.setLevel('silent')
  })

  describe('computeThreshold', () => {
    it('is 20% of the remaining units, at least 1', () => {
      expect(computeThreshold(100)).toBe(20)
      expect(computeThreshold(49)).toBe(9)
      expect(computeThreshold(3)).toBe(1)
      expect(computeThreshold(0)).toBe(1)
    })
  })

  describe('evaluateBuilding', () => {
    it('lets earlier unit types shrink the pool for later ones', () => {
      const building = {
        remaining: new Map([
          [302, 10],
          [303, 10],
        ]),
        units: new Map([
          [302, makeUnit({ name: 'Swordsman', wood: 30 })],
          [303, makeUnit()],
        ]),
      }
      const pool = { citizens: 15, wood: 1000, wine: 0, marble: 0, crystal: 0, sulfur: 1000 }

      const evaluation = evaluateBuilding(building, pool)

      expect(evaluation.toRecruit).toEqual(
        new Map([
          [302, 10],
          [303, 5],
        ])
      )
      expect(evaluation.total).toBe(15)
      expect(evaluation.threshold).toBe(4)
      expect(evaluation.cost).toEqual({ citizens: 15, wood: 500, wine: 0, marble: 0, crystal: 0, sulfur: 450 })
    })

    it('falls short of the threshold when only a sliver is affordable', () => {
      const building = { remaining: new Map([[303, 50]]), units: new Map([[303, makeUnit()]]) }
      const pool = { citizens: 9, wood: 1000, wine: 0, marble: 0, crystal: 0, sulfur: 1000 }

      const evaluation = evaluateBuilding(building, pool)

      expect(evaluation.total).toBe(9)
      expect(evaluation.threshold).toBe(10)
    })
  })

  describe('createExecutionState', () => {
    it('starts remaining at the planned assignments without sharing maps', () => {
      const distribution: Distribution = {
        buildings: [makePlanned([[303, 12]]), makePlanned([[303, 8]], { position: 7 })],
        droppedUnitTypes: [],
      }
      const state = createExecutionState(distribution)
      state[0].remaining.set(303, 2)

      expect(totalRemaining(state)).toBe(10)
      expect(distribution.buildings[0].assignments.get(303)).toBe(12)
    })
  })

  describe('selectExecutionMode', () => {
    it('runs immediately when everything is affordable and idle', async () => {
      const game = new SimulatedGame(makeScenario())
      const distribution = await planFor(game, new Map([[303, 30]]))
      const audit = await auditResources(game, distribution)

      expect(selectExecutionMode(audit, distribution)).toBe('immediate')
    })

    it('loops when citizens are missing', async () => {
      const game = new SimulatedGame(singleCityScenario(20, 360, [5]))
      const distribution = await planFor(game, new Map([[303, 100]]))
      const audit = await auditResources(game, distribution)

      expect(audit.missingCitizens.get('c1')).toBe(80)
      expect(selectExecutionMode(audit, distribution)).toBe('loop')
    })

    it('loops when a planned building is busy', async () => {
      const distribution: Distribution = {
        buildings: [makePlanned([[303, 5]], { isBusy: true, queueRemainingSec: 60 })],
        droppedUnitTypes: [],
      }
      const audit = {
        canFulfill: true,
        missingResources: new Map(),
        missingCitizens: new Map(),
        available: new Map(),
        unavailableCities: [],
      }

      expect(selectExecutionMode(audit, distribution)).toBe('loop')
    })
  })

  describe('executeImmediate', () => {
    it('places every assignment in full', async () => {
      const game = new SimulatedGame(makeScenario())
      const distribution = await planFor(game, new Map([[303, 30]]))

      const result = await executeImmediate(game, distribution)

      expect(result.success).toBe(true)
      expect(result.results.map((r) => [r.cityId, r.position, r.units])).toEqual([
        ['c1', 5, 10],
        ['c1', 7, 10],
        ['c2', 3, 10],
      ])
      expect(game.orders.length).toBe(3)
    })

    it('keeps going when one building fails', async () => {
      const game = new SimulatedGame(makeScenario())
      const distribution = await planFor(game, new Map([[303, 30]]))
      game.offlineCities.add('c2')

      const result = await executeImmediate(game, distribution)

      expect(result.success).toBe(false)
      expect(result.results.map((r) => r.success)).toEqual([true, true, false])
      expect(game.orders.length).toBe(2)
    })

    it('replaces a rejected token and retries once', async () => {
      const game = new SimulatedGame(makeScenario())
      const distribution: Distribution = {
        buildings: [makePlanned([[303, 4]], { cityId: 'c1', position: 5, actionToken: 'stale' })],
        droppedUnitTypes: [],
      }

      const result = await executeImmediate(game, distribution)

      expect(result.success).toBe(true)
      expect(game.orders[0].quantities).toEqual(new Map([[303, 4]]))
      expect(Logger.get().map((e) => e.type)).toContain('token_rejected')
    })
  })

  describe('runRecruitmentLoop', () => {
    it('recruits in batches as citizens grow', async () => {
      const game = new SimulatedGame(singleCityScenario(20, 360, [5]))
      const distribution = await planFor(game, new Map([[303, 100]]))
      const notifier = collectingNotifier()
      const sleeps: number[] = []
      const statuses: string[] = []
      const progress: LoopProgress[] = []

      const result = await runRecruitmentLoop(game, distribution, {
        notifier,
        sleep: async (seconds) => {
          sleeps.push(seconds)
          game.advance(seconds)
        },
        onStatus: (status) => statuses.push(status),
        onProgress: (p) => progress.push(p),
      })

      expect(result.outcome).toBe('completed')
      expect(result.unitsPlaced).toBe(100)
      expect(result.cycles).toBe(6)
      expect(sleeps).toEqual([60, 300, 300, 300, 300, 60])
      expect(game.orders.map((o) => [o.atSec, o.quantities.get(303)])).toEqual([
        [0, 20],
        [1260, 80],
      ])
      expect(progress.map((p) => p.unitsRemaining)).toEqual([80, 80, 80, 80, 80, 0])
      expect(statuses[0]).toBe('Recruiting 20/100 units (~13m 20s remaining)')
      expect(statuses[1]).toBe('Waiting for queues... 80 units remaining (~12m 20s for citizens)')
      expect(statuses[statuses.length - 1]).toBe('Recruitment complete!')
      expect(notifier.messages).toEqual(['Auto recruitment completed: 100 units placed'])
    })

    it('serves buildings of one city in order and stops when cancelled', async () => {
      const game = new SimulatedGame(singleCityScenario(30, 0, [5, 7]))
      const distribution = await planFor(game, new Map([[303, 100]]))
      const controller = new AbortController()
      const sleeps: number[] = []

      const result = await runRecruitmentLoop(game, distribution, {
        signal: controller.signal,
        sleep: async (seconds) => {
          sleeps.push(seconds)
          game.advance(seconds)
          if (sleeps.length === 3) controller.abort()
        },
      })

      expect(result.outcome).toBe('cancelled')
      expect(result.cycles).toBe(3)
      expect(sleeps).toEqual([60, 300, 300])
      expect(game.orders.map((o) => [o.position, o.quantities.get(303)])).toEqual([[5, 30]])
      expect(result.buildings.map((b) => b.remaining.get(303))).toEqual([20, 50])
      for (const building of result.buildings) {
        expect(building.remaining.get(303) ?? 0).toBeLessThanOrEqual(building.assignments.get(303) ?? 0)
      }
    })

    it('skips a city that cannot be read and picks it up later', async () => {
      const game = new SimulatedGame(makeScenario())
      const distribution = await planFor(game, new Map([[303, 30]]))
      game.offlineCities.add('c2')

      const result = await runRecruitmentLoop(game, distribution, {
        growthRates: new Map(),
        sleep: async (seconds) => {
          game.offlineCities.delete('c2')
          game.advance(seconds)
        },
      })

      expect(result.outcome).toBe('completed')
      expect(result.cycles).toBe(2)
      expect(game.orders.map((o) => `${o.cityId}/${o.position}`)).toEqual(['c1/5', 'c1/7', 'c2/3'])
    })

    it('skips a building whose token cannot be read and serves it next cycle', async () => {
      const game = new FlakyGame(singleCityScenario(100, 0, [5, 7]))
      const distribution = await planFor(game, new Map([[303, 20]]))
      distribution.buildings[0].actionToken = null
      game.failDetailAt = 5
      const sleeps: number[] = []

      const result = await runRecruitmentLoop(game, distribution, {
        sleep: async (seconds) => {
          sleeps.push(seconds)
          game.advance(seconds)
        },
      })

      expect(result.outcome).toBe('completed')
      expect(result.cycles).toBe(2)
      expect(sleeps).toEqual([60, 60])
      expect(game.orders.map((o) => [o.atSec, o.position, o.quantities.get(303)])).toEqual([
        [0, 7, 10],
        [60, 5, 10],
      ])
      expect(Logger.get().map((e) => e.type)).toContain('token_unavailable')
    })

    it('retries soon after a building met its threshold but the order failed', async () => {
      const game = new FlakyGame(singleCityScenario(100, 0, [5]))
      const distribution = await planFor(game, new Map([[303, 10]]))
      game.failOrderAt = 5
      const sleeps: number[] = []

      const result = await runRecruitmentLoop(game, distribution, {
        sleep: async (seconds) => {
          sleeps.push(seconds)
          game.advance(seconds)
        },
      })

      expect(result.outcome).toBe('completed')
      expect(sleeps).toEqual([60, 60])
      expect(game.orders.map((o) => o.atSec)).toEqual([60])
    })

    it('sends one stall notice per streak of empty cycles', async () => {
      const game = new SimulatedGame(singleCityScenario(0, 0, [5]))
      const distribution = await planFor(game, new Map([[303, 10]]))
      const notifier = collectingNotifier()
      const controller = new AbortController()
      let calls = 0

      const result = await runRecruitmentLoop(game, distribution, {
        notifier,
        signal: controller.signal,
        policy: { ...config, loop: { ...config.loop, stallNotifyCycles: 2 } },
        sleep: async () => {
          calls++
          if (calls === 4) controller.abort()
        },
      })

      expect(result.outcome).toBe('cancelled')
      expect(notifier.messages).toEqual([
        'Auto recruitment: no building reached its threshold for 2 cycles, 10 units still waiting',
      ])
    })

    it('keeps running when the notifier fails', async () => {
      const game = new SimulatedGame(singleCityScenario(100, 0, [5]))
      const distribution = await planFor(game, new Map([[303, 10]]))
      const notifier: Notifier = {
        async notify() {
          throw new Error('bot offline')
        },
      }

      const result = await runRecruitmentLoop(game, distribution, {
        notifier,
        sleep: async () => {},
      })

      expect(result.outcome).toBe('completed')
      expect(Logger.get().map((e) => e.type)).toContain('notify_failed')
    })
  })
})
