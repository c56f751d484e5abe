import { describe, it, expect, beforeEach } from 'vitest'
import { SimulatedGame } from './simulatedGame'
import { DataError, TokenExpiredError, TransportError } from '../lib/errors'
import { Logger } from '../lib/logger'
import { parseScenario } from '../lib/persist'
import { makeScenario } from '../test/builders'

describe('SimulatedGame', () => {
  beforeEach(() => {
    Logger.clear()
    Logger.setLevel('silent')
  })

  it('grows citizens with the clock', async () => {
    const game = new SimulatedGame(makeScenario())
    game.advance(3600)

    expect(game.clock).toBe(3600)
    expect(await game.fetchCitySnapshot('c1')).toEqual({
      citizens: 1036,
      wood: 100000,
      wine: 0,
      marble: 0,
      crystal: 0,
      sulfur: 100000,
    })
  })

  it('stops growth at the city cap', async () => {
    const game = new SimulatedGame(
      parseScenario({
        version: 1,
        cities: [{ id: 'c1', name: 'Alpha', citizens: 4990, maxCitizens: 5000, growthPerHour: 36, resources: {} }],
      })
    )
    game.advance(3600)

    expect((await game.fetchCitySnapshot('c1')).citizens).toBe(5000)
  })

  it('reports growth through the population display', async () => {
    const game = new SimulatedGame(makeScenario())

    expect(await game.fetchGrowthRate('c1')).toBe(36)
    expect(await game.fetchGrowthRate('c2')).toBe(0)
  })

  it('charges an order and queues it', async () => {
    const game = new SimulatedGame(makeScenario())
    const detail = await game.fetchBuildingDetail('c1', 5, 'barracks')

    await game.submitOrder('c1', 5, detail.actionToken ?? '', new Map([[303, 10]]))

    const snapshot = await game.fetchCitySnapshot('c1')
    expect(snapshot).toMatchObject({ citizens: 990, wood: 99600, sulfur: 99700 })
    const after = await game.fetchBuildingDetail('c1', 5, 'barracks')
    expect(after.isBusy).toBe(true)
    expect(after.queueRemainingSec).toBe(600)
  })

  it('accepts each token once', async () => {
    const game = new SimulatedGame(makeScenario())
    const detail = await game.fetchBuildingDetail('c1', 7, 'barracks')
    const token = detail.actionToken ?? ''

    await game.submitOrder('c1', 7, token, new Map([[303, 1]]))

    await expect(game.submitOrder('c1', 7, token, new Map([[303, 1]]))).rejects.toThrow(TokenExpiredError)
  })

  it('refuses orders the city cannot pay for', async () => {
    const game = new SimulatedGame(makeScenario())
    const detail = await game.fetchBuildingDetail('c1', 7, 'barracks')

    await expect(game.submitOrder('c1', 7, detail.actionToken ?? '', new Map([[303, 2000]]))).rejects.toThrow(
      'Not enough resources in Alpha'
    )
    expect(game.orders).toHaveLength(0)
  })

  it('fails reads from offline cities and mismatched kinds', async () => {
    const game = new SimulatedGame(makeScenario())
    game.offlineCities.add('c2')

    await expect(game.fetchCitySnapshot('c2')).rejects.toThrow(TransportError)
    await expect(game.fetchBuildingDetail('c1', 1, 'barracks')).rejects.toThrow(DataError)
  })
})
