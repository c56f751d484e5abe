import { fileURLToPath } from 'node:url'
import { loadConfig } from '../config/env'
import { describeError } from '../lib/errors'
import { Logger } from '../lib/logger'
import { logNotifier } from '../lib/notify'
import { loadScenario } from '../lib/persist'
import { formatSeconds, sleep as realSleep } from '../lib/time'
import type { Sleep } from '../lib/time'
import { readlinePrompter, runCli } from './cli'
import { SimulatedGame } from './simulatedGame'
import { runStore } from './store'

const DEFAULT_SCENARIO = fileURLToPath(new URL('../../scenarios/example.json', import.meta.url))

async function main(): Promise<void> {
  const { policy, logLevel } = loadConfig()
  Logger.setLevel(logLevel)

  const args = process.argv.slice(2)
  // --fast skips the real waiting between cycles; the simulated clock still advances
  const fast = args.includes('--fast')
  const scenarioPath = args.find((a) => !a.startsWith('--')) ?? DEFAULT_SCENARIO

  const game = new SimulatedGame(await loadScenario(scenarioPath))
  const controller = new AbortController()
  const interrupt = () => {
    if (!controller.signal.aborted) controller.abort()
  }
  process.once('SIGINT', interrupt)

  const io = readlinePrompter(interrupt)
  const unsubscribe = runStore.subscribe(
    (s) => s.status,
    (status) => {
      if (status) io.print(`[+${formatSeconds(game.clock)}] ${status}`)
    }
  )
  const sleep: Sleep = async (seconds, signal) => {
    if (!fast) await realSleep(seconds, signal)
    game.advance(seconds)
  }

  try {
    const outcome = await runCli(io, game, { policy, notifier: logNotifier, sleep, signal: controller.signal })
    if (outcome) {
      io.print(`Finished: ${outcome.outcome}, ${outcome.unitsPlaced} units placed`)
      if (outcome.outcome === 'failed') process.exitCode = 1
    }
  } finally {
    unsubscribe()
    io.close()
    process.off('SIGINT', interrupt)
  }
}

main().catch((error: unknown) => {
  console.error(describeError(error))
  process.exitCode = 1
})
