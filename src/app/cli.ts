import { createInterface } from 'node:readline/promises'
import { COST_KEYS, config } from '../config/recruitConfig'
import type { BuildingKind } from '../config/recruitConfig'
import { catalogFor } from '../config/units'
import { excludeCities, fetchBuildingDetails, findBuildings, summarizeCities } from '../domain/discovery'
import { formatSeconds } from '../lib/time'
import type { Building, CityId, UnitCost, UnitTypeId } from '../types/core'
import type { GameDataProvider } from '../types/provider'
import { planRun, runRecruitment } from './session'
import type { RunOutcome, SessionOptions } from './session'

/** Typed at any prompt to go back */
export const BACK = "'"

export interface Prompter {
  ask(question: string): Promise<string>
  print(line?: string): void
}

/**
 * Prompter on stdin/stdout. Ctrl+C while the interface owns the terminal
 * goes to onInterrupt.
 */
export function readlinePrompter(onInterrupt?: () => void): Prompter & { close(): void } {
  const rl = createInterface({ input: process.stdin, output: process.stdout })
  if (onInterrupt) rl.on('SIGINT', onInterrupt)
  return {
    ask: (question) => rl.question(question),
    print: (line = '') => {
      process.stdout.write(`${line}\n`)
    },
    close: () => rl.close(),
  }
}

const RULE = '='.repeat(60)

function heading(io: Prompter, title: string): void {
  io.print(RULE)
  io.print(title)
  io.print(RULE)
  io.print()
}

/**
 * 1-based city numbers to 0-based indexes. Empty input ignores nothing;
 * anything unreadable or out of range yields null.
 */
export function parseCityIndexes(input: string, count: number): number[] | null {
  const trimmed = input.trim()
  if (trimmed === '') return []

  const indexes: number[] = []
  for (const part of trimmed.split(',')) {
    const n = Number(part.trim())
    if (!Number.isInteger(n) || n < 1 || n > count) return null
    indexes.push(n - 1)
  }
  return indexes
}

/**
 * Quantity typed by the user: blank is 0, null when it is not a whole number
 */
export function parseQuantity(input: string): number | null {
  const trimmed = input.trim()
  if (trimmed === '') return 0
  const n = Number(trimmed)
  return Number.isInteger(n) && n >= 0 ? n : null
}

export function formatUnitCost(unit: UnitCost): string {
  const parts: string[] = []
  for (const key of COST_KEYS) {
    if (unit[key] > 0) parts.push(`${unit[key].toLocaleString('en-US')} ${key}`)
  }
  parts.push(formatSeconds(unit.timeSec))
  return parts.join(', ')
}

async function askChoice(io: Prompter, question: string, max: number): Promise<number | null> {
  for (;;) {
    const answer = (await io.ask(question)).trim()
    if (answer === BACK) return null
    const n = Number(answer)
    if (Number.isInteger(n) && n >= 1 && n <= max) return n
    io.print(`Enter a number from 1 to ${max}`)
  }
}

async function askKind(io: Prompter): Promise<BuildingKind | null> {
  heading(io, 'AUTO RECRUITMENT')
  io.print('What do you want to recruit?')
  io.print()
  io.print('1. Military Units (Barracks)')
  io.print('2. Ships (Shipyard)')
  io.print()
  io.print(`(${BACK}) Back`)
  const choice = await askChoice(io, 'Select (1 or 2): ', 2)
  if (choice === null) return null
  return choice === 1 ? 'barracks' : 'shipyard'
}

/**
 * Ask a quantity per unit type the scanned buildings can recruit, in menu order.
 * Null when the user goes back.
 */
async function askOrder(
  io: Prompter,
  kind: BuildingKind,
  buildings: readonly Building[]
): Promise<Map<UnitTypeId, number> | null> {
  heading(io, 'RECRUITMENT ORDER')
  io.print('Enter the quantity for each unit type (blank to skip):')
  io.print()

  const order = new Map<UnitTypeId, number>()
  for (const entry of catalogFor(kind)) {
    const sample = buildings.find((b) => b.units.has(entry.unitTypeId))?.units.get(entry.unitTypeId)
    if (!sample) continue

    for (;;) {
      const answer = await io.ask(`  ${entry.name} (${formatUnitCost(sample)}): `)
      if (answer.trim() === BACK) return null
      const qty = parseQuantity(answer)
      if (qty === null) {
        io.print('  Enter a whole number')
        continue
      }
      if (qty > 0) order.set(entry.unitTypeId, qty)
      break
    }
  }
  return order
}

/**
 * Interactive recruitment: pick a building kind, leave out cities, decide
 * about busy buildings, enter the order, review the plan and run it.
 * Null when the user backs out before anything is placed.
 */
export async function runCli(
  io: Prompter,
  provider: GameDataProvider,
  options: SessionOptions = {}
): Promise<RunOutcome | null> {
  const policy = options.policy ?? config

  const kind = await askKind(io)
  if (kind === null) return null
  io.print()
  io.print(`Scanning for ${kind}...`)

  const found = await findBuildings(provider, await provider.listCities(), kind)
  if (found.length === 0) {
    io.print(`No ${kind} found in any city!`)
    return null
  }

  const summaries = summarizeCities(found)
  heading(io, 'CITY SELECTION')
  summaries.forEach((s, i) => {
    io.print(`  ${i + 1}. ${s.cityName} - ${s.count} ${kind} [${s.levels.map((l) => `L${l}`).join(', ')}]`)
  })
  io.print()
  const ignoreInput = await io.ask('Enter city numbers to IGNORE (comma-separated), or press Enter for none: ')
  if (ignoreInput.trim() === BACK) return null
  let indexes = parseCityIndexes(ignoreInput, summaries.length)
  if (indexes === null) {
    io.print('Invalid input, not ignoring any cities')
    indexes = []
  }
  const ignored = new Set<CityId>(indexes.map((i) => summaries[i].cityId))

  const active = excludeCities(found, ignored)
  if (active.length === 0) {
    io.print(`No ${kind} remaining after exclusions!`)
    return null
  }

  io.print('Fetching recruitment times and costs from each building...')
  const scan = await fetchBuildingDetails(provider, active)
  for (const failed of scan.failed) {
    io.print(`  ${failed.cityName} #${failed.position}: FAILED`)
  }

  let waitForBusy = false
  if (scan.busy.length > 0) {
    heading(io, 'BUSY BUILDINGS DETECTED')
    for (const b of scan.busy) {
      io.print(`  ${b.cityName} L${b.level} - queue finishes in ${formatSeconds(b.queueRemainingSec)}`)
    }
    io.print()
    io.print('1. Ignore busy buildings (proceed without them)')
    io.print('2. Wait for all buildings to finish their queues')
    const choice = await askChoice(io, 'Select (1 or 2): ', 2)
    if (choice === null) return null
    waitForBusy = choice === 2
  }

  const usable = waitForBusy ? [...scan.ready, ...scan.busy] : scan.ready
  if (usable.length === 0) {
    io.print(`No available ${kind} to use!`)
    return null
  }

  const order = await askOrder(io, kind, usable)
  if (order === null) return null
  if (order.size === 0) {
    io.print('No units selected for recruitment.')
    return null
  }

  const run = await planRun(provider, { kind, order, excludedCities: ignored, waitForBusy }, scan, policy)
  if (!run) {
    io.print('Could not calculate distribution!')
    return null
  }

  heading(io, 'RECRUITMENT PLAN')
  for (const line of run.report.split('\n')) io.print(line)
  io.print()
  if (run.mode === 'loop') {
    io.print('Recruitment will wait for citizens, resources or queues and place units in batches.')
  }

  const confirm = (await io.ask('Proceed? (y/n): ')).trim().toLowerCase()
  if (confirm !== 'y') return null

  return runRecruitment(provider, run, { ...options, policy })
}
