import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { BUILDING_KINDS } from '../../config/recruitConfig'
import { ScenarioError } from '../errors'

const SCENARIO_VERSION = 1

const amount = z.number().nonnegative().default(0)

export const UnitCostSchema = z.object({
  unitTypeId: z.number().int().positive(),
  name: z.string().default(''),
  citizens: amount,
  wood: amount,
  wine: amount,
  marble: amount,
  crystal: amount,
  sulfur: amount,
  upkeep: amount,
  timeSec: amount,
})

const BuildingSchema = z.object({
  position: z.number().int().nonnegative(),
  kind: z.enum(BUILDING_KINDS),
  level: z.number().int().nonnegative(),
  queueRemainingSec: amount,
  units: z.array(UnitCostSchema),
})

const CitySchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  citizens: amount,
  maxCitizens: z.number().positive(),
  growthPerHour: amount,
  resources: z.object({
    wood: amount,
    wine: amount,
    marble: amount,
    crystal: amount,
    sulfur: amount,
  }),
  buildings: z.array(BuildingSchema).default([]),
})

export const ScenarioSchema = z.object({
  version: z.literal(SCENARIO_VERSION),
  startTimeSec: amount,
  cities: z.array(CitySchema).min(1),
})

export type Scenario = z.infer<typeof ScenarioSchema>
export type ScenarioCity = Scenario['cities'][number]
export type ScenarioBuilding = ScenarioCity['buildings'][number]
export type ScenarioInput = z.input<typeof ScenarioSchema>

export function parseScenario(raw: unknown): Scenario {
  const parsed = ScenarioSchema.safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ScenarioError(`Invalid scenario: ${issues}`)
  }
  return parsed.data
}

export async function loadScenario(path: string): Promise<Scenario> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    throw new ScenarioError(`Cannot read scenario ${path}`, { cause: error })
  }

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw new ScenarioError(`Scenario ${path} is not valid JSON`, { cause: error })
  }
  return parseScenario(raw)
}
