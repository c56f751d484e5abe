export const config = {
  distribution: {
    toleranceSec: 1800,
    maxIterations: 100,
    maxMoveUnits: 10,
    orderOverheadSec: 10,
  },
  threshold: { minFulfillmentRatio: 0.2 },
  estimate: { citizenWaitFactor: 0.8 },
  loop: { backoffSec: 300, cycleSec: 60, stallNotifyCycles: 12 },
}

export type RecruitPolicy = typeof config

export const RESOURCES = ['wood', 'wine', 'marble', 'crystal', 'sulfur'] as const

export const COST_KEYS = ['citizens', ...RESOURCES] as const

export const BUILDING_KINDS = ['barracks', 'shipyard'] as const

export type Resource = (typeof RESOURCES)[number]
export type CostKey = (typeof COST_KEYS)[number]
export type BuildingKind = (typeof BUILDING_KINDS)[number]
