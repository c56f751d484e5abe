import { COST_KEYS, RESOURCES } from '../../config/recruitConfig'
import type { Resource } from '../../config/recruitConfig'
import type { CostVector } from '../../types/core'

export function emptyCost(): CostVector {
  return { citizens: 0, wood: 0, wine: 0, marble: 0, crystal: 0, sulfur: 0 }
}

export function scaleCost(cost: CostVector, quantity: number): CostVector {
  const scaled = emptyCost()
  for (const key of COST_KEYS) {
    scaled[key] = cost[key] * quantity
  }
  return scaled
}

export function addCost(a: CostVector, b: CostVector): CostVector {
  const sum = emptyCost()
  for (const key of COST_KEYS) {
    sum[key] = a[key] + b[key]
  }
  return sum
}

export function subtractCost(a: CostVector, b: CostVector): CostVector {
  const diff = emptyCost()
  for (const key of COST_KEYS) {
    diff[key] = a[key] - b[key]
  }
  return diff
}

/**
 * Largest quantity, up to `wanted`, that the available pool can pay for.
 * Cost keys of zero do not limit.
 */
export function maxAffordable(unit: CostVector, available: CostVector, wanted: number): number {
  let max = wanted
  for (const key of COST_KEYS) {
    const per = unit[key]
    if (per > 0) {
      max = Math.min(max, Math.floor(available[key] / per))
    }
  }
  return Math.max(0, max)
}

/**
 * Resource shortfalls (required above available), positive entries only
 */
export function resourceShortage(
  required: CostVector,
  available: CostVector
): Partial<Record<Resource, number>> {
  const missing: Partial<Record<Resource, number>> = {}
  for (const resource of RESOURCES) {
    if (required[resource] > available[resource]) {
      missing[resource] = required[resource] - available[resource]
    }
  }
  return missing
}
