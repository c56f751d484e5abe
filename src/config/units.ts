import type { BuildingKind } from './recruitConfig'

export interface CatalogEntry {
  name: string
  unitTypeId: number
}

// Menu order, not id order
export const UNITS_ORDER: readonly CatalogEntry[] = [
  { name: 'Hoplite', unitTypeId: 303 },
  { name: 'Swordsman', unitTypeId: 302 },
  { name: 'Steam Giant', unitTypeId: 308 },
  { name: 'Sulphur Carabineer', unitTypeId: 304 },
  { name: 'Mortar', unitTypeId: 305 },
  { name: 'Gyrocopter', unitTypeId: 312 },
  { name: 'Balloon-Bombardier', unitTypeId: 309 },
  { name: 'Doctor', unitTypeId: 311 },
  { name: 'Cook', unitTypeId: 310 },
  { name: 'Battering Ram', unitTypeId: 307 },
  { name: 'Spearman', unitTypeId: 315 },
  { name: 'Slinger', unitTypeId: 301 },
  { name: 'Archer', unitTypeId: 313 },
  { name: 'Catapult', unitTypeId: 306 },
]

export const SHIPS_ORDER: readonly CatalogEntry[] = [
  { name: 'Ram Ship', unitTypeId: 210 },
  { name: 'Steam Ram', unitTypeId: 216 },
  { name: 'Rocket Ship', unitTypeId: 217 },
  { name: 'Diving Boat', unitTypeId: 212 },
  { name: 'Paddle Speedboat', unitTypeId: 218 },
  { name: 'Balloon Carrier', unitTypeId: 219 },
  { name: 'Tender', unitTypeId: 220 },
  { name: 'Fire Ship', unitTypeId: 211 },
  { name: 'Ballista Ship', unitTypeId: 213 },
  { name: 'Catapult Ship', unitTypeId: 214 },
  { name: 'Mortar Ship', unitTypeId: 215 },
]

export function catalogFor(kind: BuildingKind): readonly CatalogEntry[] {
  return kind === 'barracks' ? UNITS_ORDER : SHIPS_ORDER
}

/**
 * Look up the display name of a unit type, falling back to its id
 */
export function unitName(unitTypeId: number): string {
  const entry =
    UNITS_ORDER.find((u) => u.unitTypeId === unitTypeId) ??
    SHIPS_ORDER.find((u) => u.unitTypeId === unitTypeId)
  return entry ? entry.name : `Unit ${unitTypeId}`
}
