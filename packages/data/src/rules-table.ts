import { z } from 'zod';

export type UnitTerrain = 'Land' | 'Water' | 'Air';
export type TerrainKind = 'city' | 'nature' | 'water' | 'road' | 'bridge';

export interface UnitDefinition {
  id: number;
  name: string;
  health: number;
  coins: number;
  movementPoints: number;
  retreatPoints: number;
  attackRange: number;
  defense: number;
  unitClass: string;
  unitTerrain: UnitTerrain;
  // keyed by "<defender class>:<defender terrain>", e.g. "Light:Land"
  attackVsClass: Record<string, number>;
  actionOrder: string[];
  splashDamage: number;
}

export interface TerrainDefinition {
  id: number;
  name: string;
  type: TerrainKind;
  buildableUnitIds: number[];
}

export interface TerrainUnitProperties {
  terrainId: number;
  unitId: number;
  movementCost: number;
  passable: boolean;
  attackBonus: number;
  defenseBonus: number;
  healingBonus: number;
  canCapture: boolean;
}

export interface RulesTable {
  units: UnitDefinition[];
  terrains: TerrainDefinition[];
  terrainUnitProperties: TerrainUnitProperties[];
}

const unitDefinitionSchema = z.object({
  id: z.number().int().positive(),
  name: z.string(),
  health: z.number().int().positive(),
  coins: z.number().int().nonnegative(),
  movementPoints: z.number().nonnegative(),
  retreatPoints: z.number().nonnegative().default(0),
  attackRange: z.number().int().nonnegative(),
  defense: z.number(),
  unitClass: z.string(),
  unitTerrain: z.enum(['Land', 'Water', 'Air']),
  attackVsClass: z.record(z.string(), z.number()),
  actionOrder: z.array(z.string().min(1)).default(['move', 'attack|capture']),
  splashDamage: z.number().int().nonnegative().default(0)
});

const terrainDefinitionSchema = z.object({
  id: z.number().int().positive(),
  name: z.string(),
  type: z.enum(['city', 'nature', 'water', 'road', 'bridge']),
  buildableUnitIds: z.array(z.number().int().positive()).default([])
});

const terrainUnitPropertiesSchema = z.object({
  terrainId: z.number().int().positive(),
  unitId: z.number().int().positive(),
  movementCost: z.number().nonnegative().default(0),
  passable: z.boolean().default(true),
  attackBonus: z.number().default(0),
  defenseBonus: z.number().default(0),
  healingBonus: z.number().int().nonnegative().default(0),
  canCapture: z.boolean().default(false)
});

export const rulesTableSchema = z.object({
  units: z.array(unitDefinitionSchema),
  terrains: z.array(terrainDefinitionSchema),
  terrainUnitProperties: z.array(terrainUnitPropertiesSchema).default([])
});

export type RulesTableInput = z.input<typeof rulesTableSchema>;

export function loadRulesTable(raw: unknown): RulesTable {
  return rulesTableSchema.parse(raw);
}

export const terrainUnitKey = (terrainId: number, unitId: number) => `${terrainId}:${unitId}`;
