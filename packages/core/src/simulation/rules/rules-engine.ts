import { TileType, terrainUnitKey } from '@hexline/data';
import type { RulesTable, TerrainDefinition, TerrainUnitProperties, UnitDefinition } from '@hexline/data';

import { InvariantViolationError } from '../errors.js';
import type { Tile } from '../types.js';

const DEFAULT_MOVEMENT_COST = 1;

export interface RulesValidationResult {
  valid: boolean;
  issues: string[];
}

/**
 * Read-only lookups over a rules table. One instance can be shared by any number of games.
 */
export class RulesEngine {
  readonly table: RulesTable;
  #units = new Map<number, UnitDefinition>();
  #terrains = new Map<number, TerrainDefinition>();
  #terrainUnits = new Map<string, TerrainUnitProperties>();

  constructor(table: RulesTable) {
    this.table = table;
    for (const unit of table.units) this.#units.set(unit.id, unit);
    for (const terrain of table.terrains) this.#terrains.set(terrain.id, terrain);
    for (const entry of table.terrainUnitProperties) {
      this.#terrainUnits.set(terrainUnitKey(entry.terrainId, entry.unitId), entry);
    }
  }

  getUnitData(unitType: number): UnitDefinition {
    const unit = this.#units.get(unitType);
    if (!unit) throw new InvariantViolationError(`unknown unit type ${unitType}`);
    return unit;
  }

  /**
   * Terrain used for movement, combat and healing lookups at `tile`. A road stands in for
   * whatever it is laid on; a bridge takes the variant matching the water depth below it.
   */
  getEffectiveTileType(tile: Pick<Tile, 'tileType' | 'crossing'>): number {
    switch (tile.crossing) {
      case 'road':
        return TileType.Road;
      case 'bridge':
        if (tile.tileType === TileType.ShallowWater) return TileType.ShallowBridge;
        if (tile.tileType === TileType.DeepWater) return TileType.DeepBridge;
        return TileType.Bridge;
      case undefined:
        return tile.tileType;
      default: {
        const unknown: never = tile.crossing;
        throw new InvariantViolationError(`unknown crossing ${String(unknown)}`);
      }
    }
  }

  getTerrainData(terrainId: number): TerrainDefinition {
    const terrain = this.#terrains.get(terrainId);
    if (!terrain) throw new InvariantViolationError(`unknown terrain ${terrainId}`);
    return terrain;
  }

  hasUnitType(unitType: number): boolean {
    return this.#units.has(unitType);
  }

  getTerrainUnitProperties(terrainId: number, unitType: number): TerrainUnitProperties | undefined {
    return this.#terrainUnits.get(terrainUnitKey(terrainId, unitType));
  }

  /** Cost for `unitType` to enter `terrainId`; unset or non-positive costs count as 1. */
  getMovementCost(terrainId: number, unitType: number): number {
    const cost = this.getTerrainUnitProperties(terrainId, unitType)?.movementCost ?? 0;
    return cost > 0 ? cost : DEFAULT_MOVEMENT_COST;
  }

  canEnter(terrainId: number, unitType: number): boolean {
    return this.getTerrainUnitProperties(terrainId, unitType)?.passable ?? true;
  }

  /** Base attack value against the defender type, or undefined when no entry exists. */
  getBaseAttack(attackerType: number, defenderType: number): number | undefined {
    const defender = this.getUnitData(defenderType);
    return this.getUnitData(attackerType).attackVsClass[`${defender.unitClass}:${defender.unitTerrain}`];
  }

  canAttackType(attackerType: number, defenderType: number): boolean {
    return this.getBaseAttack(attackerType, defenderType) !== undefined;
  }

  validate(): RulesValidationResult {
    const issues: string[] = [];
    if (this.table.units.length === 0) issues.push('no units defined');
    if (this.table.terrains.length === 0) issues.push('no terrains defined');

    for (const terrain of this.table.terrains) {
      for (const unitId of terrain.buildableUnitIds) {
        if (!this.#units.has(unitId)) {
          issues.push(`terrain ${terrain.id} (${terrain.name}) builds unknown unit ${unitId}`);
        }
      }
    }
    for (const entry of this.table.terrainUnitProperties) {
      if (!this.#terrains.has(entry.terrainId)) issues.push(`properties reference unknown terrain ${entry.terrainId}`);
      if (!this.#units.has(entry.unitId)) issues.push(`properties reference unknown unit ${entry.unitId}`);
    }

    return { valid: issues.length === 0, issues };
  }
}
