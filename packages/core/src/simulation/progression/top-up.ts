import { AIRPORT_TERRAIN_NAME } from '@hexline/data';
import type { UnitDefinition } from '@hexline/data';

import { InvariantViolationError } from '../errors.js';
import type { RulesEngine } from '../rules/rules-engine.js';
import type { HexCoordinate, Unit, WorldChange } from '../types.js';
import { coordinateKey, toCoordinate } from '../utils/grid.js';
import type { World } from '../world/layered-world.js';

export interface ProgressionContext {
  world: World;
  rules: RulesEngine;
  turnCounter: number;
}

export interface TopUpResult {
  unit: Unit;
  toppedUp: boolean;
  // capture completions; empty for most refreshes
  changes: WorldChange[];
}

/** Healing a unit would receive at its next refresh; 0 when it is not eligible. */
export function calculateHealAmount(ctx: ProgressionContext, unit: Unit, definition: UnitDefinition): number {
  const previousTurn = Math.max(ctx.turnCounter - 1, 1);
  if (unit.lastActedTurn >= previousTurn) return 0;

  const tile = ctx.world.tileAt(unit);
  if (!tile) return 0;
  if (tile.player !== 0 && tile.player !== unit.player) return 0;
  if (definition.unitTerrain === 'Air' && ctx.rules.getTerrainData(tile.tileType).name !== AIRPORT_TERRAIN_NAME) {
    return 0;
  }

  const terrainId = ctx.rules.getEffectiveTileType(tile);
  const healing = ctx.rules.getTerrainUnitProperties(terrainId, unit.unitType)?.healingBonus ?? 0;
  return healing > 0 ? healing : 0;
}

/**
 * Lazily refreshes the unit at `coordinate` for the current turn: budget, health, attack
 * history, progression and any pending capture. A unit already refreshed this turn is
 * returned untouched.
 */
export function topUpUnitIfNeeded(ctx: ProgressionContext, coordinate: HexCoordinate): TopUpResult {
  const current = ctx.world.unitAt(coordinate);
  if (!current) {
    throw new InvariantViolationError(`no unit at ${coordinateKey(coordinate)} to top up`);
  }
  if (current.lastToppedUpTurn >= ctx.turnCounter) {
    return { unit: current, toppedUp: false, changes: [] };
  }

  const definition = ctx.rules.getUnitData(current.unitType);
  const healAmount = current.availableHealth === 0 ? 0 : calculateHealAmount(ctx, current, definition);
  const startedTurn = current.captureStartedTurn;
  const completesCapture = startedTurn > 0 && startedTurn < ctx.turnCounter;
  const changes: WorldChange[] = [];

  const unit = ctx.world.updateUnit(coordinate, (draft) => {
    draft.distanceLeft = definition.movementPoints;
    draft.availableHealth =
      draft.availableHealth === 0 ? definition.health : Math.min(definition.health, draft.availableHealth + healAmount);
    draft.attackHistory = [];
    draft.progressionStep = 0;
    draft.chosenAlternative = '';
    if (completesCapture) draft.captureStartedTurn = 0;
    draft.lastToppedUpTurn = ctx.turnCounter;
  });

  if (completesCapture) {
    changes.push({ kind: 'capture:completed', unit: toCoordinate(unit), player: unit.player, startedTurn });

    const tile = ctx.world.tileAt(coordinate);
    if (tile && tile.player !== unit.player) {
      const previousOwner = tile.player;
      const captured = ctx.world.setTileOwner(coordinate, unit.player);
      changes.push({
        kind: 'tile:ownership-changed',
        tile: toCoordinate(captured),
        previousOwner,
        newOwner: unit.player,
        shortcut: captured.shortcut
      });
    }
  }

  return { unit, toppedUp: true, changes };
}

/** Refreshed this turn and out of budget. A stale unit is never exhausted. */
export function isUnitExhausted(unit: Unit, turnCounter: number): boolean {
  return unit.lastToppedUpTurn >= turnCounter && unit.distanceLeft <= 0;
}
