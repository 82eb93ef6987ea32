import type { RulesEngine } from '../rules/rules-engine.js';
import type { HexCoordinate, Tile, Unit } from '../types.js';
import { neighborCoordinates, sameCoordinate } from '../utils/grid.js';
import type { World } from '../world/layered-world.js';
import { simulateCombatDamage } from './combat-resolver.js';

export interface SplashTarget {
  unit: Unit;
  damage: number;
}

const SPLASH_THRESHOLD = 4;

/**
 * Rolls splash against every unit around `defenderCoordinate`, friend or foe.
 * Air units, the attacker itself and targets the attacker has no attack value against are skipped;
 * only totals above the threshold land.
 */
export function calculateSplashDamage(
  rules: RulesEngine,
  world: World,
  attacker: Unit,
  attackerTile: Tile,
  defenderCoordinate: HexCoordinate,
  random: () => number
): SplashTarget[] {
  const rolls = rules.getUnitData(attacker.unitType).splashDamage;
  if (rolls <= 0) return [];

  const targets: SplashTarget[] = [];
  for (const coordinate of neighborCoordinates(defenderCoordinate)) {
    const target = world.unitAt(coordinate);
    if (!target || sameCoordinate(target, attacker)) continue;
    if (rules.getUnitData(target.unitType).unitTerrain === 'Air') continue;
    if (!rules.canAttackType(attacker.unitType, target.unitType)) continue;
    const targetTile = world.tileAt(coordinate);
    if (!targetTile) continue;

    let damage = 0;
    for (let roll = 0; roll < rolls; roll++) {
      damage += simulateCombatDamage(
        rules,
        {
          attacker,
          attackerTile,
          attackerHealth: attacker.availableHealth,
          defender: target,
          defenderTile: targetTile,
          woundBonus: 0
        },
        random
      );
    }

    if (damage > SPLASH_THRESHOLD) targets.push({ unit: target, damage });
  }

  return targets;
}
