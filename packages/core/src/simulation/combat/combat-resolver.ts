import { InvariantViolationError } from '../errors.js';
import type { RulesEngine } from '../rules/rules-engine.js';
import type { Tile, Unit } from '../types.js';
import { axialDistance } from '../utils/grid.js';
import { calculateWoundBonus } from './wound-bonus.js';

export interface CombatContext {
  attacker: Unit;
  attackerTile: Tile;
  // health the attacker rolls with; may differ from attacker.availableHealth
  attackerHealth: number;
  defender: Unit;
  defenderTile: Tile;
  woundBonus: number;
}

export interface AttackInput {
  attacker: Unit;
  attackerTile: Tile;
  defender: Unit;
  defenderTile: Tile;
}

export interface AttackRolls {
  defenderDamage: number;
  attackerDamage: number;
  woundBonus: number;
  hitProbability: number;
  counterAttacked: boolean;
}

export const DICE_PER_HEALTH_POINT = 6;

const BASE_HIT_PROBABILITY = 0.5;
const HIT_PROBABILITY_PER_POINT = 0.05;

function clamp(value: number, min: number, max: number) {
  return Math.max(min, Math.min(max, value));
}

/**
 * p = 0.05 * ((A + Ta) - (D + Td) + B) + 0.5, clamped to [0, 1].
 * Undefined when the attacker has no attack value against the defender's class.
 */
export function calculateHitProbability(rules: RulesEngine, ctx: CombatContext): number | undefined {
  const baseAttack = rules.getBaseAttack(ctx.attacker.unitType, ctx.defender.unitType);
  if (baseAttack === undefined) return undefined;

  const attackerTerrain = rules.getEffectiveTileType(ctx.attackerTile);
  const defenderTerrain = rules.getEffectiveTileType(ctx.defenderTile);
  const attackBonus = rules.getTerrainUnitProperties(attackerTerrain, ctx.attacker.unitType)?.attackBonus ?? 0;
  const defenseBonus = rules.getTerrainUnitProperties(defenderTerrain, ctx.defender.unitType)?.defenseBonus ?? 0;
  const defense = rules.getUnitData(ctx.defender.unitType).defense;

  const p =
    HIT_PROBABILITY_PER_POINT * (baseAttack + attackBonus - (defense + defenseBonus) + ctx.woundBonus) +
    BASE_HIT_PROBABILITY;
  return clamp(p, 0, 1);
}

/** Rolls six dice per attacker health point; every sixth hit is one point of damage. */
export function simulateCombatDamage(rules: RulesEngine, ctx: CombatContext, random: () => number): number {
  const p = calculateHitProbability(rules, ctx);
  if (p === undefined) {
    throw new InvariantViolationError(`unit type ${ctx.attacker.unitType} cannot attack unit type ${ctx.defender.unitType}`);
  }

  let hits = 0;
  for (let point = 0; point < ctx.attackerHealth; point++) {
    for (let die = 0; die < DICE_PER_HEALTH_POINT; die++) {
      if (random() < p) hits++;
    }
  }

  return Math.min(Math.floor(hits / DICE_PER_HEALTH_POINT), ctx.attackerHealth);
}

/** Enemy, in range, and covered by the attack table. */
export function canUnitAttackTarget(rules: RulesEngine, attacker: Unit, target: Unit): boolean {
  if (attacker.player === target.player) return false;
  if (!rules.canAttackType(attacker.unitType, target.unitType)) return false;
  return axialDistance(attacker, target) <= rules.getUnitData(attacker.unitType).attackRange;
}

/**
 * Rolls the attack and then the counter-attack, both from pre-attack health.
 * Nothing is applied; the caller owns the world.
 */
export function resolveAttack(rules: RulesEngine, input: AttackInput, random: () => number): AttackRolls {
  const woundBonus = calculateWoundBonus(input.defender, input.attacker);
  const attackCtx: CombatContext = {
    attacker: input.attacker,
    attackerTile: input.attackerTile,
    attackerHealth: input.attacker.availableHealth,
    defender: input.defender,
    defenderTile: input.defenderTile,
    woundBonus
  };
  const hitProbability = calculateHitProbability(rules, attackCtx) ?? 0;
  const defenderDamage = simulateCombatDamage(rules, attackCtx, random);

  const counterAttacked = canUnitAttackTarget(rules, input.defender, input.attacker);
  let attackerDamage = 0;
  if (counterAttacked) {
    attackerDamage = simulateCombatDamage(
      rules,
      {
        attacker: input.defender,
        attackerTile: input.defenderTile,
        attackerHealth: input.defender.availableHealth,
        defender: input.attacker,
        defenderTile: input.attackerTile,
        woundBonus: 0
      },
      random
    );
  }

  return { defenderDamage, attackerDamage, woundBonus, hitProbability, counterAttacked };
}
