import type { RulesEngine } from '../rules/rules-engine.js';
import { DIAGNOSTIC_SEED, DeterministicRng } from '../utils/rng.js';
import { calculateHitProbability, simulateCombatDamage } from './combat-resolver.js';
import type { CombatContext } from './combat-resolver.js';

export interface DamageRange {
  minValue: number;
  maxValue: number;
  probability: number;
}

export interface DamageDistribution {
  minDamage: number;
  maxDamage: number;
  expectedDamage: number;
  ranges: DamageRange[];
}

export const DEFAULT_DISTRIBUTION_RUNS = 10_000;

/**
 * Monte Carlo estimate of the damage `ctx` deals. Runs on its own fixed-seed sequence,
 * so the estimate is repeatable and the game's sequence is left alone.
 */
export function generateDamageDistribution(
  rules: RulesEngine,
  ctx: CombatContext,
  runs: number = DEFAULT_DISTRIBUTION_RUNS
): DamageDistribution | undefined {
  if (calculateHitProbability(rules, ctx) === undefined) return undefined;

  const total = runs > 0 ? Math.floor(runs) : DEFAULT_DISTRIBUTION_RUNS;
  const rng = new DeterministicRng(DIAGNOSTIC_SEED);
  const random = () => rng.nextFloat();
  const counts = new Map<number, number>();
  let sum = 0;

  for (let run = 0; run < total; run++) {
    const damage = simulateCombatDamage(rules, ctx, random);
    counts.set(damage, (counts.get(damage) ?? 0) + 1);
    sum += damage;
  }

  const observed = [...counts.keys()].sort((a, b) => a - b);
  return {
    minDamage: observed[0],
    maxDamage: observed[observed.length - 1],
    expectedDamage: sum / total,
    ranges: observed.map((damage) => ({
      minValue: damage,
      maxValue: damage,
      probability: (counts.get(damage) ?? 0) / total
    }))
  };
}
