import type { HexCoordinate, Unit } from '../types.js';
import { axialDistance, isOppositeSide } from '../utils/grid.js';

const RANGED_DISTANCE = 2;

/**
 * Bonus (B) an attacker at `attackerCoordinate` earns from the attacks `defender`
 * already took this turn.
 */
export function calculateWoundBonus(defender: Unit, attackerCoordinate: HexCoordinate): number {
  if (defender.attackHistory.length === 0) return 0;

  const currentIsRanged = axialDistance(attackerCoordinate, defender) >= RANGED_DISTANCE;
  let bonus = 0;

  for (const record of defender.attackHistory) {
    if (currentIsRanged || record.isRanged) {
      bonus += 1;
    } else if (axialDistance(record, attackerCoordinate) === 1) {
      bonus += 1;
    } else if (isOppositeSide(defender, record, attackerCoordinate)) {
      bonus += 3;
    } else {
      bonus += 2;
    }
  }

  return bonus;
}

export function isRangedAttack(attacker: HexCoordinate, defender: HexCoordinate): boolean {
  return axialDistance(attacker, defender) >= RANGED_DISTANCE;
}
