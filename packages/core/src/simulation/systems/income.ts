import { DEFAULT_TILE_INCOME, TileType } from '@hexline/data';
import type { IncomeConfig } from '@hexline/data';

import type { PlayerId } from '../types.js';
import type { World } from '../world/layered-world.js';

function configuredOrDefault(configured: number, tileType: number): number {
  return configured > 0 ? configured : (DEFAULT_TILE_INCOME[tileType] ?? 0);
}

/** Per-turn income of one owned tile; terrain without income yields 0. */
export function getTileIncome(tileType: number, income: IncomeConfig): number {
  switch (tileType) {
    case TileType.LandBase:
      return configuredOrDefault(income.landbaseIncome, tileType);
    case TileType.NavalBase:
      return configuredOrDefault(income.navalbaseIncome, tileType);
    case TileType.Airport:
      return configuredOrDefault(income.airportbaseIncome, tileType);
    case TileType.MissileSilo:
      return configuredOrDefault(income.missilesiloIncome, tileType);
    case TileType.Mines:
      return configuredOrDefault(income.minesIncome, tileType);
    default:
      return 0;
  }
}

export function calculatePlayerIncome(world: World, player: PlayerId, income: IncomeConfig): number {
  let total = income.gameIncome > 0 ? income.gameIncome : 0;
  for (const tile of world.tiles()) {
    if (tile.player === player) total += getTileIncome(tile.tileType, income);
  }
  return total;
}
