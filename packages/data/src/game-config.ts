import { z } from 'zod';

export const TileType = {
  LandBase: 1,
  NavalBase: 2,
  Airport: 3,
  Desert: 4,
  Grass: 5,
  Water: 10,
  ShallowWater: 14,
  DeepWater: 15,
  MissileSilo: 16,
  Bridge: 17,
  ShallowBridge: 18,
  DeepBridge: 19,
  Mines: 20,
  Road: 22
} as const;

export const AIRPORT_TERRAIN_NAME = 'Airport Base';

export const DEFAULT_STARTING_COINS = 300;

export const DEFAULT_TILE_INCOME: Readonly<Record<number, number>> = {
  [TileType.LandBase]: 100,
  [TileType.NavalBase]: 150,
  [TileType.Airport]: 200,
  [TileType.MissileSilo]: 300,
  [TileType.Mines]: 500
};

export interface IncomeConfig {
  landbaseIncome: number;
  navalbaseIncome: number;
  airportbaseIncome: number;
  missilesiloIncome: number;
  minesIncome: number;
  // flat income for every player still in the game
  gameIncome: number;
}

export interface GamePlayer {
  id: number;
  name: string;
}

export interface GameConfig {
  players: GamePlayer[];
  startingCoins: number;
  incomeConfig: IncomeConfig;
  // undefined means every buildable unit is allowed; an empty list allows none
  allowedUnits?: number[];
  seed: number;
}

const incomeConfigSchema = z.object({
  landbaseIncome: z.number().int().nonnegative().default(0),
  navalbaseIncome: z.number().int().nonnegative().default(0),
  airportbaseIncome: z.number().int().nonnegative().default(0),
  missilesiloIncome: z.number().int().nonnegative().default(0),
  minesIncome: z.number().int().nonnegative().default(0),
  gameIncome: z.number().int().nonnegative().default(0)
});

const gamePlayerSchema = z.object({
  id: z.number().int().positive(),
  name: z.string()
});

export const gameConfigSchema = z
  .object({
    players: z
      .array(gamePlayerSchema)
      .min(2)
      .default([
        { id: 1, name: 'Player 1' },
        { id: 2, name: 'Player 2' }
      ]),
    startingCoins: z.number().int().nonnegative().default(DEFAULT_STARTING_COINS),
    incomeConfig: incomeConfigSchema.default({}),
    allowedUnits: z.array(z.number().int().positive()).optional(),
    seed: z.number().int().default(1)
  })
  .superRefine((config, ctx) => {
    config.players.forEach((player, index) => {
      if (player.id !== index + 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['players', index, 'id'],
          message: `players must be numbered 1..n in order, found ${player.id} at position ${index}`
        });
      }
    });
  });

export type GameConfigInput = z.input<typeof gameConfigSchema>;

export function parseGameConfig(raw: unknown = {}): GameConfig {
  return gameConfigSchema.parse(raw);
}
