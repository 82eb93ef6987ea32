import { InvariantViolationError, RulesEngine, createLogger } from '@hexline/core';
import { loadDefaultRulesTable, loadRulesTableFromFile } from '@hexline/data';

import type { ServiceConfig } from './config.js';
import type { GameStore } from './game-store.js';
import { GamesService } from './games-service.js';

export * from './config.js';
export * from './game-store.js';
export * from './games-service.js';

/** Wires a games service from environment-derived config. */
export function createGamesService(config: ServiceConfig, store?: GameStore): GamesService {
  const logger = createLogger({ level: config.logLevel, name: 'hexline-services' });
  const rules = new RulesEngine(config.rulesPath ? loadRulesTableFromFile(config.rulesPath) : loadDefaultRulesTable());

  const { valid, issues } = rules.validate();
  if (!valid) {
    throw new InvariantViolationError(`invalid rules table: ${issues.join('; ')}`);
  }

  logger.info({ rulesPath: config.rulesPath ?? 'bundled', units: rules.table.units.length }, 'rules loaded');
  return new GamesService({ rules, store, logger, defaultSeed: config.defaultSeed });
}
