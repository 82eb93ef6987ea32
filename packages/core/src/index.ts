export * from './logging.js';
export * from './simulation/types.js';
export * from './simulation/errors.js';
export * from './simulation/game.js';
export * from './simulation/game-state.js';
export * from './simulation/rules/rules-engine.js';
export * from './simulation/world/layered-world.js';
export * from './simulation/world/shortcuts.js';
export * from './simulation/pathfinding/types.js';
export * from './simulation/pathfinding/movement-planner.js';
export * from './simulation/combat/combat-resolver.js';
export * from './simulation/combat/damage-distribution.js';
export * from './simulation/combat/splash-damage.js';
export * from './simulation/combat/wound-bonus.js';
export * from './simulation/progression/action-progression.js';
export * from './simulation/progression/top-up.js';
export * from './simulation/systems/income.js';
export * from './simulation/systems/move-processor.js';
export * from './simulation/systems/options.js';
export * from './simulation/history/change-replay.js';
export * from './simulation/history/game-history.js';
export { axialDistance, coordinateKey, parseCoordinateKey, sameCoordinate } from './simulation/utils/grid.js';
export { DeterministicRng, DIAGNOSTIC_SEED } from './simulation/utils/rng.js';
export { cloneTile, cloneUnit, createTile, createUnit } from './simulation/utils/units.js';
