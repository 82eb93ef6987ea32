export * from './rules-table.js';
export * from './game-config.js';
export * from './default-rules.js';
