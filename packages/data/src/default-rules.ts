import { readFileSync } from 'node:fs';

import { loadRulesTable } from './rules-table.js';
import type { RulesTable } from './rules-table.js';

const DEFAULT_RULES_URL = new URL('../rules/default-rules.json', import.meta.url);

export function loadRulesTableFromFile(path: string | URL): RulesTable {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return loadRulesTable(raw);
}

/**
 * Loads the rules table bundled with this package.
 */
export function loadDefaultRulesTable(): RulesTable {
  return loadRulesTableFromFile(DEFAULT_RULES_URL);
}
