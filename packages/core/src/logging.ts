import { pino } from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export type { Logger } from 'pino';

export type GameLogTag =
  | 'game:created'
  | 'game:move'
  | 'game:rejected'
  | 'game:turn'
  | 'game:capture'
  | 'game:victory'
  | 'game:conflict';

export interface GameLogEntry {
  tag: GameLogTag;
  gameId?: string;
  [field: string]: unknown;
}

const INFO_TAGS: ReadonlySet<GameLogTag> = new Set(['game:created', 'game:turn', 'game:victory', 'game:conflict']);

export interface LoggerOptions {
  level?: LevelWithSilent;
  name?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({ name: options.name ?? 'hexline', level: options.level ?? 'info' });
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

function ts() {
  return new Date().toISOString();
}

/** Routes a tagged game event to info or debug depending on its tag. */
export function logGame(logger: Logger, entry: GameLogEntry): void {
  const payload = { ...entry, ts: ts() };
  if (INFO_TAGS.has(entry.tag)) {
    logger.info(payload);
  } else {
    logger.debug(payload);
  }
}
