import { pino } from 'pino';
import { describe, expect, it } from 'vitest';

import { createLogger, createSilentLogger, logGame } from './logging.js';

function capture() {
  const lines: Record<string, unknown>[] = [];
  const stream = {
    write(line: string) {
      lines.push(JSON.parse(line));
    }
  };
  return { logger: pino({ level: 'debug' }, stream), lines };
}

describe('logGame', () => {
  it('sends lifecycle tags to info and the rest to debug', () => {
    const { logger, lines } = capture();

    logGame(logger, { tag: 'game:turn', gameId: 'g-1', newPlayer: 2 });
    logGame(logger, { tag: 'game:move', gameId: 'g-1', kind: 'move' });

    expect(lines.map((line) => [line.level, line.tag])).toEqual([
      [30, 'game:turn'],
      [20, 'game:move']
    ]);
    expect(lines[0]).toMatchObject({ gameId: 'g-1', newPlayer: 2 });
    expect(typeof lines[0].ts).toBe('string');
  });

  it('drops debug entries at the info level', () => {
    const lines: string[] = [];
    const logger = pino({ level: 'info' }, { write: (line: string) => void lines.push(line) });

    logGame(logger, { tag: 'game:rejected', code: 'no-unit' });

    expect(lines).toEqual([]);
  });
});

describe('createLogger', () => {
  it('applies the requested level', () => {
    expect(createLogger({ level: 'warn' }).level).toBe('warn');
    expect(createSilentLogger().level).toBe('silent');
  });
});
