import type { PlayerId } from '../types.js';

const FIRST_LETTER = 'A'.charCodeAt(0);
const MAX_LETTERED_PLAYER = 26;

export function playerLetter(player: PlayerId): string | undefined {
  if (player <= 0 || player > MAX_LETTERED_PLAYER) return undefined;
  return String.fromCharCode(FIRST_LETTER + player - 1);
}

/** Label such as "A1" or "B12"; players outside A..Z (and neutral) get none. */
export function formatShortcut(player: PlayerId, index: number): string {
  const letter = playerLetter(player);
  return letter ? `${letter}${index}` : '';
}

export function parseShortcut(label: string): { player: PlayerId; index: number } | undefined {
  const match = /^([A-Z])(\d+)$/.exec(label);
  if (!match) return undefined;
  return { player: match[1].charCodeAt(0) - FIRST_LETTER + 1, index: Number(match[2]) };
}
