import type { HexCoordinate } from '../types.js';

export const hexDirections: ReadonlyArray<HexCoordinate> = [
  { q: 1, r: 0 },
  { q: 1, r: -1 },
  { q: 0, r: -1 },
  { q: -1, r: 0 },
  { q: -1, r: 1 },
  { q: 0, r: 1 }
];

export const coordinateKey = (coordinate: HexCoordinate) => `${coordinate.q},${coordinate.r}`;

export function parseCoordinateKey(key: string): HexCoordinate | undefined {
  const match = /^(-?\d+),(-?\d+)$/.exec(key);
  if (!match) return undefined;
  return { q: Number(match[1]), r: Number(match[2]) };
}

export function toCoordinate(entity: HexCoordinate): HexCoordinate {
  return { q: entity.q, r: entity.r };
}

export function sameCoordinate(a: HexCoordinate, b: HexCoordinate): boolean {
  return a.q === b.q && a.r === b.r;
}

export function addCoordinates(a: HexCoordinate, b: HexCoordinate): HexCoordinate {
  return { q: a.q + b.q, r: a.r + b.r };
}

export interface CubeCoordinate {
  x: number;
  y: number;
  z: number;
}

export function axialToCube(axial: HexCoordinate): CubeCoordinate {
  const x = axial.q;
  const z = axial.r;
  const y = -x - z;
  return { x, y, z };
}

export function cubeDistance(a: CubeCoordinate, b: CubeCoordinate): number {
  return Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y), Math.abs(a.z - b.z));
}

export function axialDistance(a: HexCoordinate, b: HexCoordinate): number {
  return cubeDistance(axialToCube(a), axialToCube(b));
}

export function neighborCoordinates(coordinate: HexCoordinate): HexCoordinate[] {
  return hexDirections.map((direction) => addCoordinates(coordinate, direction));
}

/** True when `a` and `b` sit at mirrored offsets around `center`. */
export function isOppositeSide(center: HexCoordinate, a: HexCoordinate, b: HexCoordinate): boolean {
  return a.q - center.q === -(b.q - center.q) && a.r - center.r === -(b.r - center.r);
}

/** Row-major ordering used wherever iteration order leaks into results. */
export function compareCoordinates(a: HexCoordinate, b: HexCoordinate): number {
  return a.r - b.r || a.q - b.q;
}
