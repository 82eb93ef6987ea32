import { InvariantViolationError } from '../errors.js';
import type { HexCoordinate, PlayerId, Tile, Unit, WorldData } from '../types.js';
import { compareCoordinates, coordinateKey, neighborCoordinates, parseCoordinateKey } from '../utils/grid.js';
import { cloneTile, cloneUnit } from '../utils/units.js';
import { formatShortcut, parseShortcut } from './shortcuts.js';

interface WorldLayer {
  parent: number | undefined;
  units: Map<string, Unit>;
  tiles: Map<string, Tile>;
  // tombstones hide a parent's entry from this layer and every layer above it
  removedUnits: Set<string>;
  removedTiles: Set<string>;
  unitCount: number;
  unitCounters: Map<PlayerId, number>;
  tileCounters: Map<PlayerId, number>;
}

export interface NeighborTile {
  coordinate: HexCoordinate;
  tile: Tile;
}

function createLayer(parent: WorldLayer | undefined, parentIndex: number | undefined): WorldLayer {
  return {
    parent: parentIndex,
    units: new Map(),
    tiles: new Map(),
    removedUnits: new Set(),
    removedTiles: new Set(),
    unitCount: parent?.unitCount ?? 0,
    unitCounters: new Map(parent?.unitCounters),
    tileCounters: new Map(parent?.tileCounters)
  };
}

/**
 * Spatial store of tiles and units keyed by axial coordinate.
 *
 * Layers live in an arena; every layer but the root points at its parent by index.
 * Reads resolve top-down, writes only touch the top layer, and entries that come from
 * a lower layer are copied before they are changed.
 */
export class World {
  #layers: WorldLayer[] = [createLayer(undefined, undefined)];

  static fromData(data: WorldData): World {
    const world = new World();
    for (const key of Object.keys(data.tiles).sort(compareKeys)) {
      const tile = data.tiles[key];
      assertKeyMatches(key, tile, 'tile');
      world.addTile(cloneTile(tile));
    }
    for (const key of Object.keys(data.units).sort(compareKeys)) {
      const unit = data.units[key];
      assertKeyMatches(key, unit, 'unit');
      if (world.addUnit(cloneUnit(unit))) {
        throw new InvariantViolationError(`duplicate unit at ${key}`);
      }
    }
    return world;
  }

  /** Number of overlays above the root layer. */
  get depth(): number {
    return this.#layers.length - 1;
  }

  push(): number {
    const parentIndex = this.#layers.length - 1;
    this.#layers.push(createLayer(this.#layers[parentIndex], parentIndex));
    return this.depth;
  }

  pop(): void {
    if (this.#layers.length === 1) {
      throw new InvariantViolationError('cannot pop the root world layer');
    }
    this.#layers.pop();
  }

  /** Folds the top overlay into its parent. */
  merge(): void {
    const top = this.#top();
    if (top.parent === undefined) {
      throw new InvariantViolationError('cannot merge the root world layer');
    }
    const parent = this.#layers[top.parent];
    const parentIsRoot = parent.parent === undefined;

    for (const key of top.removedUnits) {
      parent.units.delete(key);
      if (!parentIsRoot) parent.removedUnits.add(key);
    }
    for (const [key, unit] of top.units) {
      parent.units.set(key, unit);
      parent.removedUnits.delete(key);
    }
    for (const key of top.removedTiles) {
      parent.tiles.delete(key);
      if (!parentIsRoot) parent.removedTiles.add(key);
    }
    for (const [key, tile] of top.tiles) {
      parent.tiles.set(key, tile);
      parent.removedTiles.delete(key);
    }
    parent.unitCount = top.unitCount;
    parent.unitCounters = top.unitCounters;
    parent.tileCounters = top.tileCounters;
    this.#layers.pop();
  }

  unitAt(coordinate: HexCoordinate): Unit | undefined {
    return this.#findUnit(coordinateKey(coordinate))?.unit;
  }

  tileAt(coordinate: HexCoordinate): Tile | undefined {
    return this.#findTile(coordinateKey(coordinate))?.tile;
  }

  numUnits(): number {
    return this.#top().unitCount;
  }

  *units(): Generator<Unit> {
    const seen = new Set<string>();
    for (let index: number | undefined = this.#layers.length - 1; index !== undefined; ) {
      const layer: WorldLayer = this.#layers[index];
      for (const [key, unit] of layer.units) {
        if (seen.has(key)) continue;
        seen.add(key);
        yield unit;
      }
      for (const key of layer.removedUnits) seen.add(key);
      index = layer.parent;
    }
  }

  *tiles(): Generator<Tile> {
    const seen = new Set<string>();
    for (let index: number | undefined = this.#layers.length - 1; index !== undefined; ) {
      const layer: WorldLayer = this.#layers[index];
      for (const [key, tile] of layer.tiles) {
        if (seen.has(key)) continue;
        seen.add(key);
        yield tile;
      }
      for (const key of layer.removedTiles) seen.add(key);
      index = layer.parent;
    }
  }

  playerUnits(player: PlayerId): Unit[] {
    return [...this.units()].filter((unit) => unit.player === player).sort(compareCoordinates);
  }

  neighbors(coordinate: HexCoordinate): NeighborTile[] {
    const result: NeighborTile[] = [];
    for (const neighbor of neighborCoordinates(coordinate)) {
      const tile = this.tileAt(neighbor);
      if (tile) result.push({ coordinate: neighbor, tile });
    }
    return result;
  }

  unitByShortcut(shortcut: string): Unit | undefined {
    for (const unit of this.units()) {
      if (unit.shortcut === shortcut) return unit;
    }
    return undefined;
  }

  tileByShortcut(shortcut: string): Tile | undefined {
    for (const tile of this.tiles()) {
      if (tile.shortcut === shortcut) return tile;
    }
    return undefined;
  }

  /**
   * Places `unit` in the top layer and returns the unit it displaced, if any.
   * A unit without a shortcut gets the next one for its player.
   */
  addUnit(unit: Unit): Unit | undefined {
    const top = this.#top();
    const key = coordinateKey(unit);
    const previous = this.unitAt(unit);

    if (unit.shortcut === '') {
      unit.shortcut = nextShortcut(top.unitCounters, unit.player);
    } else {
      reserveShortcut(top.unitCounters, unit.shortcut);
    }

    top.units.set(key, unit);
    top.removedUnits.delete(key);
    if (!previous) top.unitCount++;
    return previous;
  }

  removeUnit(coordinate: HexCoordinate): Unit | undefined {
    const key = coordinateKey(coordinate);
    const existing = this.unitAt(coordinate);
    if (!existing) return undefined;

    const top = this.#top();
    top.units.delete(key);
    if (top.parent !== undefined) top.removedUnits.add(key);
    top.unitCount--;
    return existing;
  }

  /**
   * Relocates the unit at `from`. The stored entry is replaced by a copy carrying the
   * new coordinates; a unit already at `to` is displaced.
   */
  moveUnit(from: HexCoordinate, to: HexCoordinate): Unit {
    const unit = this.unitAt(from);
    if (!unit) {
      throw new InvariantViolationError(`no unit to move at ${coordinateKey(from)}`);
    }
    if (from.q === to.q && from.r === to.r) return unit;

    const moved = cloneUnit(unit);
    this.removeUnit(from);
    moved.q = to.q;
    moved.r = to.r;
    this.addUnit(moved);
    return moved;
  }

  /** Copy-on-write mutation of the unit at `coordinate`; returns the stored result. */
  updateUnit(coordinate: HexCoordinate, mutate: (unit: Unit) => void): Unit {
    const key = coordinateKey(coordinate);
    const found = this.#findUnit(key);
    if (!found) {
      throw new InvariantViolationError(`no unit to update at ${key}`);
    }
    const top = this.#top();
    const target = found.layer === top ? found.unit : cloneUnit(found.unit);
    mutate(target);
    if (coordinateKey(target) !== key) {
      throw new InvariantViolationError(`unit update at ${key} changed its coordinates; use moveUnit`);
    }
    top.units.set(key, target);
    return target;
  }

  addTile(tile: Tile): Tile | undefined {
    const top = this.#top();
    const key = coordinateKey(tile);
    const previous = this.tileAt(tile);

    if (tile.shortcut === '' && tile.player > 0) {
      tile.shortcut = nextShortcut(top.tileCounters, tile.player);
    } else if (tile.shortcut !== '') {
      reserveShortcut(top.tileCounters, tile.shortcut);
    }

    top.tiles.set(key, tile);
    top.removedTiles.delete(key);
    return previous;
  }

  removeTile(coordinate: HexCoordinate): Tile | undefined {
    const key = coordinateKey(coordinate);
    const existing = this.tileAt(coordinate);
    if (!existing) return undefined;

    const top = this.#top();
    top.tiles.delete(key);
    if (top.parent !== undefined) top.removedTiles.add(key);
    return existing;
  }

  updateTile(coordinate: HexCoordinate, mutate: (tile: Tile) => void): Tile {
    const key = coordinateKey(coordinate);
    const found = this.#findTile(key);
    if (!found) {
      throw new InvariantViolationError(`no tile to update at ${key}`);
    }
    const top = this.#top();
    const target = found.layer === top ? found.tile : cloneTile(found.tile);
    mutate(target);
    if (coordinateKey(target) !== key) {
      throw new InvariantViolationError(`tile update at ${key} changed its coordinates`);
    }
    top.tiles.set(key, target);
    return target;
  }

  /**
   * Hands the tile at `coordinate` to `owner` and relabels it. Without an explicit
   * `shortcut` the owner's next tile label is drawn; a neutral owner gets none.
   */
  setTileOwner(coordinate: HexCoordinate, owner: PlayerId, shortcut?: string): Tile {
    const counters = this.#top().tileCounters;
    let label = shortcut;
    if (label === undefined) {
      label = owner > 0 ? nextShortcut(counters, owner) : '';
    } else {
      reserveShortcut(counters, label);
    }
    return this.updateTile(coordinate, (tile) => {
      tile.player = owner;
      tile.shortcut = label;
    });
  }

  /** Merged view as plain maps, keys in row-major order. */
  toData(): WorldData {
    const tiles: WorldData['tiles'] = {};
    for (const tile of [...this.tiles()].sort(compareCoordinates)) {
      tiles[coordinateKey(tile)] = cloneTile(tile);
    }
    const units: WorldData['units'] = {};
    for (const unit of [...this.units()].sort(compareCoordinates)) {
      units[coordinateKey(unit)] = cloneUnit(unit);
    }
    return { tiles, units };
  }

  #top(): WorldLayer {
    return this.#layers[this.#layers.length - 1];
  }

  #findUnit(key: string): { unit: Unit; layer: WorldLayer } | undefined {
    for (let index: number | undefined = this.#layers.length - 1; index !== undefined; ) {
      const layer: WorldLayer = this.#layers[index];
      const unit = layer.units.get(key);
      if (unit) return { unit, layer };
      if (layer.removedUnits.has(key)) return undefined;
      index = layer.parent;
    }
    return undefined;
  }

  #findTile(key: string): { tile: Tile; layer: WorldLayer } | undefined {
    for (let index: number | undefined = this.#layers.length - 1; index !== undefined; ) {
      const layer: WorldLayer = this.#layers[index];
      const tile = layer.tiles.get(key);
      if (tile) return { tile, layer };
      if (layer.removedTiles.has(key)) return undefined;
      index = layer.parent;
    }
    return undefined;
  }
}

function nextShortcut(counters: Map<PlayerId, number>, player: PlayerId): string {
  const next = (counters.get(player) ?? 0) + 1;
  const shortcut = formatShortcut(player, next);
  if (shortcut !== '') counters.set(player, next);
  return shortcut;
}

function reserveShortcut(counters: Map<PlayerId, number>, shortcut: string) {
  const parsed = parseShortcut(shortcut);
  if (!parsed) return;
  counters.set(parsed.player, Math.max(counters.get(parsed.player) ?? 0, parsed.index));
}

function compareKeys(a: string, b: string): number {
  const left = parseCoordinateKey(a);
  const right = parseCoordinateKey(b);
  if (!left || !right) return a < b ? -1 : a > b ? 1 : 0;
  return compareCoordinates(left, right);
}

function assertKeyMatches(key: string, entity: HexCoordinate, label: string) {
  if (key !== coordinateKey(entity)) {
    throw new InvariantViolationError(`${label} stored under ${key} sits at ${coordinateKey(entity)}`);
  }
}
