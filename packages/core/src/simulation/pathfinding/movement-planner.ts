import type { RulesEngine } from '../rules/rules-engine.js';
import type { HexCoordinate, PathEdge, Unit } from '../types.js';
import { coordinateKey, sameCoordinate, toCoordinate } from '../utils/grid.js';
import type { World } from '../world/layered-world.js';
import { PriorityQueue } from './priority-queue.js';
import type { AllPaths, PathfindingOptions, PathResult } from './types.js';

interface QueueItem {
  coordinate: HexCoordinate;
  cost: number;
}

/**
 * Dijkstra expansion of every tile `unit` can reach within its budget.
 *
 * Occupied tiles are expanded through (and recorded with `isOccupied`) unless
 * `preventPassThrough` is set, in which case they block the search. Roads and bridges
 * replace the terrain they are laid on.
 */
export function computeAllPaths(
  world: World,
  rules: RulesEngine,
  unit: Unit,
  options: PathfindingOptions = {}
): AllPaths {
  const source = toCoordinate(unit);
  const budget = options.budget ?? unit.distanceLeft;
  const unitName = rules.getUnitData(unit.unitType).name;
  const edges = new Map<string, PathEdge>();
  const best = new Map<string, number>([[coordinateKey(source), 0]]);

  const queue = new PriorityQueue<QueueItem>();
  queue.push({ coordinate: source, cost: 0 }, 0);

  for (let current = queue.pop(); current; current = queue.pop()) {
    const settled = best.get(coordinateKey(current.coordinate));
    if (settled !== undefined && current.cost > settled) continue;

    for (const { coordinate, tile } of world.neighbors(current.coordinate)) {
      const isOccupied = world.unitAt(coordinate) !== undefined;
      if (options.preventPassThrough && isOccupied) continue;
      const terrainId = rules.getEffectiveTileType(tile);
      if (!rules.canEnter(terrainId, unit.unitType)) continue;

      const movementCost = rules.getMovementCost(terrainId, unit.unitType);
      const totalCost = current.cost + movementCost;
      if (totalCost > budget) continue;

      const key = coordinateKey(coordinate);
      const known = best.get(key);
      if (known !== undefined && totalCost >= known) continue;

      best.set(key, totalCost);
      queue.push({ coordinate, cost: totalCost }, totalCost);

      const terrainName = rules.getTerrainData(terrainId).name;
      edges.set(key, {
        from: current.coordinate,
        to: coordinate,
        movementCost,
        totalCost,
        terrainName,
        explanation: `${terrainName} costs ${unitName} ${movementCost} movement points`,
        isOccupied
      });
    }
  }

  return { source, edges };
}

/** Edges from the source to `destination`, in travel order; empty when unreachable. */
export function reconstructPath(allPaths: AllPaths, destination: HexCoordinate): PathEdge[] {
  const path: PathEdge[] = [];
  let cursor = destination;
  while (!sameCoordinate(cursor, allPaths.source)) {
    const edge = allPaths.edges.get(coordinateKey(cursor));
    if (!edge || path.length > allPaths.edges.size) return [];
    path.push(edge);
    cursor = edge.from;
  }
  return path.reverse();
}

export function findPathTo(
  world: World,
  rules: RulesEngine,
  unit: Unit,
  destination: HexCoordinate,
  options: PathfindingOptions = {}
): PathResult {
  if (sameCoordinate(unit, destination)) {
    return { success: true, path: [], cost: 0 };
  }

  const allPaths = computeAllPaths(world, rules, unit, options);
  const edge = allPaths.edges.get(coordinateKey(destination));
  if (!edge) return { success: false, reason: 'unreachable' };
  if (edge.isOccupied) return { success: false, reason: 'occupied' };

  return { success: true, path: reconstructPath(allPaths, destination), cost: edge.totalCost };
}
