import type { HexCoordinate, PathEdge } from '../types.js';

export interface AllPaths {
  source: HexCoordinate;
  // keyed by destination "q,r"; the source itself has no edge
  edges: Map<string, PathEdge>;
}

export type PathFailureReason = 'unreachable' | 'occupied';

export type PathResult =
  | { success: true; path: PathEdge[]; cost: number }
  | { success: false; reason: PathFailureReason };

export interface PathfindingOptions {
  // occupied tiles block traversal instead of only landing
  preventPassThrough?: boolean;
  // movement budget; defaults to the unit's distanceLeft
  budget?: number;
}
