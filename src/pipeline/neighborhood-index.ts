import { booleanPointInPolygon } from '@turf/boolean-point-in-polygon';
import type { NeighborhoodBoundary } from '../types/location.js';
import type { ImportStore } from '../types/store.js';
import { logger } from '../utils/logger.js';

export interface NeighborhoodIndex {
  readonly size: number;
  /** The neighborhood whose boundary contains the point, if any. */
  findContaining(longitude: number, latitude: number): NeighborhoodBoundary | null;
}

export function createNeighborhoodIndex(neighborhoods: readonly NeighborhoodBoundary[]): NeighborhoodIndex {
  return {
    size: neighborhoods.length,
    findContaining(longitude, latitude) {
      const matches = neighborhoods.filter((n) => booleanPointInPolygon([longitude, latitude], n.boundary));
      if (matches.length > 1) {
        logger.debug(
          { longitude, latitude, neighborhoods: matches.map((n) => n.name) },
          'Point falls inside more than one neighborhood, using the first',
        );
      }
      return matches[0] ?? null;
    },
  };
}

export async function loadNeighborhoodIndex(store: ImportStore): Promise<NeighborhoodIndex> {
  const neighborhoods = await store.fetchNeighborhoods();
  logger.debug({ count: neighborhoods.length }, 'Neighborhood boundaries loaded');
  return createNeighborhoodIndex(neighborhoods);
}
