/**
 * Straight-line (great-circle) distance. No I/O, never fails.
 *
 * Only used as the last resort of the fallback chain, and only when
 * ROUTING_HAVERSINE_FALLBACK is on: it underestimates road distance.
 */

import { haversineDistanceKm, roundTo } from '../../shared/utils/geospatial.utils';
import type { Coordinate } from '../geocoding/geocoding.schema';
import { LatLng, RouteOptions, RouteProvider, RouteResult } from './routing.schema';

export class HaversineRouteProvider implements RouteProvider {
  readonly name = 'haversine';

  async route(from: Coordinate, to: Coordinate, options: RouteOptions = {}): Promise<RouteResult> {
    const distanceKm = roundTo(
      haversineDistanceKm(from.latitude, from.longitude, to.latitude, to.longitude),
      2
    );

    const geometry: LatLng[] = [[from.latitude, from.longitude], [to.latitude, to.longitude]];

    return {
      distanceKm,
      ...(options.includeGeometry && { geometry }),
      source: 'haversine'
    };
  }
}
