/**
 * =============================================================================
 * QUOTE MODULE - SERVICE
 * =============================================================================
 *
 * Turns (pickup text, dropoff text, size) into a priced Quote.
 *
 * FLOW (strictly sequential, stops at the first failure):
 *   1. size class is checked
 *   2. pickup is geocoded
 *   3. dropoff is geocoded
 *   4. road distance between the two points
 *   5. price
 *
 * Errors keep their kind on the way out: AddressNotFoundError,
 * GeocodeServiceError, NoRouteFoundError, RouteServiceError, InvalidInputError.
 * Nothing is retried here; resilience lives in the providers.
 *
 * The resolver holds no mutable state, so one instance serves all requests.
 * =============================================================================
 */

import {
  AddressNotFoundError,
  AppError,
  GeocodeServiceError,
  InvalidInputError,
  RouteServiceError,
  errorMessage
} from '../../core/errors/AppError';
import { SIZE_CLASSES, isSizeClass } from '../../core/constants';
import { logger } from '../../shared/services/logger.service';
import type { Coordinate, Geocoder } from '../geocoding/geocoding.schema';
import type { RouteProvider, RouteResult, RouteOptions } from '../routing/routing.schema';
import type { PricingService } from '../pricing/pricing.service';
import { Quote, ResolveOptions } from './quote.schema';

export interface QuoteResolverDeps {
  geocoder: Geocoder;
  routeProvider: RouteProvider;
  pricing: PricingService;
}

export class QuoteResolver {
  constructor(private readonly deps: QuoteResolverDeps) {}

  /**
   * Resolve free text to a coordinate
   *
   * @throws AddressNotFoundError for blank text or when the geocoder has no match
   * @throws GeocodeServiceError on network, timeout or malformed responses
   */
  async geocode(addressText: string): Promise<Coordinate> {
    const address = addressText.trim();
    // Blank text never matches; the geocoder is not asked
    if (address.length === 0) {
      throw new AddressNotFoundError(address);
    }

    let coordinate: Coordinate | null;
    try {
      coordinate = await this.deps.geocoder.geocode(address);
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new GeocodeServiceError('Geocoding failed', { reason: errorMessage(error) });
    }

    if (!coordinate) {
      throw new AddressNotFoundError(address);
    }
    return { latitude: coordinate.latitude, longitude: coordinate.longitude };
  }

  /**
   * Road distance in km
   *
   * @throws NoRouteFoundError when the points are not connected
   * @throws RouteServiceError on network, timeout or malformed responses
   */
  async routeDistance(from: Coordinate, to: Coordinate): Promise<number> {
    const result = await this.route(from, to, {});
    return result.distanceKm;
  }

  priceFor(distanceKm: number, size: string): number {
    return this.deps.pricing.priceFor(distanceKm, size);
  }

  async resolve(
    pickupText: string,
    dropoffText: string,
    size: string,
    options: ResolveOptions = {}
  ): Promise<Quote> {
    if (!isSizeClass(size)) {
      throw new InvalidInputError(`Size must be one of ${SIZE_CLASSES.join(', ')}`, { size });
    }

    const pickup = await this.geocode(pickupText);
    const dropoff = await this.geocode(dropoffText);
    const route = await this.route(pickup, dropoff, { includeGeometry: options.includeGeometry === true });
    const price = this.priceFor(route.distanceKm, size);

    logger.info('Quote resolved', {
      distanceKm: route.distanceKm,
      size,
      price,
      source: route.source
    });

    return Object.freeze({
      pickup: Object.freeze(pickup),
      dropoff: Object.freeze(dropoff),
      distanceKm: route.distanceKm,
      size,
      price,
      ...(options.includeGeometry && route.geometry && { geometry: Object.freeze(route.geometry) })
    });
  }

  private async route(from: Coordinate, to: Coordinate, options: RouteOptions): Promise<RouteResult> {
    let result: RouteResult;
    try {
      result = await this.deps.routeProvider.route(from, to, options);
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new RouteServiceError('Routing failed', { reason: errorMessage(error) });
    }

    if (!Number.isFinite(result.distanceKm) || result.distanceKm < 0) {
      throw new RouteServiceError('Routing service returned an invalid distance', { distanceKm: result.distanceKm });
    }
    return result;
  }
}
