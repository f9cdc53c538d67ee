/**
 * =============================================================================
 * FALLBACK ROUTE PROVIDER
 * =============================================================================
 *
 * Tries each provider in order:
 * - success               -> returned as is
 * - NoRouteFoundError     -> propagated at once (the service answered)
 * - any other failure     -> logged, next provider
 *
 * When every provider fails, the last failure propagates as a
 * RouteServiceError.
 * =============================================================================
 */

import { NoRouteFoundError, RouteServiceError, errorMessage } from '../../core/errors/AppError';
import { logger } from '../../shared/services/logger.service';
import type { Coordinate } from '../geocoding/geocoding.schema';
import { RouteOptions, RouteProvider, RouteResult } from './routing.schema';

export class FallbackRouteProvider implements RouteProvider {
  readonly name: string;

  constructor(private readonly providers: RouteProvider[]) {
    if (providers.length === 0) {
      throw new Error('FallbackRouteProvider needs at least one provider');
    }
    this.name = providers.map(p => p.name).join('>');
  }

  async route(from: Coordinate, to: Coordinate, options: RouteOptions = {}): Promise<RouteResult> {
    let lastError: RouteServiceError | undefined;

    for (const provider of this.providers) {
      try {
        return await provider.route(from, to, options);
      } catch (error) {
        if (error instanceof NoRouteFoundError) {
          throw error;
        }
        lastError = error instanceof RouteServiceError
          ? error
          : new RouteServiceError('Routing service failed', { provider: provider.name, reason: errorMessage(error) });
        logger.warn(`Route provider ${provider.name} failed, trying next: ${errorMessage(error)}`);
      }
    }

    throw lastError ?? new RouteServiceError('No route provider available');
  }
}
