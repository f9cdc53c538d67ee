/**
 * =============================================================================
 * PARCEL QUOTE BACKEND - EXPRESS APPLICATION
 * =============================================================================
 *
 * MODULES:
 * ┌─────────────────────────────────────────────────────────────────────────┐
 * │ QUOTE      │ Address + address + size -> priced quote                   │
 * │ GEOCODING  │ Address autocomplete (Nominatim)                           │
 * │ ROUTING    │ Road distance and route geometry (ORS / OSRM)              │
 * │ PRICING    │ Price breakdown and current tariff                         │
 * └─────────────────────────────────────────────────────────────────────────┘
 *
 * createApp() only assembles middleware and routes around the collaborators
 * it is given; it opens no sockets. server.ts listens, tests use supertest.
 * =============================================================================
 */

import express, { Express } from 'express';
import cors from 'cors';
import compression from 'compression';
import { API_PREFIX } from './core/constants';
import { Container } from './container';
import { createErrorHandler, notFoundHandler } from './shared/middleware/error.middleware';
import { requestLogger } from './shared/middleware/request-logger.middleware';
import { createRateLimiter } from './shared/middleware/rate-limiter.middleware';
import {
  preventParamPollution,
  requestIdMiddleware,
  securityHeaders
} from './shared/middleware/security.middleware';
import { createHealthRoutes } from './shared/routes/health.routes';
import { createGeocodingRoutes, ClientThrottle } from './modules/geocoding';
import { createRoutingRoutes } from './modules/routing';
import { createPricingRoutes } from './modules/pricing';
import { createQuoteRoutes } from './modules/quote';

export interface AppOptions {
  corsOrigin: string | readonly string[];
  rateLimit: { windowMs: number; maxRequests: number };
  exposeInternalErrors: boolean;
  trustProxy: boolean;
  version: string;
  environment: string;
  /** Autocomplete throttle; tests pass their own */
  autocompleteThrottle?: ClientThrottle;
}

export function createApp(container: Container, options: AppOptions): Express {
  const app = express();

  if (options.trustProxy) {
    app.set('trust proxy', 1);
  }

  // ===========================================================================
  // MIDDLEWARE - Security & Performance
  // ===========================================================================

  // Request ID for tracking (must be first)
  app.use(requestIdMiddleware);

  app.use(compression({
    threshold: 1024, // Only compress responses > 1KB (route geometries)
  }));

  app.use(securityHeaders);

  app.use(cors({
    origin: typeof options.corsOrigin === 'string' ? options.corsOrigin : [...options.corsOrigin],
    methods: ['GET', 'POST'],
    allowedHeaders: ['Content-Type', 'X-Request-ID'],
    maxAge: 86400 // 24 hours preflight cache
  }));

  app.use(express.json({ limit: '16kb' }));
  app.use(preventParamPollution);
  app.use(requestLogger);

  // ===========================================================================
  // HEALTH CHECK (not rate limited)
  // ===========================================================================

  app.use(createHealthRoutes({
    cache: container.cache,
    breakers: container.breakers,
    version: options.version,
    environment: options.environment
  }));

  // ===========================================================================
  // API ROUTES
  // ===========================================================================

  app.use(API_PREFIX, createRateLimiter(options.rateLimit));

  app.use(`${API_PREFIX}/quotes`, createQuoteRoutes({ resolver: container.resolver }));
  app.use(`${API_PREFIX}/geocoding`, createGeocodingRoutes({
    geocoder: container.geocoder,
    breaker: container.geocoderBreaker,
    provider: 'nominatim',
    throttle: options.autocompleteThrottle
  }));
  app.use(`${API_PREFIX}/routing`, createRoutingRoutes({ routeProvider: container.routeProvider }));
  app.use(`${API_PREFIX}/pricing`, createPricingRoutes({ pricing: container.pricing }));

  // ===========================================================================
  // ERROR HANDLING
  // ===========================================================================

  app.use(notFoundHandler);
  app.use(createErrorHandler({ exposeInternalErrors: options.exposeInternalErrors }));

  return app;
}
