/**
 * =============================================================================
 * QUOTE MODULE
 * =============================================================================
 *
 * The quoting core: QuoteResolver chains geocoding, routing and pricing.
 * All collaborators are injected; see src/container.ts for the wiring.
 * =============================================================================
 */

export * from './quote.schema';
export * from './quote.service';
export * from './quote.routes';
