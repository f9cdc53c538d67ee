/**
 * =============================================================================
 * PRICING MODULE - SERVICE
 * =============================================================================
 *
 * Deterministic parcel pricing. Pure arithmetic over the PricingConfig it
 * was built with: no I/O, no clock, no shared state.
 *
 * ROUNDING:
 * Only the distance charge is rounded (half-up, 2 decimals); the base fee is
 * added as configured, so a zero distance costs exactly the base fee.
 * Rounding is monotone, so a longer distance never gives a lower price.
 * =============================================================================
 */

import { InvalidInputError } from '../../core/errors/AppError';
import { SizeClass, SIZE_CLASSES, isSizeClass } from '../../core/constants';
import { roundTo } from '../../shared/utils/geospatial.utils';
import { PriceBreakdown, PricingConfig, pricingConfigSchema } from './pricing.schema';

/**
 * Sum to 15 significant digits: 0.1 + 0.2 gives 0.3, and every configured
 * decimal of the base fee survives.
 */
function addAmounts(a: number, b: number): number {
  return Number((a + b).toPrecision(15));
}

export class PricingService {
  private readonly config: PricingConfig;

  constructor(config: PricingConfig) {
    const parsed = pricingConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw new InvalidInputError('Invalid pricing configuration', {
        issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
      });
    }
    this.config = Object.freeze({
      ...parsed.data,
      sizeMultiplier: Object.freeze({ ...parsed.data.sizeMultiplier })
    });
  }

  /**
   * Price for a distance and size class
   *
   * @throws InvalidInputError for negative/non-finite distance or unknown size
   */
  priceFor(distanceKm: number, size: string): number {
    return this.breakdown(distanceKm, size).total;
  }

  /**
   * Itemised price, for display next to the quote
   */
  breakdown(distanceKm: number, size: string): PriceBreakdown {
    if (!Number.isFinite(distanceKm) || distanceKm < 0) {
      throw new InvalidInputError('Distance must be a finite, non-negative number', { distanceKm });
    }
    if (!isSizeClass(size)) {
      throw new InvalidInputError(`Size must be one of ${SIZE_CLASSES.join(', ')}`, { size });
    }

    const { baseFee, ratePerKm } = this.config;
    const sizeMultiplier = this.multiplierFor(size);
    const distanceCharge = roundTo(distanceKm * ratePerKm * sizeMultiplier, 2);

    return {
      distanceKm,
      size,
      baseFee,
      ratePerKm,
      sizeMultiplier,
      distanceCharge,
      total: addAmounts(baseFee, distanceCharge)
    };
  }

  multiplierFor(size: SizeClass): number {
    return this.config.sizeMultiplier[size];
  }

  getConfig(): PricingConfig {
    return this.config;
  }
}
