/**
 * =============================================================================
 * PRICING SERVICE - Unit Tests
 * =============================================================================
 *
 * price = baseFee + distanceKm * ratePerKm * sizeMultiplier[size]
 * =============================================================================
 */

import { PricingService } from '../modules/pricing/pricing.service';
import { DEFAULT_PRICING_CONFIG } from '../modules/pricing/pricing.schema';
import { InvalidInputError } from '../core/errors/AppError';
import { SIZE_CLASSES } from '../core/constants';
import { TEST_PRICING } from './helpers/fakes';

describe('PricingService', () => {
  const pricing = new PricingService(TEST_PRICING);

  describe('priceFor', () => {
    it('prices 95 km for size M at 153.2', () => {
      expect(pricing.priceFor(95, 'M')).toBe(153.2);
    });

    it('charges only the base fee for zero distance', () => {
      expect(pricing.priceFor(0, 'S')).toBe(5);
      expect(pricing.priceFor(0, 'L')).toBe(5);
    });

    it('applies the size multiplier to the distance charge only', () => {
      expect(pricing.priceFor(10, 'S')).toBe(17);
      expect(pricing.priceFor(10, 'M')).toBe(20.6);
      expect(pricing.priceFor(10, 'L')).toBe(24.2);
    });

    it('rounds to two decimals', () => {
      // 5 + 0.333 * 1.2 * 1.3 = 5.51948
      expect(pricing.priceFor(0.333, 'M')).toBe(5.52);
    });

    it('keeps a base fee with more than two decimals exact', () => {
      const fine = new PricingService({ ...TEST_PRICING, baseFee: 2.499 });

      expect(fine.priceFor(0, 'S')).toBe(2.499);
      expect(fine.priceFor(0, 'L')).toBe(2.499);
      // 2.499 + 10 * 1.2
      expect(fine.priceFor(10, 'S')).toBe(14.499);
    });

    it('does not round a sub-cent base fee away', () => {
      const tiny = new PricingService({ ...TEST_PRICING, baseFee: 0.004 });

      expect(tiny.priceFor(0, 'S')).toBe(0.004);
    });

    it('adds decimal amounts without float noise', () => {
      const odd = new PricingService({ ...TEST_PRICING, baseFee: 0.1, ratePerKm: 0.2 });

      // 0.1 + 0.2 is 0.30000000000000004 in plain float arithmetic
      expect(odd.priceFor(1, 'S')).toBe(0.3);
    });

    it('stays non-decreasing with a sub-cent base fee', () => {
      const fine = new PricingService({ ...TEST_PRICING, baseFee: 2.499 });
      const prices = [0, 0.001, 0.004, 0.01, 1, 33.333].map(d => fine.priceFor(d, 'M'));
      for (let i = 1; i < prices.length; i++) {
        expect(prices[i]).toBeGreaterThanOrEqual(prices[i - 1] ?? 0);
      }
    });

    it('never decreases as distance grows, for every size class', () => {
      const distances = [0, 0.001, 0.5, 1, 7.77, 42, 95, 100.004, 250, 1000, 5000];
      for (const size of SIZE_CLASSES) {
        const prices = distances.map(d => pricing.priceFor(d, size));
        for (let i = 1; i < prices.length; i++) {
          expect(prices[i]).toBeGreaterThanOrEqual(prices[i - 1] ?? 0);
        }
      }
    });

    it('is ordered S <= M <= L for the same distance', () => {
      expect(pricing.priceFor(50, 'S')).toBeLessThanOrEqual(pricing.priceFor(50, 'M'));
      expect(pricing.priceFor(50, 'M')).toBeLessThanOrEqual(pricing.priceFor(50, 'L'));
    });

    it.each([-1, -0.01, Number.NaN, Number.POSITIVE_INFINITY])('rejects distance %p', (distance) => {
      expect(() => pricing.priceFor(distance, 'S')).toThrow(InvalidInputError);
    });

    it.each(['XL', 's', '', 'SMALL'])('rejects size %p', (size) => {
      expect(() => pricing.priceFor(10, size)).toThrow(InvalidInputError);
    });
  });

  describe('breakdown', () => {
    it('itemises the worked example', () => {
      expect(pricing.breakdown(95, 'M')).toEqual({
        distanceKm: 95,
        size: 'M',
        baseFee: 5,
        ratePerKm: 1.2,
        sizeMultiplier: 1.3,
        distanceCharge: 148.2,
        total: 153.2
      });
    });
  });

  describe('configuration', () => {
    it('ships the documented defaults', () => {
      expect(DEFAULT_PRICING_CONFIG).toEqual({
        baseFee: 5.0,
        ratePerKm: 1.2,
        sizeMultiplier: { S: 1.0, M: 1.3, L: 1.6 }
      });
    });

    it('rejects a negative base fee', () => {
      expect(() => new PricingService({ ...TEST_PRICING, baseFee: -1 })).toThrow(InvalidInputError);
    });

    it('rejects a zero size multiplier', () => {
      expect(() => new PricingService({
        ...TEST_PRICING,
        sizeMultiplier: { S: 0, M: 1.3, L: 1.6 }
      })).toThrow(InvalidInputError);
    });

    it('keeps its own copy of the configuration', () => {
      const source = { ...TEST_PRICING, sizeMultiplier: { ...TEST_PRICING.sizeMultiplier } };
      const service = new PricingService(source);
      source.sizeMultiplier.M = 10;
      expect(service.priceFor(95, 'M')).toBe(153.2);
    });
  });
});
