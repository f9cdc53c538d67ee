export * from './pricing.schema';
export * from './pricing.service';
export * from './pricing.routes';
