/**
 * @fileoverview Feature Formatter package entry point
 *
 * Converts GeoJSON feature collections into download formats.
 *
 * @example
 * ```typescript
 * import { FormatterFactory } from 'geo-feature-formatter';
 *
 * const formatter = FormatterFactory.createFormatter('csv', { geom: true });
 * const payload = formatter.write({ provider_def: { geom_field: 'wkt' } }, collection);
 * response.setHeader('Content-Type', formatter.mimetype);
 * ```
 */

export * from './formatters';
export * from './output';
export * from './types';
export { geometryToWkt } from './geometry/wkt';
export { environmentConfig, getEnvironmentConfig } from './config/environment';
export { Logger, LogLevel, logger, createCorrelatedLogger } from './utils/logger';
export type { LogContext } from './utils/logger';
