/**
 * @fileoverview Formatter Type Definitions
 *
 * Shared input and configuration types for the output formatters. Features
 * follow GeoJSON; the formatting options follow the provider definition of a
 * feature collection, where CSV specific settings live under
 * `csv_formatting_options`.
 */

import type { Feature, FeatureCollection, GeoJsonProperties, Geometry } from 'geojson';
import type { ExtraFieldsPolicy } from '../../output/csv-row-writer';

/**
 * Feature accepted by formatters; the geometry may be null or left out
 */
export type FormatterFeature = Omit<Feature<Geometry | null, GeoJsonProperties>, 'geometry'> & {
  geometry?: Geometry | null;
};

export type FormatterFeatureCollection = Omit<FeatureCollection, 'features'> & {
  features: FormatterFeature[];
};

/**
 * Construction-time definition of a formatter
 */
export interface FormatterDefinition {
  /** Whether geometry is written at all (default: false) */
  geom?: boolean;
}

/**
 * CSV specific options of a provider definition
 */
export interface CsvFormattingOptions {
  /** Emit an `id` column (default: true) */
  include_id?: boolean;
  /** Column receiving coordinate index 0 of point geometries (default: 'x') */
  lat_colname?: string;
  /** Column receiving coordinate index 1 of point geometries (default: 'y') */
  lon_colname?: string;
  /** Handling of properties missing from the header (default: 'raise') */
  extra_fields?: ExtraFieldsPolicy;
}

/**
 * Provider definition keys read by formatters
 */
export interface ProviderDefinition {
  /** Column holding WKT for non-point geometries (default: 'coordinates') */
  geom_field?: string;
  csv_formatting_options?: CsvFormattingOptions;
}

/**
 * Options passed to `write`
 */
export interface FormatterWriteOptions {
  provider_def?: ProviderDefinition;
}

/**
 * CSV options with every default applied
 */
export interface ResolvedCsvOptions {
  geometryField: string;
  includeId: boolean;
  latColumn: string;
  lonColumn: string;
  extraFields: ExtraFieldsPolicy;
}
