/**
 * @fileoverview Formatters Module
 *
 * Exports the output formatters, their shared base and the formatter factory.
 */

export { BaseFormatter } from './base/formatter-interface';
export type { IFormatter } from './base/formatter-interface';
export type {
  CsvFormattingOptions,
  FormatterDefinition,
  FormatterFeature,
  FormatterFeatureCollection,
  FormatterWriteOptions,
  ProviderDefinition,
  ResolvedCsvOptions,
} from './base/formatter-types';

export {
  CSVFormatter,
  CSV_FORMAT_NAME,
  CSV_MIMETYPE,
  formatFeaturesAsCsv,
} from './csv-formatter';

export { buildFeatureRow, deriveColumnLayout, ID_COLUMN } from './csv-columns';
export type { CsvColumnLayout } from './csv-columns';

export { CSV_OPTION_DEFAULTS, resolveCsvFormattingOptions } from './formatting-options';

export { FormatterFactory, createFormatter } from './formatter-factory';
export type { FormatterConstructor } from './formatter-factory';
