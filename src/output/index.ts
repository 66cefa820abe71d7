/**
 * @fileoverview Output Generation Module
 *
 * Exports the low-level CSV row writer used by the formatters.
 */

export { CsvRowWriter, CsvWriteError } from './csv-row-writer';

export type {
  CsvRow,
  CsvRowWriterConfig,
  ExtraFieldsPolicy,
} from './csv-row-writer';
