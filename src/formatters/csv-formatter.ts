/**
 * @fileoverview CSV Formatter
 *
 * Writes a GeoJSON feature collection as CSV. Properties become columns;
 * point geometries can be flattened into two coordinate columns, any other
 * geometry is written as WKT in a single column.
 *
 * @example
 * ```typescript
 * const formatter = new CSVFormatter({ geom: true });
 * const csv = formatter.write(
 *   { provider_def: { csv_formatting_options: { include_id: false } } },
 *   featureCollection,
 * );
 * ```
 */

import { Logger } from "../utils/logger";
import { CsvRowWriter, CsvWriteError } from "../output/csv-row-writer";
import { FormatterSerializationError, generateCorrelationId } from "../types/errors";
import { BaseFormatter } from "./base/formatter-interface";
import type {
  FormatterDefinition,
  FormatterFeatureCollection,
  FormatterWriteOptions,
} from "./base/formatter-types";
import { buildFeatureRow, deriveColumnLayout } from "./csv-columns";
import { resolveCsvFormattingOptions } from "./formatting-options";

export const CSV_FORMAT_NAME = "csv";

export const CSV_MIMETYPE = "text/csv; charset=utf-8";

/**
 * CSV output formatter
 *
 * Instances hold no per-call state and can be shared between callers.
 */
export class CSVFormatter extends BaseFormatter {
  readonly mimetype = CSV_MIMETYPE;
  readonly extension = "csv";

  private readonly logger: Logger;

  constructor(definition: FormatterDefinition = {}, logger?: Logger) {
    super(CSV_FORMAT_NAME, definition);
    this.logger = logger || new Logger("CSVFormatter");
  }

  /**
   * Generate CSV from a feature collection
   *
   * The header comes from the first feature. An empty collection yields an
   * empty payload.
   *
   * @throws FormatterSerializationError when a row cannot be written; no
   * partial output is returned
   * @throws FormatterConfigurationError when the formatting options are invalid
   */
  write(
    options: FormatterWriteOptions,
    data: FormatterFeatureCollection,
    correlationId: string = generateCorrelationId(),
  ): Buffer {
    const log = this.logger.child({ correlationId, formatName: this.name });
    const resolved = resolveCsvFormattingOptions(options, correlationId);

    const features = data.features;
    if (features.length === 0) {
      log.warn("No features to write");
      return Buffer.alloc(0);
    }

    if (this.geom) {
      log.debug("Including geometry", {
        geometryType: features[0].geometry?.type ?? null,
      });
    }

    const layout = deriveColumnLayout(features[0], resolved, this.geom);
    log.debug("CSV fields", { fields: layout.fields });

    const writer = new CsvRowWriter(layout.fields, {
      extraFields: resolved.extraFields,
    });
    let rowIndex = 0;

    try {
      writer.writeHeader();

      for (const feature of features) {
        const row = buildFeatureRow(feature, layout);
        writer.writeRow(row);
        log.debug("Wrote row", { rowIndex, row });
        rowIndex++;
      }
    } catch (error) {
      if (!(error instanceof CsvWriteError)) {
        throw error;
      }

      const serializationError = new FormatterSerializationError(
        "Error writing CSV output",
        correlationId,
        this.name,
        rowIndex,
        error,
        { field: error.field },
      );
      log.error("CSV serialization failed", error, {
        rowIndex,
        field: error.field,
      });
      throw serializationError;
    }

    const payload = writer.toBuffer();
    log.info("CSV generation completed", {
      recordCount: writer.rowCount,
      fieldCount: layout.fields.length,
      outputSizeBytes: payload.length,
    });

    return payload;
  }
}

/**
 * Convenience function to format a feature collection as CSV
 */
export function formatFeaturesAsCsv(
  data: FormatterFeatureCollection,
  options: FormatterWriteOptions = {},
  definition: FormatterDefinition = {},
): Buffer {
  return new CSVFormatter(definition).write(options, data);
}
