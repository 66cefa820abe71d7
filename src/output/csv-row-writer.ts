/**
 * @fileoverview CSV Row Writer
 *
 * Writes a header and dictionary rows against a fixed column list. Cell values
 * are normalized to strings here; quoting and escaping are delegated to
 * csv-stringify. Rows are accumulated in memory and only handed out once the
 * caller asks for the finished payload.
 */

import { stringify } from "csv-stringify/sync";
import type { Options as StringifyOptions } from "csv-stringify";

/**
 * What to do with row keys that are not part of the header
 * - `raise`: fail the row
 * - `ignore`: drop the extra keys
 */
export type ExtraFieldsPolicy = "raise" | "ignore";

/**
 * Configuration options for the row writer
 */
export interface CsvRowWriterConfig {
  /** Field delimiter (default: ',') */
  delimiter?: string;
  /** Record terminator, also written after the last row (default: '\r\n') */
  lineEnding?: "\n" | "\r\n";
  /** Whether to quote all fields (default: false - only quote when necessary) */
  quoteAll?: boolean;
  /** Handling of row keys missing from the header (default: 'raise') */
  extraFields?: ExtraFieldsPolicy;
}

export type CsvRow = Record<string, unknown>;

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Error raised when a row cannot be written
 */
export class CsvWriteError extends Error {
  public readonly field?: string;

  constructor(message: string, field?: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "CsvWriteError";
    this.field = field;
  }
}

/**
 * Accumulating CSV writer with a column set fixed at construction
 */
export class CsvRowWriter {
  private readonly columns: readonly string[];
  private readonly columnSet: ReadonlySet<string>;
  private readonly config: Required<CsvRowWriterConfig>;
  private readonly chunks: string[] = [];
  private writtenRows = 0;

  constructor(columns: readonly string[], config: CsvRowWriterConfig = {}) {
    this.columns = [...columns];
    this.columnSet = new Set(columns);
    this.config = {
      ...CsvRowWriter.getDefaultConfig(),
      ...config,
    };
  }

  /**
   * Number of data rows written so far (header excluded)
   */
  get rowCount(): number {
    return this.writtenRows;
  }

  writeHeader(): void {
    this.chunks.push(this.stringifyCells(this.columns));
  }

  /**
   * Write one row; cells missing from the row are left empty
   *
   * @throws CsvWriteError when a value cannot be encoded, or when the row has
   * keys outside the header and the policy is `raise`
   */
  writeRow(row: CsvRow): void {
    if (this.config.extraFields === "raise") {
      const extra = Object.keys(row).filter((key) => !this.columnSet.has(key));
      if (extra.length > 0) {
        throw new CsvWriteError(
          `Row contains fields not in header: ${extra.join(", ")}`,
          extra[0],
        );
      }
    }

    const cells = this.columns.map((column) =>
      this.formatValue(row[column], column),
    );
    // a lone empty cell would read back as a blank line, which readers skip
    const line =
      cells.length === 1 && cells[0] === ""
        ? `""${this.config.lineEnding}`
        : this.stringifyCells(cells);
    this.chunks.push(line);
    this.writtenRows++;
  }

  toString(): string {
    return this.chunks.join("");
  }

  /**
   * The written CSV as UTF-8 bytes
   */
  toBuffer(): Buffer {
    return Buffer.from(this.toString(), "utf8");
  }

  private stringifyCells(cells: readonly string[]): string {
    const options: StringifyOptions = {
      delimiter: this.config.delimiter,
      record_delimiter: this.config.lineEnding,
      quoted: this.config.quoteAll,
      // csv-stringify only checks for the full record delimiter
      quoted_match: /[\r\n]/,
    };

    try {
      return stringify([[...cells]], options);
    } catch (error) {
      throw new CsvWriteError(
        `Unable to stringify row: ${describeError(error)}`,
        undefined,
        error,
      );
    }
  }

  /**
   * Format a value for CSV output
   */
  private formatValue(value: unknown, field: string): string {
    if (value === null || value === undefined) {
      return "";
    }

    if (typeof value === "string") {
      return value;
    }

    if (typeof value === "number" || typeof value === "bigint") {
      return value.toString();
    }

    if (typeof value === "boolean") {
      return value ? "true" : "false";
    }

    if (value instanceof Date) {
      if (Number.isNaN(value.getTime())) {
        throw new CsvWriteError(`Invalid date in field "${field}"`, field);
      }
      return value.toISOString();
    }

    if (typeof value === "object") {
      try {
        return JSON.stringify(value);
      } catch (error) {
        throw new CsvWriteError(
          `Unable to encode value of field "${field}": ${describeError(error)}`,
          field,
          error,
        );
      }
    }

    throw new CsvWriteError(
      `Unable to encode value of type ${typeof value} in field "${field}"`,
      field,
    );
  }

  /**
   * Get default configuration
   */
  static getDefaultConfig(): Required<CsvRowWriterConfig> {
    return {
      delimiter: ",",
      lineEnding: "\r\n",
      quoteAll: false,
      extraFields: "raise",
    };
  }
}
