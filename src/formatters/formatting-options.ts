/**
 * @fileoverview Formatting option resolution
 *
 * Reads the optional, nested provider definition once and returns an explicit
 * options object with every default applied.
 */

import { FormatterConfigurationError } from "../types/errors";
import type { ExtraFieldsPolicy } from "../output/csv-row-writer";
import type {
  CsvFormattingOptions,
  FormatterWriteOptions,
  ProviderDefinition,
  ResolvedCsvOptions,
} from "./base/formatter-types";

/**
 * Defaults for CSV formatting options
 */
export const CSV_OPTION_DEFAULTS: Readonly<ResolvedCsvOptions> = {
  geometryField: "coordinates",
  includeId: true,
  latColumn: "x",
  lonColumn: "y",
  extraFields: "raise",
};

const EXTRA_FIELDS_POLICIES: readonly ExtraFieldsPolicy[] = ["raise", "ignore"];

function readColumnName(
  value: unknown,
  fallback: string,
  configKey: string,
  correlationId: string,
): string {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== "string" || value.length === 0) {
    throw new FormatterConfigurationError(
      `${configKey} must be a non-empty string`,
      correlationId,
      configKey,
      { received: typeof value },
    );
  }
  return value;
}

function readIncludeId(value: unknown, correlationId: string): boolean {
  if (value === undefined) {
    return CSV_OPTION_DEFAULTS.includeId;
  }
  if (typeof value !== "boolean") {
    throw new FormatterConfigurationError(
      "include_id must be a boolean",
      correlationId,
      "include_id",
      { received: typeof value },
    );
  }
  return value;
}

function readExtraFields(value: unknown, correlationId: string): ExtraFieldsPolicy {
  if (value === undefined) {
    return CSV_OPTION_DEFAULTS.extraFields;
  }
  const policy = EXTRA_FIELDS_POLICIES.find((candidate) => candidate === value);
  if (policy === undefined) {
    throw new FormatterConfigurationError(
      `extra_fields must be one of: ${EXTRA_FIELDS_POLICIES.join(", ")}`,
      correlationId,
      "extra_fields",
      { received: String(value) },
    );
  }
  return policy;
}

/**
 * Resolve CSV formatting options from a provider definition
 *
 * @throws FormatterConfigurationError when an option has the wrong type, a
 * column name is empty, or the point columns share a name
 */
export function resolveCsvFormattingOptions(
  options: FormatterWriteOptions,
  correlationId: string,
): ResolvedCsvOptions {
  const providerDef: ProviderDefinition = options.provider_def ?? {};
  const csvOptions: CsvFormattingOptions = providerDef.csv_formatting_options ?? {};

  const resolved: ResolvedCsvOptions = {
    geometryField: readColumnName(
      providerDef.geom_field,
      CSV_OPTION_DEFAULTS.geometryField,
      "geom_field",
      correlationId,
    ),
    includeId: readIncludeId(csvOptions.include_id, correlationId),
    latColumn: readColumnName(
      csvOptions.lat_colname,
      CSV_OPTION_DEFAULTS.latColumn,
      "lat_colname",
      correlationId,
    ),
    lonColumn: readColumnName(
      csvOptions.lon_colname,
      CSV_OPTION_DEFAULTS.lonColumn,
      "lon_colname",
      correlationId,
    ),
    extraFields: readExtraFields(csvOptions.extra_fields, correlationId),
  };

  if (resolved.latColumn === resolved.lonColumn) {
    throw new FormatterConfigurationError(
      `lat_colname and lon_colname must differ (both "${resolved.latColumn}")`,
      correlationId,
      "lon_colname",
    );
  }

  return resolved;
}
