/**
 * @fileoverview CSV column layout and row construction
 *
 * The header is taken from the first feature only. Later features with keys
 * the first one lacks are handled by the writer's extra-field policy, and keys
 * they are missing come out as empty cells.
 */

import { geometryToWkt } from "../geometry/wkt";
import { CsvRow, CsvWriteError } from "../output/csv-row-writer";
import type { FormatterFeature, ResolvedCsvOptions } from "./base/formatter-types";

export const ID_COLUMN = "id";

/**
 * Columns of one CSV write, in header order
 */
export interface CsvColumnLayout {
  fields: string[];
  /** Set when point geometries are flattened into two columns */
  point: { latColumn: string; lonColumn: string } | null;
  /** Set when geometries are written as WKT */
  geometryColumn: string | null;
  includeId: boolean;
}

/**
 * Derive the header from the first feature
 *
 * Computed columns lead: `id`, then either the two point columns or the WKT
 * column, then the first feature's property keys in their own order. A
 * property named like a computed column is not repeated.
 */
export function deriveColumnLayout(
  firstFeature: FormatterFeature,
  options: ResolvedCsvOptions,
  includeGeometry: boolean,
): CsvColumnLayout {
  const computed: string[] = [];
  let point: CsvColumnLayout["point"] = null;
  let geometryColumn: string | null = null;

  if (includeGeometry) {
    if (firstFeature.geometry?.type === "Point") {
      point = { latColumn: options.latColumn, lonColumn: options.lonColumn };
      computed.push(options.latColumn, options.lonColumn);
    } else {
      geometryColumn = options.geometryField;
      computed.push(options.geometryField);
    }
  }

  if (options.includeId) {
    computed.unshift(ID_COLUMN);
  }

  const propertyKeys = Object.keys(firstFeature.properties ?? {}).filter(
    (key) => !computed.includes(key),
  );

  return {
    fields: [...computed, ...propertyKeys],
    point,
    geometryColumn,
    includeId: options.includeId,
  };
}

/**
 * Build a fresh row for one feature; the feature itself is left untouched
 *
 * With point columns in use, any geometry carrying coordinates fills them from
 * `coordinates[0]` and `coordinates[1]`, so a later line or polygon writes its
 * first two positions there. A geometry collection leaves them empty.
 *
 * @throws CsvWriteError when a geometry cannot be encoded as WKT
 */
export function buildFeatureRow(
  feature: FormatterFeature,
  layout: CsvColumnLayout,
): CsvRow {
  const row: CsvRow = { ...(feature.properties ?? {}) };
  const geometry = feature.geometry ?? null;

  if (layout.point) {
    if (geometry !== null && geometry.type !== "GeometryCollection") {
      row[layout.point.latColumn] = geometry.coordinates[0];
      row[layout.point.lonColumn] = geometry.coordinates[1];
    }
  } else if (layout.geometryColumn !== null && geometry !== null) {
    try {
      row[layout.geometryColumn] = geometryToWkt(geometry);
    } catch (error) {
      throw new CsvWriteError(
        `Unable to encode geometry as WKT`,
        layout.geometryColumn,
        error,
      );
    }
  }

  if (layout.includeId) {
    row[ID_COLUMN] = feature.id;
  }

  return row;
}
