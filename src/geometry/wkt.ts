/**
 * @fileoverview Well-Known Text encoding for GeoJSON geometries
 */

import type { Geometry, Position } from "geojson";
import { stringify } from "wellknown";

type Coordinates = Position | Position[] | Position[][] | Position[][][];

const WKT_TAGS: Record<Geometry["type"], string> = {
  Point: "POINT",
  MultiPoint: "MULTIPOINT",
  LineString: "LINESTRING",
  MultiLineString: "MULTILINESTRING",
  Polygon: "POLYGON",
  MultiPolygon: "MULTIPOLYGON",
  GeometryCollection: "GEOMETRYCOLLECTION",
};

/**
 * Number of ordinates in the first position, or 0 when there is none
 */
function coordinateDimension(coordinates: Coordinates): number {
  const head = coordinates[0];
  if (head === undefined) {
    return 0;
  }
  return typeof head === "number" ? coordinates.length : coordinateDimension(head);
}

function geometryDimension(geometry: Geometry): number {
  if (geometry.type === "GeometryCollection") {
    return Math.max(0, ...geometry.geometries.map(geometryDimension));
  }
  return coordinateDimension(geometry.coordinates);
}

function dimensionTag(geometry: Geometry): string {
  const dimension = geometryDimension(geometry);
  if (dimension >= 4) {
    return " ZM";
  }
  return dimension === 3 ? " Z" : "";
}

/**
 * Encode a GeoJSON geometry as Well-Known Text
 *
 * Geometries without positions are written as `<TYPE> EMPTY`, and 3D
 * coordinates carry the `Z` tag.
 *
 * @example
 * ```typescript
 * geometryToWkt({ type: "LineString", coordinates: [[0, 0], [1, 1]] });
 * // "LINESTRING (0 0, 1 1)"
 * geometryToWkt({ type: "Point", coordinates: [1, 2, 3] });
 * // "POINT Z (1 2 3)"
 * ```
 *
 * @throws Error when the geometry type is not a GeoJSON geometry type
 */
export function geometryToWkt(geometry: Geometry): string {
  if (geometry.type === "GeometryCollection") {
    if (geometry.geometries.length === 0) {
      return "GEOMETRYCOLLECTION EMPTY";
    }
    const members = geometry.geometries.map(geometryToWkt).join(", ");
    return `GEOMETRYCOLLECTION${dimensionTag(geometry)} (${members})`;
  }

  // wellknown rejects anything that is not a GeoJSON geometry
  const wkt = stringify(geometry);
  if (geometry.coordinates.length === 0) {
    return `${WKT_TAGS[geometry.type]} EMPTY`;
  }
  return wkt.replace(" (", `${dimensionTag(geometry)} (`);
}
