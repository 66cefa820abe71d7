/**
 * @fileoverview Base Formatter Interface
 *
 * This module defines the interface that all output formatters implement and
 * an abstract base class holding the identity every formatter shares.
 */

import { FormatterDefinition, FormatterFeatureCollection, FormatterWriteOptions } from './formatter-types';

/**
 * Interface that all output formatters must implement
 */
export interface IFormatter {
  /**
   * Format name used for lookup, e.g. `csv`
   */
  readonly name: string;

  /**
   * Whether geometry is included in the output
   */
  readonly geom: boolean;

  /**
   * Content type of the produced payload
   */
  readonly mimetype: string;

  /**
   * File extension for downloads of the produced payload
   */
  readonly extension: string;

  /**
   * Format a feature collection
   *
   * @param options - Formatting options, usually the provider definition
   * @param data - The features to format
   * @param correlationId - Identifier attached to logs and errors of this call
   * @returns The formatted payload
   */
  write(
    options: FormatterWriteOptions,
    data: FormatterFeatureCollection,
    correlationId?: string
  ): Buffer;
}

/**
 * Abstract base class providing the shared formatter identity
 */
export abstract class BaseFormatter implements IFormatter {
  abstract readonly mimetype: string;
  abstract readonly extension: string;

  readonly name: string;
  readonly geom: boolean;

  protected constructor(name: string, definition: FormatterDefinition = {}) {
    this.name = name;
    this.geom = definition.geom ?? false;
  }

  abstract write(
    options: FormatterWriteOptions,
    data: FormatterFeatureCollection,
    correlationId?: string
  ): Buffer;

  toString(): string {
    return `<${this.constructor.name}> ${this.name}`;
  }
}
