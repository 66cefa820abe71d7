/**
 * @fileoverview Formatter Factory Implementation
 *
 * Registry of output formatters keyed by format name. Feature services look
 * formatters up by the name given in their configuration.
 */

import { IFormatter } from './base/formatter-interface';
import { FormatterDefinition } from './base/formatter-types';
import { CSVFormatter, CSV_FORMAT_NAME } from './csv-formatter';
import { UnsupportedFormatError, generateCorrelationId } from '../types/errors';

export type FormatterConstructor = (definition: FormatterDefinition) => IFormatter;

/**
 * Formatter factory for creating formatters by name
 */
export class FormatterFactory {
  private static readonly formatters = new Map<string, FormatterConstructor>([
    [CSV_FORMAT_NAME, (definition) => new CSVFormatter(definition)],
  ]);

  /**
   * Get all registered format names
   */
  static getSupportedFormats(): string[] {
    return Array.from(this.formatters.keys());
  }

  /**
   * Create a formatter for the given format name (case-insensitive)
   *
   * @throws UnsupportedFormatError if no formatter is registered under the name
   */
  static createFormatter(
    formatName: string,
    definition: FormatterDefinition = {},
    correlationId: string = generateCorrelationId()
  ): IFormatter {
    const create = this.formatters.get(formatName.toLowerCase());

    if (!create) {
      throw new UnsupportedFormatError(formatName, this.getSupportedFormats(), correlationId);
    }

    return create(definition);
  }

  static isFormatSupported(formatName: string): boolean {
    return this.formatters.has(formatName.toLowerCase());
  }

  /**
   * Register a formatter, replacing any existing one with the same name
   */
  static registerFormatter(formatName: string, create: FormatterConstructor): void {
    this.formatters.set(formatName.toLowerCase(), create);
  }

  static unregisterFormatter(formatName: string): void {
    this.formatters.delete(formatName.toLowerCase());
  }
}

/**
 * Convenience function to create a formatter
 */
export function createFormatter(
  formatName: string,
  definition: FormatterDefinition = {}
): IFormatter {
  return FormatterFactory.createFormatter(formatName, definition);
}
