/**
 * Central type definitions for the feature formatters
 *
 * This barrel file exports all types for convenient importing:
 * import { EnvironmentConfig, FormatterSerializationError } from '../types';
 */

// Environment types
export * from "./environment";

// Error handling types
export * from "./errors";
