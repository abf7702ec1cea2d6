/**
 * Shared Components
 * Base classes, interfaces, and utilities
 */

export * from './base';
export * from './interfaces';
export * from './utils';
