/**
 * Main components export file
 */

// Shared base classes and utilities
export * from './shared';

// AWS components
export * from './aws';
