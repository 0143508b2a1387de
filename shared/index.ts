// ============================================================================
// SHARED MODULE EXPORTS
// ============================================================================

// Export all types
export * from './types/index';

// Export error handling utilities using neverthrow
export * from './utils/errorHandler';

// Export date utility functions
export * from './utils/dateUtils';
