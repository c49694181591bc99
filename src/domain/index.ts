/**
 * @module propinject/domain
 * @description Domain layer exports
 */

// ============================================================================
// Exceptions
// ============================================================================

export * from './exceptions';
