/**
 * @module propinject/infrastructure
 * @description Infrastructure layer exports
 */

// ============================================================================
// Container Adapters
// ============================================================================

export * from './container';
