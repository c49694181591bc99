/**
 * @module propinject/application/di
 * @description Property boxes, the recursive injector and the container port
 */

// ============================================================================
// Container Port
// ============================================================================

export type { IResolutionContainer, ServiceIdentifier } from './IDependencyInjection';

export {
  DependencyResolutionError,
  buildDependencyGraph,
  describeServiceIdentifier,
} from './IDependencyInjection';

// ============================================================================
// Property Boxes
// ============================================================================

export type { IAutoInjectedPropertyBox, PropertyBoxOptions } from './PropertyBox';

export {
  InjectedPropertyBox,
  Injected,
  InjectedWeak,
  isAutoInjectedPropertyBox,
  isWeakReferenceable,
} from './PropertyBox';

// ============================================================================
// Injector
// ============================================================================

/**
 * @example
 * ```typescript
 * import { autoInject, Injected } from 'propinject/application/di';
 *
 * class ReportJob {
 *   mailer = new Injected(Mailer);
 * }
 *
 * const job = autoInject(new ReportJob(), [container]);
 * ```
 */
export type { InjectorOptions } from './AutoInjector';

export { AutoInjector, inject, autoInject } from './AutoInjector';
