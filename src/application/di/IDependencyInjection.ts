/**
 * @fileoverview Resolution Container Port
 *
 * @packageDocumentation
 * @module propinject/application/di
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * This file defines the single port through which property boxes reach a
 * dependency-injection container.
 *
 * Application layer:
 * - ✅ **CAN**: Describe how a value is requested from a container
 * - ✅ **CAN**: Define the errors raised when a requested value is missing
 * - ❌ **CANNOT**: Register services, manage scopes or detect cycles
 * - ❌ **CANNOT**: Know which container library sits behind the port
 *
 * ## Architectural Responsibility
 *
 * Registration, lifetimes and dependency-graph resolution belong to the
 * container library. Property injection only ever asks one question:
 *
 * ```
 * resolve(serviceIdentifier, name?) → value | undefined
 * ```
 *
 * Any container that can answer it (an inversify `Container`, a hand-written
 * lookup table in a test) can be used as an injection source.
 *
 * ## Named Lookups
 *
 * A container may hold several definitions for the same identifier,
 * distinguished by name:
 *
 * ```typescript
 * container.bind<Cache>(TYPES.Cache).to(MemoryCache).whenTargetNamed('memory');
 * container.bind<Cache>(TYPES.Cache).to(RedisCache).whenTargetNamed('redis');
 *
 * class ReportService {
 *   cache = new Injected<Cache>(TYPES.Cache, { name: 'redis' });
 * }
 * ```
 */

/**
 * Key under which a container knows a service.
 *
 * @remarks
 * Generic parameters are erased at runtime, so a property box carries the
 * identifier it asks for: a class (abstract or concrete), a string or a
 * symbol token.
 *
 * @example
 * ```typescript
 * const TYPES = { Logger: Symbol.for('Logger') };
 *
 * new Injected(UserRepository);              // T inferred as UserRepository
 * new Injected<ILogger>(TYPES.Logger);       // token, T given explicitly
 * ```
 */
export type ServiceIdentifier<T = unknown> =
  | string
  | symbol
  | (abstract new (...args: any[]) => T);

/**
 * Port to an external dependency-injection container.
 *
 * @remarks
 * Implementations return `undefined` when they have no definition for the
 * identifier (or for the identifier and name). How the container builds the
 * value, which lifetime it applies and how it reports its own failures are
 * not part of this contract: errors other than "not registered" propagate
 * unchanged.
 *
 * @example
 * ```typescript
 * const container: IResolutionContainer = new InversifyResolutionContainer(inversify);
 *
 * const repository = container.resolve(UserRepository);
 * const primary = container.resolve<IDatabase>(TYPES.Database, 'primary');
 * ```
 */
export interface IResolutionContainer {
  /**
   * Resolve a value for the identifier.
   *
   * @param serviceIdentifier - Key the value is registered under
   * @param name - Optional name selecting one of several definitions
   */
  resolve<T>(serviceIdentifier: ServiceIdentifier<T>, name?: string): T | undefined;
}

/**
 * Human-readable form of a service identifier, for logs and error messages.
 */
export function describeServiceIdentifier(
  serviceIdentifier: ServiceIdentifier,
): string {
  if (typeof serviceIdentifier === 'string') {
    return serviceIdentifier;
  }
  if (typeof serviceIdentifier === 'symbol') {
    return serviceIdentifier.description ?? serviceIdentifier.toString();
  }
  return serviceIdentifier.name || 'anonymous';
}

/**
 * Error thrown when code reads a dependency that was never resolved.
 *
 * @remarks
 * The injector itself never throws for an unresolved property; it makes a
 * best-effort pass over every container and moves on. The failure surfaces
 * at the point of use, typically through `Injected#get()`.
 *
 * The `dependencyGraph` shows where in the object graph the missing value
 * was expected:
 *
 * ```
 * └─ ReportService
 *   └─ Cache (UNRESOLVED)
 * ```
 *
 * @example
 * ```typescript
 * try {
 *   service.cache.get().clear();
 * } catch (error) {
 *   if (error instanceof DependencyResolutionError) {
 *     console.error(error.message);
 *     console.error(error.dependencyGraph);
 *   }
 * }
 * ```
 */
export class DependencyResolutionError extends Error {
  /**
   * A string representation of the dependency path leading to the failure.
   */
  public readonly dependencyGraph: string;

  constructor(message: string, dependencyGraph: string = '') {
    super(message);
    this.name = 'DependencyResolutionError';
    this.dependencyGraph = dependencyGraph;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, DependencyResolutionError.prototype);
  }
}

/**
 * Render a dependency path as an indented tree, last entry marked.
 *
 * @example
 * ```typescript
 * buildDependencyGraph(['ReportService'], 'Cache (UNRESOLVED)');
 * // "└─ ReportService\n  └─ Cache (UNRESOLVED)\n"
 * ```
 */
export function buildDependencyGraph(stack: string[], current: string): string {
  let graph = '';
  for (let i = 0; i < stack.length; i++) {
    const indent = '  '.repeat(i);
    const branch = i === stack.length - 1 ? '└─' : '├─';
    graph += `${indent}${branch} ${stack[i]}\n`;
  }
  const indent = '  '.repeat(stack.length);
  graph += `${indent}└─ ${current}\n`;
  return graph;
}
