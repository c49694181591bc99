/**
 * @fileoverview Recursive Property Injector
 *
 * @module propinject/application/di
 *
 * Walks an already constructed object, finds its property boxes and fills
 * them from an ordered list of containers.
 *
 * ## Walk Order
 *
 * ```
 * autoInject(client, [primary, fallback])
 *   client.service  (Injected<Service>)
 *     primary.resolve(Service)   → undefined
 *     fallback.resolve(Service)  → service   ← first success wins
 *     └─ walk service
 *          service.client (InjectedWeak<Client>)
 *            primary.resolve(Client) → client
 *            (weak: not walked)
 *   client.settings  (plain object)
 *     └─ walk settings
 *          settings.store (Injected<Store>) ...
 * ```
 *
 * Children of a value are the own enumerable properties of an object, the
 * elements of an array and the values of a `Map` or `Set`. Primitives,
 * functions and binary buffers have none.
 *
 * ## What the Injector Does Not Do
 *
 * - It never throws for an unresolved property. A required box that no
 *   container can fill is logged at `warn` and left empty; code reading it
 *   later fails on its own (see `Injected#get()`).
 * - It does not detect cycles between boxes. Two `Injected` boxes whose
 *   values refer back to each other are walked without end; make one side
 *   an `InjectedWeak`. Plain references back to an object already on the
 *   current walk path are not followed.
 */

import { ILogger, silentLogger } from '../logging';
import {
  IResolutionContainer,
  buildDependencyGraph,
} from './IDependencyInjection';
import { IAutoInjectedPropertyBox, isAutoInjectedPropertyBox } from './PropertyBox';

/**
 * Injector configuration
 */
export interface InjectorOptions {
  /** Logger for resolution traces (default: silent) */
  logger?: ILogger;

  /**
   * Lookup name used by boxes that do not set their own `name`
   * (default: none)
   */
  tag?: string;
}

type Child = [key: string, value: unknown];

function isWalkable(value: unknown): value is object {
  return (
    typeof value === 'object' &&
    value !== null &&
    !ArrayBuffer.isView(value) &&
    !(value instanceof ArrayBuffer)
  );
}

function childrenOf(subject: object): Child[] {
  if (Array.isArray(subject)) {
    const items: unknown[] = subject;
    return items.map((item, index): Child => [`[${index}]`, item]);
  }
  if (subject instanceof Map) {
    const entries: Array<[unknown, unknown]> = Array.from(subject.entries());
    return entries.map(([key, value]): Child => [String(key), value]);
  }
  if (subject instanceof Set) {
    const items: unknown[] = Array.from(subject.values());
    return items.map((item, index): Child => [`[${index}]`, item]);
  }
  const entries: Array<[string, unknown]> = Object.entries(subject);
  return entries;
}

function describeObject(subject: object): string {
  const ctor: unknown = subject.constructor;
  return typeof ctor === 'function' && ctor.name ? ctor.name : 'Object';
}

/**
 * AutoInjector - fills property boxes reachable from a target object
 *
 * @example
 * ```typescript
 * const injector = new AutoInjector([requestContainer, appContainer], {
 *   logger: consoleLogger,
 * });
 *
 * const controller = injector.inject(new OrderController());
 * ```
 */
export class AutoInjector {
  private readonly containers: readonly IResolutionContainer[];
  private readonly logger: ILogger;
  private readonly tag: string | undefined;

  constructor(containers: readonly IResolutionContainer[], options: InjectorOptions = {}) {
    this.containers = [...containers];
    this.logger = options.logger ?? silentLogger;
    this.tag = options.tag;
  }

  /**
   * Inject every property box reachable from `target`.
   *
   * @returns `target` itself
   */
  inject<T>(target: T): T {
    if (isWalkable(target)) {
      this.walk(target, []);
    }
    return target;
  }

  private walk(subject: object, path: readonly object[]): void {
    const trail = [...path, subject];

    for (const [key, child] of childrenOf(subject)) {
      if (isAutoInjectedPropertyBox(child)) {
        this.injectProperty(key, child, trail);
      } else if (isWalkable(child) && !trail.includes(child)) {
        this.walk(child, trail);
      }
    }
  }

  private injectProperty(
    key: string,
    box: IAutoInjectedPropertyBox,
    trail: readonly object[],
  ): void {
    for (let index = 0; index < this.containers.length; index++) {
      if (!box.resolve(this.containers[index], this.tag)) {
        continue;
      }

      this.logger.debug(
        `Injected '${key}' on ${describeObject(trail[trail.length - 1])} from container #${index}`,
      );

      if (box.cascades) {
        const value = box.currentValueErased();
        if (isWalkable(value)) {
          this.walk(value, trail);
        }
      }
      return;
    }

    if (box.required) {
      this.logger.warn(
        `Required property '${key}' could not be resolved from ${this.containers.length} container(s)`,
        buildDependencyGraph(trail.map(describeObject), `${key} (UNRESOLVED)`),
      );
    }
  }
}

/**
 * Inject every property box reachable from `target`, trying `containers`
 * in order for each box.
 *
 * @returns `target` itself
 */
export function inject<T>(
  target: T,
  containers: readonly IResolutionContainer[],
  options?: InjectorOptions,
): T {
  return new AutoInjector(containers, options).inject(target);
}

/**
 * Inject `target` and return it, so construction and injection fit in one
 * expression.
 *
 * @example
 * ```typescript
 * const client = autoInject(new ClientImpl(), [container]);
 * ```
 */
export function autoInject<T>(
  target: T,
  containers: readonly IResolutionContainer[],
  options?: InjectorOptions,
): T {
  return inject(target, containers, options);
}
