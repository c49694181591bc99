/**
 * @fileoverview Auto-injected Property Boxes
 *
 * @module propinject/application/di
 *
 * A property box marks a field as "to be filled by the container". The
 * enclosing object creates the box empty; the injector later finds it while
 * walking the object and asks each container in turn to resolve it.
 *
 * ```typescript
 * class ClientImpl implements Client {
 *   service = new Injected(ServiceImpl);
 * }
 *
 * class ServiceImpl implements Service {
 *   // weak side of a circular pair, avoids a strong reference cycle
 *   client = new InjectedWeak(ClientImpl);
 * }
 *
 * const client = autoInject(new ClientImpl(), [container]);
 * client.service.get().client.value === client; // true while client is alive
 * ```
 *
 * Do not declare box fields as optional; give them an initial box instead,
 * or the injector has nothing to find.
 */

import {
  RequiredPropertyException,
  WeakReferenceException,
} from '../../domain/exceptions';
import {
  DependencyResolutionError,
  IResolutionContainer,
  ServiceIdentifier,
  buildDependencyGraph,
  describeServiceIdentifier,
} from './IDependencyInjection';

/**
 * Capability shared by every property box, independent of the wrapped type.
 *
 * @remarks
 * The injector only sees boxes through this interface. Custom box types can
 * take part in injection by implementing it.
 */
export interface IAutoInjectedPropertyBox {
  /** Identifier the container is asked for */
  readonly serviceIdentifier: ServiceIdentifier;

  /** Whether resolution failure leaves the owner unusable */
  readonly required: boolean;

  /**
   * Whether the injector should walk into the resolved value.
   * Weak boxes return `false` so that a back-reference never re-triggers
   * injection of the object that owns it.
   */
  readonly cascades: boolean;

  /**
   * Resolve and store a value from the container.
   *
   * @param container - Container to resolve from
   * @param tag - Lookup name in effect for this injection pass
   * @returns Whether a value was obtained
   */
  resolve(container: IResolutionContainer, tag?: string): boolean;

  /** Current value with its type erased */
  currentValueErased(): unknown;
}

/**
 * Type guard for the auto-injection capability.
 */
export function isAutoInjectedPropertyBox(
  value: unknown,
): value is IAutoInjectedPropertyBox {
  if (value instanceof InjectedPropertyBox) {
    return true;
  }
  return (
    typeof value === 'object' &&
    value !== null &&
    'serviceIdentifier' in value &&
    'required' in value &&
    typeof value.required === 'boolean' &&
    'cascades' in value &&
    typeof value.cascades === 'boolean' &&
    'resolve' in value &&
    typeof value.resolve === 'function' &&
    'currentValueErased' in value &&
    typeof value.currentValueErased === 'function'
  );
}

/**
 * Construction options for a property box
 */
export interface PropertyBoxOptions<T> {
  /**
   * Whether the property must be injected. Default `true`.
   *
   * The injector does not enforce this; it only forbids forcing a required
   * box to an absent value and makes `get()` throw while unresolved.
   */
  required?: boolean;

  /**
   * Name used to look up the definition, overriding the tag in effect for
   * the injection pass. Default: no override.
   */
  name?: string;

  /**
   * Called with the value each time a new value is injected.
   * Similar to a property setter. Default does nothing.
   */
  didInject?: (value: T) => void;
}

const noop = (): void => undefined;

/**
 * Configuration and lookup shared by the strong and weak boxes
 */
export abstract class InjectedPropertyBox<T> implements IAutoInjectedPropertyBox {
  readonly required: boolean;
  readonly name: string | undefined;
  /** Set when a name was given; the name then replaces the pass's tag */
  readonly overrideTag: boolean;

  abstract readonly cascades: boolean;

  protected readonly didInject: (value: T) => void;

  protected constructor(
    readonly serviceIdentifier: ServiceIdentifier<T>,
    options: PropertyBoxOptions<T>,
  ) {
    this.required = options.required ?? true;
    this.name = options.name;
    this.overrideTag = options.name !== undefined;
    this.didInject = options.didInject ?? noop;
  }

  abstract resolve(container: IResolutionContainer, tag?: string): boolean;

  abstract currentValueErased(): unknown;

  /** Current value, `undefined` until resolved */
  abstract get value(): T | undefined;

  /**
   * Current value, or a `DependencyResolutionError` when there is none.
   */
  get(): T {
    const value = this.value;
    if (value === undefined) {
      const serviceName = this.serviceName;
      throw new DependencyResolutionError(
        `Property '${serviceName}' has not been injected`,
        buildDependencyGraph([], `${serviceName} (UNRESOLVED)`),
      );
    }
    return value;
  }

  get serviceName(): string {
    return describeServiceIdentifier(this.serviceIdentifier);
  }

  protected get options(): PropertyBoxOptions<T> {
    return {
      required: this.required,
      name: this.name,
      didInject: this.didInject,
    };
  }

  /**
   * Ask the container for a value. The box's own name wins over the tag of
   * the injection pass; `null` counts as no value.
   */
  protected lookup(container: IResolutionContainer, tag?: string): T | undefined {
    const name = this.overrideTag ? this.name : tag;
    return container.resolve<T>(this.serviceIdentifier, name) ?? undefined;
  }
}

/**
 * Strong auto-injected property. The box owns its value.
 *
 * @example
 * ```typescript
 * class OrderService {
 *   repository = new Injected(OrderRepository);
 *   audit = new Injected<IAuditLog>(TYPES.AuditLog, { required: false });
 *   cache = new Injected<ICache>(TYPES.Cache, {
 *     name: 'orders',
 *     didInject: (cache) => cache.warmUp(),
 *   });
 * }
 * ```
 *
 * @see InjectedWeak
 */
export class Injected<T> extends InjectedPropertyBox<T> {
  readonly cascades = true;

  private current: T | undefined;

  constructor(serviceIdentifier: ServiceIdentifier<T>, options: PropertyBoxOptions<T> = {}) {
    super(serviceIdentifier, options);
  }

  get value(): T | undefined {
    return this.current;
  }

  resolve(container: IResolutionContainer, tag?: string): boolean {
    this.store(this.lookup(container, tag));
    return this.current !== undefined;
  }

  currentValueErased(): unknown {
    return this.current;
  }

  /**
   * New box with the same configuration holding `value`.
   * The copy does not call `didInject`.
   *
   * @throws {RequiredPropertyException} If the box is required and `value` is absent
   */
  withValue(value: T | undefined): Injected<T> {
    const present = value ?? undefined;
    if (this.required && present === undefined) {
      throw new RequiredPropertyException(this.serviceName);
    }
    const copy = new Injected<T>(this.serviceIdentifier, this.options);
    copy.current = present;
    return copy;
  }

  private store(value: T | undefined): void {
    const previous = this.current;
    this.current = value;
    if (value !== undefined && value !== previous) {
      this.didInject(value);
    }
  }
}

/**
 * Whether a value can be the target of a `WeakRef`
 */
export function isWeakReferenceable(value: unknown): value is object {
  return (typeof value === 'object' && value !== null) || typeof value === 'function';
}

function describeRuntimeType(value: unknown): string {
  return value === null ? 'null' : typeof value;
}

/**
 * Weak auto-injected property. The box only observes its value.
 *
 * @remarks
 * Use it for one side of a circular dependency whose other side is an
 * `Injected` box. The injector does not walk into a weakly held value, so
 * the pair is injected once and the weak side does not keep the other
 * object alive.
 *
 * The value is owned elsewhere: once its owner releases it, `value` returns
 * `undefined` at any later read.
 *
 * A required weak box that resolves to a primitive throws
 * `WeakReferenceException`; an optional one ignores it.
 *
 * @example
 * ```typescript
 * class ServiceImpl {
 *   client = new InjectedWeak(ClientImpl);
 * }
 * ```
 *
 * @see Injected
 */
export class InjectedWeak<T extends object> extends InjectedPropertyBox<T> {
  readonly cascades = false;

  private ref: WeakRef<T> | undefined;

  constructor(serviceIdentifier: ServiceIdentifier<T>, options: PropertyBoxOptions<T> = {}) {
    super(serviceIdentifier, options);
  }

  get value(): T | undefined {
    return this.ref?.deref();
  }

  /**
   * Whether a value was stored and has since been released by its owner
   */
  get isReleased(): boolean {
    return this.ref !== undefined && this.ref.deref() === undefined;
  }

  resolve(container: IResolutionContainer, tag?: string): boolean {
    const resolved = this.lookup(container, tag);
    // containers are not bound by T at runtime
    const received: unknown = resolved;
    if (received !== undefined && !isWeakReferenceable(received)) {
      if (this.required) {
        throw new WeakReferenceException(this.serviceName, describeRuntimeType(received));
      }
      this.store(undefined);
      return false;
    }
    this.store(resolved);
    return this.ref !== undefined;
  }

  currentValueErased(): unknown {
    return this.value;
  }

  /**
   * New box with the same configuration observing `value`.
   * The copy does not call `didInject`.
   *
   * @throws {WeakReferenceException} If `value` can not be weakly referenced
   * @throws {RequiredPropertyException} If the box is required and `value` is absent
   */
  withValue(value: T | undefined): InjectedWeak<T> {
    const present = value ?? undefined;
    const received: unknown = present;
    if (received !== undefined && !isWeakReferenceable(received)) {
      throw new WeakReferenceException(this.serviceName, describeRuntimeType(received));
    }
    if (this.required && present === undefined) {
      throw new RequiredPropertyException(this.serviceName);
    }
    const copy = new InjectedWeak<T>(this.serviceIdentifier, this.options);
    copy.ref = present === undefined ? undefined : new WeakRef(present);
    return copy;
  }

  private store(value: T | undefined): void {
    const previous = this.value;
    this.ref = value === undefined ? undefined : new WeakRef(value);
    if (value !== undefined && value !== previous) {
      this.didInject(value);
    }
  }
}
