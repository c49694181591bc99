/**
 * propinject - Property Injection Exceptions
 *
 * Raised when a property box is misused: a required box is forced to an
 * absent value, or a weak box is handed something that cannot be weakly
 * referenced. Both indicate a configuration mistake in the calling code and
 * are not meant to be retried.
 */

/**
 * Machine-readable misuse codes
 */
export type PropertyInjectionErrorCode = 'REQUIRED_PROPERTY' | 'WEAK_REFERENCE';

/**
 * Base class for property box misuse
 *
 * @example
 * ```typescript
 * try {
 *   box.withValue(undefined);
 * } catch (error) {
 *   if (error instanceof PropertyInjectionException) {
 *     console.error(`[${error.code}] ${error.message}`);
 *   }
 *   throw error;
 * }
 * ```
 */
export class PropertyInjectionException extends Error {
  constructor(
    public readonly code: PropertyInjectionErrorCode,
    message: string,
    public readonly serviceName?: string,
  ) {
    super(message);
    this.name = 'PropertyInjectionException';
    Error.captureStackTrace(this, this.constructor);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A required property was set to an absent value
 */
export class RequiredPropertyException extends PropertyInjectionException {
  constructor(serviceName?: string) {
    super(
      'REQUIRED_PROPERTY',
      serviceName
        ? `Can not set required property '${serviceName}' to an absent value.`
        : 'Can not set required property to an absent value.',
      serviceName,
    );
    this.name = 'RequiredPropertyException';
  }
}

/**
 * A weak property box received a value that cannot be held by a WeakRef
 */
export class WeakReferenceException extends PropertyInjectionException {
  constructor(
    serviceName: string,
    public readonly receivedType: string,
  ) {
    super(
      'WEAK_REFERENCE',
      `'${serviceName}' resolved to a ${receivedType}, which can not be weakly referenced. ` +
        'InjectedWeak should only wrap objects.',
      serviceName,
    );
    this.name = 'WeakReferenceException';
  }
}
