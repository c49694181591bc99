/**
 * @fileoverview Unit tests for property injection exceptions
 */

import {
  PropertyInjectionException,
  RequiredPropertyException,
  WeakReferenceException,
} from '../../../src';

describe('Property Injection Exceptions', () => {
  it('should keep the prototype chain of RequiredPropertyException', () => {
    const error = new RequiredPropertyException('Mailer');

    expect(error).toBeInstanceOf(RequiredPropertyException);
    expect(error).toBeInstanceOf(PropertyInjectionException);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('RequiredPropertyException');
    expect(error.code).toBe('REQUIRED_PROPERTY');
  });

  it('should word RequiredPropertyException without a service name', () => {
    expect(new RequiredPropertyException().message).toBe(
      'Can not set required property to an absent value.',
    );
  });

  it('should describe the rejected value in WeakReferenceException', () => {
    const error = new WeakReferenceException('retries', 'number');

    expect(error).toBeInstanceOf(PropertyInjectionException);
    expect(error.name).toBe('WeakReferenceException');
    expect(error.code).toBe('WEAK_REFERENCE');
    expect(error.serviceName).toBe('retries');
    expect(error.receivedType).toBe('number');
    expect(error.message).toBe(
      "'retries' resolved to a number, which can not be weakly referenced. " +
        'InjectedWeak should only wrap objects.',
    );
  });

  it('should carry a stack trace', () => {
    expect(new RequiredPropertyException('Mailer').stack).toEqual(expect.any(String));
  });
});
