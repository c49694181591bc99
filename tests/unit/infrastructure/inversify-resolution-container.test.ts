/**
 * @fileoverview Unit tests for the inversify resolution container adapter
 */

// CRITICAL: Import reflect-metadata for decorator support
import 'reflect-metadata';

import { Container, injectable } from 'inversify';

import { InversifyResolutionContainer } from '../../../src';

// ============================================================================
// Test Services
// ============================================================================

@injectable()
class Clock {}

abstract class Cache {
  abstract get(key: string): string | undefined;
}

@injectable()
class MemoryCache extends Cache {
  get(): string | undefined {
    return undefined;
  }
}

@injectable()
class Ledger {
  constructor(public readonly clock: Clock) {}
}

const TYPES = {
  Region: Symbol.for('Region'),
};

// ============================================================================
// Test Suite
// ============================================================================

describe('InversifyResolutionContainer', () => {
  let container: Container;
  let resolver: InversifyResolutionContainer;

  beforeEach(() => {
    container = new Container();
    resolver = new InversifyResolutionContainer(container);
  });

  describe('Unnamed Lookups', () => {
    it('should return undefined for an unbound identifier', () => {
      expect(resolver.resolve(Clock)).toBeUndefined();
    });

    it('should resolve a bound class', () => {
      container.bind(Clock).toSelf();

      expect(resolver.resolve(Clock)).toBeInstanceOf(Clock);
    });

    it('should resolve an abstract class bound to an implementation', () => {
      container.bind(Cache).to(MemoryCache);

      expect(resolver.resolve(Cache)).toBeInstanceOf(MemoryCache);
    });

    it('should resolve symbol tokens', () => {
      container.bind<string>(TYPES.Region).toConstantValue('eu-west');

      expect(resolver.resolve<string>(TYPES.Region)).toBe('eu-west');
    });

    it('should respect the scope of the binding', () => {
      container.bind(Clock).toSelf().inSingletonScope();

      expect(resolver.resolve(Clock)).toBe(resolver.resolve(Clock));
    });
  });

  describe('Named Lookups', () => {
    it('should resolve the binding declared for the name', () => {
      container.bind<string>(TYPES.Region).toConstantValue('eu-west').whenTargetNamed('eu');
      container.bind<string>(TYPES.Region).toConstantValue('us-east').whenTargetNamed('us');

      expect(resolver.resolve<string>(TYPES.Region, 'us')).toBe('us-east');
    });

    it('should return undefined for an unnamed lookup of a named-only binding', () => {
      container.bind(Clock).toSelf().whenTargetNamed('utc');

      expect(resolver.resolve(Clock)).toBeUndefined();
    });

    it('should return undefined for a name without a binding', () => {
      container.bind<string>(TYPES.Region).toConstantValue('eu-west').whenTargetNamed('eu');

      expect(resolver.resolve<string>(TYPES.Region, 'ap')).toBeUndefined();
    });
  });

  describe('Container Errors', () => {
    it('should let errors other than a missing binding propagate', () => {
      container.bind(Clock).toSelf();
      container.bind(Clock).toSelf();

      expect(() => resolver.resolve(Clock)).toThrow();
    });

    it('should let a missing binding of a nested dependency propagate', () => {
      container.bind(Ledger).toSelf();

      expect(() => resolver.resolve(Ledger)).toThrow(
        'No matching bindings found for serviceIdentifier: Clock',
      );
    });
  });
});
