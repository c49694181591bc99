/**
 * propinject - Inversify Resolution Container
 *
 * Adapts an inversify `Container` to the resolution port used by property
 * boxes. Registration, scopes and activation stay with inversify.
 */

import 'reflect-metadata';
import { Container } from 'inversify';

import {
  IResolutionContainer,
  ServiceIdentifier,
} from '../../application/di';

// inversify reports bindings whose constraints all fail with this message,
// followed by the identifier as inversify prints it.
const NO_MATCHING_BINDINGS = 'No matching bindings found for serviceIdentifier:';

function identifierAsInversifyString(serviceIdentifier: ServiceIdentifier): string {
  if (typeof serviceIdentifier === 'function') {
    return serviceIdentifier.name;
  }
  return serviceIdentifier.toString();
}

/**
 * Whether `error` says that `serviceIdentifier` itself has no matching
 * binding. The same failure on a nested dependency is not matched.
 */
function isNoMatchingBindingsError(
  error: unknown,
  serviceIdentifier: ServiceIdentifier,
): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  const prefix = `${NO_MATCHING_BINDINGS} ${identifierAsInversifyString(serviceIdentifier)}`;
  if (!error.message.startsWith(prefix)) {
    return false;
  }
  const rest = error.message.slice(prefix.length);
  return rest === '' || /^\s/.test(rest);
}

/**
 * InversifyResolutionContainer - property injection source backed by inversify
 *
 * @remarks
 * Unbound identifiers resolve to `undefined`, and so does an unnamed lookup
 * of an identifier bound only under names. Named lookups match bindings
 * declared with `whenTargetNamed(name)`. Anything else inversify reports
 * (ambiguous bindings, async-only bindings, activation failures) is thrown
 * unchanged.
 *
 * @example
 * ```typescript
 * const container = new Container();
 * container.bind(Mailer).toSelf().inSingletonScope();
 * container.bind<ICache>(TYPES.Cache).to(RedisCache).whenTargetNamed('redis');
 *
 * const job = autoInject(new ReportJob(), [
 *   new InversifyResolutionContainer(container),
 * ]);
 * ```
 */
export class InversifyResolutionContainer implements IResolutionContainer {
  constructor(private readonly container: Container) {}

  resolve<T>(serviceIdentifier: ServiceIdentifier<T>, name?: string): T | undefined {
    if (name === undefined) {
      if (!this.container.isBound(serviceIdentifier)) {
        return undefined;
      }
      try {
        return this.container.get<T>(serviceIdentifier);
      } catch (error) {
        if (isNoMatchingBindingsError(error, serviceIdentifier)) {
          return undefined;
        }
        throw error;
      }
    }

    return this.container.isBoundNamed(serviceIdentifier, name)
      ? this.container.getNamed<T>(serviceIdentifier, name)
      : undefined;
  }
}
