/**
 * propinject - Exception Module
 *
 * Exceptions raised by property box misuse
 */

export {
  PropertyInjectionException,
  RequiredPropertyException,
  WeakReferenceException,
} from './exceptions';

export type { PropertyInjectionErrorCode } from './exceptions';
