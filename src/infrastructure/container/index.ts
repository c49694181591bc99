/**
 * propinject - Container Adapters
 */

export { InversifyResolutionContainer } from './InversifyResolutionContainer';
