/**
 * @fileoverview propinject - Property Auto-Injection
 * @description
 * Fills "to be injected" properties of already constructed objects from one
 * or more dependency-injection containers.
 *
 * ## Architecture Layers
 *
 * - **Domain**: misuse exceptions
 * - **Application**: property boxes, the recursive injector, the container
 *   port and the logger port
 * - **Infrastructure**: container adapters (inversify)
 *
 * @example
 * ```typescript
 * import 'reflect-metadata';
 * import { Container, injectable } from 'inversify';
 * import { Injected, InjectedWeak, InversifyResolutionContainer, autoInject } from 'propinject';
 *
 * class Client {
 *   service = new Injected(Service);
 * }
 *
 * @injectable()
 * class Service {
 *   client = new InjectedWeak(Client);
 * }
 *
 * const container = new Container();
 * container.bind(Service).toSelf();
 *
 * const client = new Client();
 * container.bind(Client).toConstantValue(client);
 *
 * autoInject(client, [new InversifyResolutionContainer(container)]);
 * ```
 *
 * @packageDocumentation
 * @module propinject
 * @version 1.0.0
 */

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS
// ============================================================================

export * from './application';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS
// ============================================================================

export * from './infrastructure';
