/**
 * @fileoverview Integration tests for circular graphs and weak ownership
 *
 * A Client owns its Service strongly; the Service points back to the Client
 * through a weak box. Injection must terminate, and the weak side must not
 * keep anything alive.
 */

// CRITICAL: Import reflect-metadata for decorator support
import 'reflect-metadata';

import { Container, injectable } from 'inversify';

import {
  Injected,
  InjectedWeak,
  InversifyResolutionContainer,
  autoInject,
} from '../../../src';
import { collectGarbage } from '../../support/gc';

// ============================================================================
// Test Services
// ============================================================================

@injectable()
class Session {
  public readonly startedAt = Date.now();
}

class SessionController {
  public session = new InjectedWeak(Session);
}

@injectable()
class Service {
  public client = new InjectedWeak(Client);
}

@injectable()
class Client {
  public service = new Injected(Service);
}

/**
 * Checked outside the async test body so that no reference to the value
 * survives in its suspended frame.
 */
function isObserving<T extends object>(box: InjectedWeak<T>): boolean {
  return box.value !== undefined;
}

// ============================================================================
// Test Suite
// ============================================================================

describe('Circular Graphs', () => {
  let services: Container;
  let clients: Container;

  beforeEach(() => {
    services = new Container();
    clients = new Container();
  });

  describe('Strong / Weak Pair', () => {
    it('should link both sides across two containers and terminate', () => {
      const client = new Client();
      services.bind(Service).toSelf();
      clients.bind(Client).toConstantValue(client);

      autoInject(client, [
        new InversifyResolutionContainer(services),
        new InversifyResolutionContainer(clients),
      ]);

      const service = client.service.get();
      expect(service).toBeInstanceOf(Service);
      expect(service.client.value).toBe(client);
    });

    it('should not inject through the weak side', () => {
      const service = new Service();
      clients.bind(Client).toSelf().inSingletonScope();
      services.bind(Service).toSelf();

      autoInject(service, [
        new InversifyResolutionContainer(services),
        new InversifyResolutionContainer(clients),
      ]);

      expect(service.client.value).toBe(clients.get(Client));
      expect(clients.get(Client).service.value).toBeUndefined();
    });
  });

  describe('Weak Ownership', () => {
    it('should lose the value once nothing else owns it', async () => {
      services.bind(Session).toSelf();
      const controller = autoInject(new SessionController(), [
        new InversifyResolutionContainer(services),
      ]);

      expect(isObserving(controller.session)).toBe(true);

      await collectGarbage();

      expect(isObserving(controller.session)).toBe(false);
      expect(controller.session.isReleased).toBe(true);
      expect(() => controller.session.get()).toThrow("Property 'Session' has not been injected");
    });

    it('should keep the value while its owner holds it', async () => {
      services.bind(Session).toSelf().inSingletonScope();
      const controller = autoInject(new SessionController(), [
        new InversifyResolutionContainer(services),
      ]);

      await collectGarbage();

      expect(isObserving(controller.session)).toBe(true);
      expect(controller.session.isReleased).toBe(false);
    });
  });
});
