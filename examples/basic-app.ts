/**
 * propinject v1.0.0 - Basic Example
 *
 * Demonstrates the core concepts:
 * - Injected / InjectedWeak property boxes
 * - Resolution across several containers
 * - A circular pair that terminates on its weak side
 * - Misuse exceptions
 */

import 'reflect-metadata';
import { Container, injectable } from 'inversify';

import {
  Injected,
  InjectedWeak,
  InversifyResolutionContainer,
  RequiredPropertyException,
  autoInject,
  consoleLogger,
} from '../src/index';

// ==================== Services ====================

@injectable()
class Clock {
  now(): string {
    return new Date().toISOString();
  }
}

@injectable()
class AuditLog {
  public clock = new Injected(Clock);

  record(entry: string): string {
    return `${this.clock.get().now()} ${entry}`;
  }
}

@injectable()
class OrderService {
  public audit = new Injected(AuditLog);
  public controller = new InjectedWeak(OrderController);

  place(item: string): string {
    return this.audit.get().record(`order placed: ${item}`);
  }
}

class OrderController {
  public service = new Injected(OrderService, {
    didInject: () => consoleLogger.info('OrderService attached to controller'),
  });
  public region = new Injected<string>('region', { required: false });
}

// ==================== Main ====================

function main(): void {
  console.log('═══════════════════════════════════════════════════════════');
  console.log('  propinject v1.0.0 - Property Injection Demo');
  console.log('═══════════════════════════════════════════════════════════\n');

  const controller = new OrderController();

  // Services live in one container, the controller in another
  const services = new Container();
  services.bind(OrderService).toSelf();
  services.bind(AuditLog).toSelf().inSingletonScope();
  services.bind(Clock).toSelf().inSingletonScope();

  const controllers = new Container();
  controllers.bind(OrderController).toConstantValue(controller);

  autoInject(
    controller,
    [new InversifyResolutionContainer(services), new InversifyResolutionContainer(controllers)],
    { logger: consoleLogger },
  );

  console.log('\n--- Injected graph ---');
  console.log(controller.service.get().place('keyboard'));
  console.log('Back-reference is controller:', controller.service.get().controller.value === controller);
  console.log('Optional region:', controller.region.value ?? '(not bound)');

  console.log('\n--- Misuse ---');
  try {
    new Injected(Clock).withValue(undefined);
  } catch (error) {
    if (error instanceof RequiredPropertyException) {
      console.log(`${error.code}: ${error.message}`);
    } else {
      throw error;
    }
  }

  console.log('\n═══════════════════════════════════════════════════════════');
  console.log('  Demo Complete!');
  console.log('═══════════════════════════════════════════════════════════\n');
}

main();
