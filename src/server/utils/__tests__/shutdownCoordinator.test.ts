import { describe, expect, it } from 'vitest';
import { ShutdownCoordinator } from '../shutdownCoordinator.js';

describe('ShutdownCoordinator', () => {
  it('runs operations in registration order', async () => {
    const order: string[] = [];
    const coordinator = new ShutdownCoordinator(1000);
    coordinator.register('job', async () => {
      order.push('job');
    });
    coordinator.register('db', () => {
      order.push('db');
    });

    const result = await coordinator.shutdown('SIGTERM');

    expect(order).toEqual(['job', 'db']);
    expect(result).toEqual({ completed: true, failed: [] });
    expect(coordinator.isShuttingDown()).toBe(true);
  });

  it('continues past a failing operation', async () => {
    const order: string[] = [];
    const coordinator = new ShutdownCoordinator(1000);
    coordinator.register('job', () => {
      throw new Error('stop failed');
    });
    coordinator.register('db', () => {
      order.push('db');
    });

    const result = await coordinator.shutdown();

    expect(order).toEqual(['db']);
    expect(result).toEqual({ completed: false, failed: ['job'] });
  });

  it('bounds an operation by its own timeout', async () => {
    const coordinator = new ShutdownCoordinator(1000);
    coordinator.register('hung', () => new Promise<void>(() => {}), 10);

    expect(await coordinator.shutdown()).toEqual({ completed: false, failed: ['hung'] });
  });

  it('gives up at the overall deadline', async () => {
    const coordinator = new ShutdownCoordinator(20);
    coordinator.register('hung', () => new Promise<void>(() => {}));

    expect(await coordinator.shutdown()).toEqual({ completed: false, failed: [] });
  });

  it('shares the first shutdown between callers', async () => {
    let calls = 0;
    const coordinator = new ShutdownCoordinator(1000);
    coordinator.register('job', () => {
      calls += 1;
    });

    const [first, second] = await Promise.all([coordinator.shutdown('SIGINT'), coordinator.shutdown('SIGTERM')]);

    expect(first).toBe(second);
    expect(calls).toBe(1);
  });
});
