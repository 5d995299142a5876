import { logger } from './logger.js';

type ShutdownHandler = () => Promise<void> | void;
type CleanupOperation = {
  name: string;
  handler: ShutdownHandler;
  timeout?: number; // Optional timeout in milliseconds
};

export interface ShutdownResult {
  completed: boolean;
  failed: string[];
}

/**
 * Shutdown coordinator for managing graceful shutdown operations
 *
 * Runs cleanup operations in registration order, each bounded by its own
 * timeout and the whole sequence by an overall deadline. A failing operation
 * is logged and the sequence continues.
 */
export class ShutdownCoordinator {
  private cleanupOperations: CleanupOperation[] = [];
  private shutdownPromise: Promise<ShutdownResult> | null = null;

  constructor(private readonly shutdownTimeoutMs: number = 30000) {}

  /**
   * Register a cleanup operation to be executed during shutdown
   * @param name - Descriptive name for the cleanup operation
   * @param handler - Async function to execute during shutdown
   * @param timeout - Optional timeout in milliseconds for this specific operation
   */
  register(name: string, handler: ShutdownHandler, timeout?: number): void {
    this.cleanupOperations.push({ name, handler, timeout });
  }

  /**
   * Execute all registered cleanup operations in order. Repeated calls share
   * the first shutdown.
   * @param signal - Signal that triggered shutdown (for logging)
   */
  shutdown(signal?: string): Promise<ShutdownResult> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.runShutdown(signal);
    } else {
      logger.warn({ signal }, 'Shutdown already in progress');
    }
    return this.shutdownPromise;
  }

  isShuttingDown(): boolean {
    return this.shutdownPromise !== null;
  }

  private async runShutdown(signal?: string): Promise<ShutdownResult> {
    logger.info({ signal, operationsCount: this.cleanupOperations.length }, 'Starting graceful shutdown');

    const failed: string[] = [];
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.shutdownTimeoutMs);
    });

    const sequence = (async (): Promise<'done'> => {
      for (const operation of this.cleanupOperations) {
        if (!(await this.executeOperation(operation))) {
          failed.push(operation.name);
        }
      }
      return 'done';
    })();

    const outcome = await Promise.race([sequence, deadline]);
    clearTimeout(timer);

    if (outcome === 'timeout') {
      logger.error({ timeoutMs: this.shutdownTimeoutMs }, 'Graceful shutdown timed out');
      return { completed: false, failed };
    }

    logger.info({ failed }, 'Graceful shutdown completed');
    return { completed: failed.length === 0, failed };
  }

  /**
   * Execute a single cleanup operation with optional timeout
   * @returns Whether the operation succeeded
   */
  private async executeOperation(operation: CleanupOperation): Promise<boolean> {
    const { name, handler, timeout } = operation;
    let timer: NodeJS.Timeout | undefined;

    try {
      if (timeout) {
        await Promise.race([
          Promise.resolve(handler()),
          new Promise<never>((_, reject) => {
            timer = setTimeout(() => reject(new Error(`Operation ${name} timed out after ${timeout}ms`)), timeout);
          }),
        ]);
      } else {
        await Promise.resolve(handler());
      }
      logger.debug({ operation: name }, 'Cleanup operation completed');
      return true;
    } catch (error) {
      logger.error({ error, operation: name }, 'Error during cleanup operation (continuing with shutdown)');
      return false;
    } finally {
      clearTimeout(timer);
    }
  }
}
