import { logger } from './logger.js';

export interface ShutdownHandler {
  name: string;
  handler: () => Promise<void> | void;
  priority: number;
}

export interface ShutdownOptions {
  timeoutMs?: number;
  handlerTimeoutMs?: number;
  exit?: (code: number) => void;
}

/**
 * Runs registered handlers, highest priority first, once per process.
 * Signal hooks are only attached by `install()`.
 */
export class GracefulShutdown {
  private handlers: ShutdownHandler[] = [];
  private isShuttingDown: boolean = false;
  private shutdownReason: string = '';
  private shutdownPromise: Promise<void> | null = null;
  private readonly timeoutMs: number;
  private readonly handlerTimeoutMs: number;
  private readonly exit: (code: number) => void;

  constructor(options: ShutdownOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.handlerTimeoutMs = options.handlerTimeoutMs ?? 5000;
    this.exit = options.exit ?? (code => process.exit(code));
  }

  install(signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']): void {
    for (const signal of signals) {
      process.once(signal, () => {
        logger.info(`Received signal: ${signal}`);
        void this.shutdown(`Signal: ${signal}`);
      });
    }

    process.on('unhandledRejection', reason => {
      logger.error('Unhandled rejection', { reason: String(reason) });
    });
  }

  registerHandler(name: string, handler: () => Promise<void> | void, priority: number = 0): void {
    this.handlers.push({ name, handler, priority });
    this.handlers.sort((a, b) => b.priority - a.priority);
  }

  shutdown(reason: string = 'Requested', exitCode: number = 0): Promise<void> {
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }

    this.isShuttingDown = true;
    this.shutdownReason = reason;
    logger.info(`Initiating graceful shutdown: ${reason}`);

    this.shutdownPromise = this.executeShutdown(exitCode);
    return this.shutdownPromise;
  }

  private async executeShutdown(exitCode: number): Promise<void> {
    const startTime = Date.now();
    const deadline = startTime + this.timeoutMs;
    let handlersCalled = 0;

    for (const { name, handler } of this.handlers) {
      if (Date.now() > deadline) {
        logger.error('Shutdown timeout exceeded');
        break;
      }

      let timer: NodeJS.Timeout | undefined;
      try {
        await Promise.race([
          Promise.resolve(handler()),
          new Promise<never>((_, reject) => {
            timer = setTimeout(() => reject(new Error('Handler timeout')), this.handlerTimeoutMs);
          }),
        ]);
        handlersCalled++;
        logger.debug(`Shutdown handler completed: ${name}`);
      } catch (error) {
        logger.error(`Shutdown handler failed: ${name}`, { error: String(error) });
      } finally {
        clearTimeout(timer);
      }
    }

    logger.info(`Shutdown complete: ${handlersCalled} handlers called in ${Date.now() - startTime}ms`);
    this.exit(exitCode);
  }

  isShuttingDownNow(): boolean {
    return this.isShuttingDown;
  }

  getReason(): string {
    return this.shutdownReason;
  }
}
