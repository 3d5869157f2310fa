import { Logger, getLogger } from '../logging';
import { describeError } from '../../domain/errors/AppErrors';

export type ShutdownHandler = () => Promise<void>;

export type ShutdownSignal = 'SIGINT' | 'SIGTERM';

type ExitFn = (code: number) => void;

/** 128 + signal number, as shells report a process killed by the signal */
const EXIT_CODES: Record<ShutdownSignal, number> = {
  SIGINT: 130,
  SIGTERM: 143,
};

const SIGNALS: ShutdownSignal[] = ['SIGINT', 'SIGTERM'];

/**
 * Closes the browser when the scraper is interrupted, so no Chromium
 * process outlives it. Cleanup handlers run newest first, once.
 */
export class GracefulShutdown {
  private static instance: GracefulShutdown | null = null;
  private readonly logger: Logger;
  private readonly handlers: ShutdownHandler[] = [];
  private running = false;
  private listening = false;
  private exit: ExitFn = code => process.exit(code);

  private constructor() {
    this.logger = getLogger('Shutdown');
  }

  static getInstance(): GracefulShutdown {
    if (!GracefulShutdown.instance) {
      GracefulShutdown.instance = new GracefulShutdown();
    }
    return GracefulShutdown.instance;
  }

  /**
   * Drop the singleton (tests).
   */
  static reset(): void {
    GracefulShutdown.instance = null;
  }

  registerHandler(handler: ShutdownHandler): void {
    this.handlers.push(handler);
  }

  /**
   * Replace process.exit (tests).
   */
  setExitHandler(exit: ExitFn): void {
    this.exit = exit;
  }

  listen(): void {
    if (this.listening) {
      return;
    }
    this.listening = true;

    for (const signal of SIGNALS) {
      process.on(signal, () => void this.shutdown(signal));
    }
  }

  async shutdown(signal: ShutdownSignal): Promise<void> {
    if (this.running) {
      this.logger.warn(`Received ${signal} while shutting down; still closing`);
      return;
    }
    this.running = true;
    this.logger.info(`Received ${signal}, cleaning up...`);

    for (const handler of [...this.handlers].reverse()) {
      try {
        await handler();
      } catch (error) {
        this.logger.error('Cleanup failed', { error: describeError(error) });
      }
    }

    this.exit(EXIT_CODES[signal]);
  }
}

export function onShutdown(handler: ShutdownHandler): void {
  GracefulShutdown.getInstance().registerHandler(handler);
}

/**
 * Start listening for SIGINT and SIGTERM.
 */
export function initGracefulShutdown(): GracefulShutdown {
  const shutdown = GracefulShutdown.getInstance();
  shutdown.listen();
  return shutdown;
}
