import { Logger } from './logger.js';
import { AppError } from '../types/errors.js';

export class ErrorHandler {
  private static shutdownHooks: Array<() => Promise<void>> = [];

  static handle(error: unknown): void {
    if (error instanceof AppError) {
      Logger.error(error.message, {
        name: error.name,
        statusCode: error.statusCode,
        isOperational: error.isOperational,
        context: error.context,
        stack: error.stack,
      });

      // Exit for non-operational errors
      if (!error.isOperational) {
        process.exit(1);
      }
    } else if (error instanceof Error) {
      Logger.error(`Unexpected error: ${error.message}`, {
        name: error.name,
        stack: error.stack,
      });
      process.exit(1);
    } else {
      Logger.error('Unknown error occurred', { error });
      process.exit(1);
    }
  }

  /** Registers work (stopping the tick loop, draining the queue) to run on SIGINT/SIGTERM. */
  static onShutdown(hook: () => Promise<void>): void {
    ErrorHandler.shutdownHooks.push(hook);
  }

  private static async shutdown(signal: string): Promise<void> {
    Logger.info(`${signal} received, shutting down gracefully`);
    for (const hook of ErrorHandler.shutdownHooks) {
      try {
        await hook();
      } catch (error) {
        Logger.warn('Shutdown hook failed', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    process.exit(0);
  }

  static setupGlobalHandlers(): void {
    process.on('uncaughtException', (error) => {
      Logger.error('Uncaught Exception:', { error: error.message, stack: error.stack });
      process.exit(1);
    });

    process.on('unhandledRejection', (reason) => {
      Logger.error('Unhandled Rejection:', { reason });
      process.exit(1);
    });

    process.on('SIGTERM', () => {
      void ErrorHandler.shutdown('SIGTERM');
    });

    process.on('SIGINT', () => {
      void ErrorHandler.shutdown('SIGINT');
    });
  }
}
