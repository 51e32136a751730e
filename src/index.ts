#!/usr/bin/env node
import { App } from './app.js';
import { BuildCancelledError, BuildPhaseError } from './errors/index.js';
import { flushLogger, logger } from './utils/logging.js';
import { createErrorLogContext } from './utils/errorHandling.js';

const app = new App();
const controller = new AbortController();

// File transports write asynchronously; exit only once they have drained
const exitAfterFlush = (code: number): void => {
  flushLogger()
    .then(() => process.exit(code))
    .catch(() => process.exit(code));
};

// Cancellation is cooperative: the running phase finishes, the next one does not start
const requestCancel = (signal: NodeJS.Signals): void => {
  if (controller.signal.aborted) {
    logger.warn(`Received ${signal} again, exiting immediately`);
    exitAfterFlush(1);
    return;
  }
  logger.info(`Received ${signal} signal, cancelling build after the current phase`);
  controller.abort();
};

process.on('SIGTERM', () => requestCancel('SIGTERM'));
process.on('SIGINT', () => requestCancel('SIGINT'));

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled promise rejection detected - this indicates a bug that must be fixed', {
    reason: reason instanceof Error ? {
      name: reason.name,
      message: reason.message,
      stack: reason.stack,
    } : reason,
  });

  app.stop()
    .then(() => exitAfterFlush(1))
    .catch((shutdownError: unknown) => {
      logger.error('Failed to shut down after unhandled rejection', createErrorLogContext(shutdownError));
      exitAfterFlush(1);
    });
});

process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught exception detected - this indicates a bug that must be fixed', {
    name: error.name,
    message: error.message,
    stack: error.stack,
  });

  app.stop()
    .then(() => exitAfterFlush(1))
    .catch((shutdownError: unknown) => {
      logger.error('Failed to shut down after uncaught exception', createErrorLogContext(shutdownError));
      exitAfterFlush(1);
    });
});

app.run({ signal: controller.signal })
  .then(summary => {
    logger.info('Build finished', {
      collection: summary.collection,
      insertedCount: summary.load.insertedCount,
      verified: summary.verification.verified,
      elapsedMs: summary.elapsedMs,
    });
    exitAfterFlush(0);
  })
  .catch((error: unknown) => {
    if (error instanceof BuildCancelledError) {
      logger.warn(error.message);
    } else if (error instanceof BuildPhaseError) {
      logger.error(error.message, { phase: error.phase, code: error.code });
    } else {
      logger.error('Build failed', createErrorLogContext(error));
    }
    exitAfterFlush(1);
  });
