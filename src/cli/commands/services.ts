import { Command } from 'commander';
import chalk from 'chalk';
import { Container } from '../../container';
import { startServer } from '../../server';
import { handleError } from '../utils/formatter';
import { createSharedContainer } from '../utils/sharedContainer';

/**
 * AbortSignal that fires on SIGINT or SIGTERM.
 */
function shutdownSignal(): AbortSignal {
  const controller = new AbortController();
  const stop = () => {
    if (controller.signal.aborted) {
      process.exit(1);
    }
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
  return controller.signal;
}

/**
 * Run a long-lived loop against a fresh container until interrupted.
 */
async function runLoop(name: string, loop: (container: Container, signal: AbortSignal) => Promise<void>): Promise<void> {
  const container = await createSharedContainer(name);
  await container.initialize();
  container.logger.info(`${name} starting`, { store: container.config.store.type });

  try {
    await loop(container, shutdownSignal());
  } finally {
    await container.shutdown();
  }
}

/**
 * Register the long-running process commands: API server, sweeper, notifier and monitor.
 */
export function registerServiceCommands(program: Command) {
  program.command('serve')
    .description('Run the HTTP API and WebSocket event feed')
    .action(async () => {
      try {
        const { container, close } = await startServer();
        console.log(chalk.green(`Coordinator listening on ${container.config.host}:${container.config.port}`));
        await new Promise<void>((resolve) => {
          const signal = shutdownSignal();
          signal.addEventListener('abort', () => resolve(), { once: true });
        });
        await close();
      } catch (err) {
        handleError(err, program.opts().json === true);
      }
    });

  program.command('sweeper')
    .description('Periodically finish interrupted moves and requeue stuck inflight tasks')
    .option('--once', 'Run a single sweep and exit')
    .action(async (cmdOpts: { once?: boolean }) => {
      try {
        await runLoop('Recovery sweeper', async ({ recoverySweeper }, signal) => {
          if (cmdOpts.once) {
            const result = await recoverySweeper.sweep();
            console.log(`Reconciled ${result.reconciled} move(s), recovered ${result.recovered.length} task(s)`);
            return;
          }
          await recoverySweeper.run(signal);
        });
      } catch (err) {
        handleError(err, program.opts().json === true);
      }
    });

  program.command('notifier')
    .description('Deliver pending notifications to the operator console')
    .option('--once', 'Run a single delivery pass and exit')
    .action(async (cmdOpts: { once?: boolean }) => {
      try {
        await runLoop('Notification delivery', async ({ notificationService }, signal) => {
          if (cmdOpts.once) {
            const result = await notificationService.deliverPending();
            console.log(`Delivered ${result.delivered}, skipped ${result.skipped}, ${result.remaining} left`);
            return;
          }
          await notificationService.run(signal);
        });
      } catch (err) {
        handleError(err, program.opts().json === true);
      }
    });

  program.command('monitor')
    .description('Watch agent liveness and queue depth, and send progress reports')
    .action(async () => {
      try {
        await runLoop('Queue monitor', ({ queueMonitor }, signal) => queueMonitor.run(signal));
      } catch (err) {
        handleError(err, program.opts().json === true);
      }
    });
}
