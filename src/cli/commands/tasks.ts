import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { artifactSyncCommitMessage, statusCommitMessage } from '../../domain/tasks/statusCommit';
import { LegacyTaskInput } from '../../application/services/TaskService';
import { handleError, outputJSON, outputKeyValue, outputTable } from '../utils/formatter';
import { createSharedContainer } from '../utils/sharedContainer';

/**
 * Register operator commands that act on tasks and queues directly through the store.
 */
export function registerTaskCommands(program: Command) {
  program.command('migrate-ids')
    .description('Assign stable ids to every task in the task artifact (safe to re-run)')
    .action(async () => {
      const isJson = program.opts().json === true;
      const spinner = !isJson ? ora('Migrating task ids...').start() : null;
      try {
        const container = await createSharedContainer('migrate-ids');
        const artifact = await container.artifactRepo.read();
        const legacy: LegacyTaskInput[] = Object.entries(artifact).map(([id, entry]) => ({
          id,
          priority: entry.priority,
          status: entry.status,
        }));

        const mappings = await container.stableIdService.migrate(legacy.map(t => t.id));
        const imported = await container.taskService.importLegacy(legacy);
        await container.shutdown();
        spinner?.stop();

        if (isJson) {
          outputJSON({ mappings, imported: imported.length });
          return;
        }
        outputTable(
          ['Legacy id', 'Stable id', 'New'],
          mappings.map(m => [m.displayId, m.stableId, m.created ? chalk.green('yes') : 'no'])
        );
        outputKeyValue('Imported records', String(imported.length));
      } catch (err) {
        spinner?.stop();
        handleError(err, isJson);
      }
    });

  program.command('enqueue <taskIds...>')
    .description('Queue one or more existing tasks')
    .option('--stage <stage>', 'Stage to enqueue into (default: first stage)')
    .action(async (taskIds: string[], cmdOpts: { stage?: string }) => {
      const isJson = program.opts().json === true;
      try {
        const container = await createSharedContainer('enqueue');
        const { queueService } = container;
        const stage = cmdOpts.stage ?? queueService.pipelineStages[0];
        const results = taskIds.length === 1
          ? [await queueService.enqueue(taskIds[0], stage)]
          : await queueService.bulkEnqueue(taskIds, stage);
        await container.shutdown();

        if (isJson) {
          outputJSON(results);
          return;
        }
        for (const result of results) {
          if (result.kind === 'enqueued') {
            console.log(`${chalk.green('queued')} ${result.taskId} -> ${result.stage}`);
          } else {
            const where = result.location ? ('stage' in result.location ? `${result.location.list}:${result.location.stage}` : result.location.list) : 'nowhere';
            console.log(`${chalk.gray('skipped')} ${result.taskId} (already in ${where})`);
          }
        }
      } catch (err) {
        handleError(err, isJson);
      }
    });

  program.command('stats')
    .description('Show queue depths')
    .action(async () => {
      const isJson = program.opts().json === true;
      try {
        const container = await createSharedContainer('stats');
        const stats = await container.queueService.stats();
        await container.shutdown();

        if (isJson) {
          outputJSON(stats);
          return;
        }
        outputTable(
          ['Stage', 'Pending', 'Inflight', 'Paused'],
          stats.stages.map(s => [s.stage, s.pending, s.inflight, s.paused ? chalk.yellow('yes') : 'no'])
        );
        outputKeyValue('Dead letter', String(stats.deadLetter));
      } catch (err) {
        handleError(err, isJson);
      }
    });

  program.command('sync-artifact [taskId]')
    .description('Rewrite the task artifact from the task records and print the commit message to use')
    .action(async (taskId: string | undefined) => {
      const isJson = program.opts().json === true;
      try {
        const container = await createSharedContainer('sync-artifact');
        await container.taskService.syncArtifact();
        const task = taskId ? await container.taskService.getTask(taskId) : null;
        await container.shutdown();

        const message = task ? statusCommitMessage(task) : artifactSyncCommitMessage();
        if (isJson) {
          outputJSON({ path: container.artifactRepo.relativePath, commitMessage: message });
          return;
        }
        outputKeyValue('Artifact', container.artifactRepo.relativePath);
        outputKeyValue('Commit with', message);
      } catch (err) {
        handleError(err, isJson);
      }
    });
}
