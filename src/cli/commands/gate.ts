import { Command } from 'commander';
import chalk from 'chalk';
import { readFile } from 'fs/promises';
import { Container } from '../../container';
import { GitWorkingTree } from '../../infrastructure/git/GitWorkingTree';
import { ConsoleLogger } from '../../infrastructure/common/ConsoleLogger';
import { GateDecision, gateFailureDecision } from '../../application/services/CommitGateService';
import { ILogger } from '../../domain/common/ILogger';
import { outputJSON } from '../utils/formatter';
import { createSharedContainer } from '../utils/sharedContainer';

export interface GateCommandOptions {
  files?: string[];
  sha?: string;
}

export interface GateDependencies {
  openContainer(): Promise<Container>;
  stagedFiles(repoRoot: string): Promise<string[]>;
}

const defaultDependencies: GateDependencies = {
  openContainer: () => createSharedContainer('gate'),
  stagedFiles: (repoRoot) => new GitWorkingTree(repoRoot).stagedFiles(),
};

/**
 * Evaluate one hook invocation. Any error inside the gate, including loading
 * configuration, becomes a HookFailure decision that honours GATE_FAIL_OPEN.
 */
export async function runGate(
  messageFile: string,
  options: GateCommandOptions,
  deps: GateDependencies = defaultDependencies
): Promise<GateDecision> {
  let failOpen = process.env.GATE_FAIL_OPEN !== 'false';
  let logger: ILogger = new ConsoleLogger('error');
  let message: string | undefined;
  let container: Container | null = null;

  try {
    message = await readFile(messageFile, 'utf-8');
    container = await deps.openContainer();
    failOpen = container.config.gate.failOpen;
    logger = container.logger;

    const files = options.files ?? (await deps.stagedFiles(container.config.artifact.repoRoot));
    return await container.commitGateService.evaluate({ message, files, commitSha: options.sha });
  } catch (err) {
    return gateFailureDecision(err, failOpen, logger, { messageFile, message });
  } finally {
    if (container) {
      await container.shutdown().catch((err: unknown) => {
        logger.warn('Commit gate shutdown failed', { error: err instanceof Error ? err.message : String(err) });
      });
    }
  }
}

/**
 * Register the commit gate. Installed as a `commit-msg` hook:
 *
 *   prp-coordinator gate "$1"
 *
 * The commit being made has no hash yet, so completion messages are only
 * verified when `--sha` names the commit, e.g. from a `pre-push` hook.
 */
export function registerGateCommands(program: Command) {
  program.command('gate <messageFile>')
    .description('Check a commit message and its staged files against task state (commit-msg hook)')
    .option('--files <paths...>', 'Files touched by the commit (default: staged files)')
    .option('--sha <hash>', 'Commit to verify for completion messages (required for them to pass)')
    .action(async (messageFile: string, cmdOpts: GateCommandOptions) => {
      const isJson = program.opts().json === true;
      const decision = await runGate(messageFile, cmdOpts);

      if (isJson) {
        outputJSON({ ...decision, error: decision.error?.toJSON() });
      } else if (!decision.allowed) {
        console.error(`${chalk.red('Commit rejected:')} ${decision.reason}`);
      } else if (decision.failOpen) {
        console.error(`${chalk.yellow('Commit gate failed open:')} ${decision.reason}`);
      }

      process.exitCode = decision.allowed ? 0 : 1;
    });
}
