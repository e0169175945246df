import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

/**
 * Runs git with the given arguments and resolves with its stdout.
 */
export type GitRunner = (args: string[]) => Promise<string>;

const runGit = (cwd: string): GitRunner => async (args) => {
  const { stdout } = await execFileAsync('git', args, { cwd, timeout: 10000 });
  return stdout;
};

/**
 * Read-only view of the repository a commit hook runs in.
 */
export class GitWorkingTree {
  private git: GitRunner;

  constructor(cwd: string, git?: GitRunner) {
    this.git = git ?? runGit(cwd);
  }

  /** Paths staged for the commit being made. */
  async stagedFiles(): Promise<string[]> {
    const output = await this.git(['diff', '--cached', '--name-only']);
    return output.split('\n').map(line => line.trim()).filter(line => line.length > 0);
  }
}
