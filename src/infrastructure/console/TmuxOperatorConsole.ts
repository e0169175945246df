import { execFile } from 'child_process';
import { promisify } from 'util';
import { IOperatorConsole } from '../../domain/services/IOperatorConsole';

const execFileAsync = promisify(execFile);

/**
 * Runs an external command, rejecting on a non-zero exit.
 */
export type CommandRunner = (file: string, args: string[]) => Promise<unknown>;

const runCommand: CommandRunner = (file, args) => execFileAsync(file, args, { timeout: 5000 });

/**
 * Types notifications into a tmux pane: the text is sent literally, then submitted.
 */
export class TmuxOperatorConsole implements IOperatorConsole {
  constructor(
    private target: string,
    private run: CommandRunner = runCommand
  ) {}

  async deliver(line: string): Promise<void> {
    // Newlines would submit early; the operator sees one line per notification.
    const literal = line.replace(/\r?\n/g, ' ');
    await this.run('tmux', ['send-keys', '-t', this.target, '-l', literal]);
    await this.run('tmux', ['send-keys', '-t', this.target, 'Enter']);
  }
}
