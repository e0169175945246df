import chalk from 'chalk';
import Table from 'cli-table3';
import { AppError, NotFoundError, TransientStoreError } from '../../domain/common/Errors';

export function outputJSON(data: unknown) {
  console.log(JSON.stringify({ success: true, data }, null, 2));
}

export function outputTable(headers: string[], rows: Array<Array<string | number>>) {
  const table = new Table({
    head: headers.map(h => chalk.cyan(h)),
    style: { head: [], border: [] }
  });
  table.push(...rows);
  console.log(table.toString());
}

export function outputKeyValue(key: string, value: string) {
  console.log(`${chalk.bold(key)}: ${value}`);
}

/**
 * Exit code mapping:
 *   0 = Success
 *   1 = General / validation error, or a rejected commit
 *   2 = Resource not found
 *   3 = Coordination store unreachable
 */
export function exitCodeFor(err: unknown): number {
  if (err instanceof NotFoundError) return 2;
  if (err instanceof TransientStoreError) return 3;
  return 1;
}

export function handleError(err: unknown, json: boolean): never {
  const code = err instanceof AppError ? err.code : 'unknown_error';
  const message = err instanceof Error ? err.message : String(err);

  if (json) {
    console.error(JSON.stringify({
      success: false,
      error: code,
      message,
      details: err instanceof AppError ? err.details : undefined
    }, null, 2));
  } else {
    console.error(`${chalk.red('Error:')} ${message}`);
  }
  process.exit(exitCodeFor(err));
}
