import { createProgram } from '../../src/cli';
import { exitCodeFor, handleError, outputJSON } from '../../src/cli/utils/formatter';
import { createSharedContainer } from '../../src/cli/utils/sharedContainer';
import { ConfigError, NotFoundError, TransientStoreError, ValidationError } from '../../src/domain/common/Errors';

describe('CLI', () => {
  it('should register every command', () => {
    const names = createProgram().commands.map(c => c.name());

    expect(names).toEqual([
      'serve',
      'sweeper',
      'notifier',
      'monitor',
      'gate',
      'migrate-ids',
      'enqueue',
      'stats',
      'sync-artifact',
    ]);
  });

  describe('createSharedContainer', () => {
    const saved = { ...process.env };

    afterEach(() => {
      process.env = { ...saved };
    });

    it('should refuse the in-memory store for commands that run in their own process', async () => {
      process.env.STORE_TYPE = 'memory';

      await expect(createSharedContainer('stats')).rejects.toThrow(
        new ConfigError('stats runs in its own process and needs STORE_TYPE=redis')
      );
    });
  });

  describe('exitCodeFor', () => {
    it('should map errors to distinct exit codes', () => {
      expect(exitCodeFor(new NotFoundError('Task', 'T1'))).toBe(2);
      expect(exitCodeFor(new TransientStoreError('connection refused'))).toBe(3);
      expect(exitCodeFor(new ValidationError('bad input'))).toBe(1);
      expect(exitCodeFor('boom')).toBe(1);
    });
  });

  describe('output', () => {
    let log: jest.SpyInstance;
    let error: jest.SpyInstance;
    let exit: jest.SpyInstance;

    beforeEach(() => {
      log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
      error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      exit = jest.spyOn(process, 'exit').mockImplementation(() => {
        throw new Error('exit');
      });
    });

    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('should wrap JSON output in a success envelope', () => {
      outputJSON({ taskId: 'T1' });

      expect(log).toHaveBeenCalledWith(JSON.stringify({ success: true, data: { taskId: 'T1' } }, null, 2));
    });

    it('should print a JSON error and exit with its code', () => {
      expect(() => handleError(new NotFoundError('Task', 'T1'), true)).toThrow('exit');

      expect(error).toHaveBeenCalledWith(JSON.stringify({
        success: false,
        error: 'NOT_FOUND',
        message: "Task with id 'T1' not found",
      }, null, 2));
      expect(exit).toHaveBeenCalledWith(2);
    });
  });
});
