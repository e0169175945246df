import { IOperatorConsole } from '../../domain/services/IOperatorConsole';
import { ILogger } from '../../domain/common/ILogger';

/**
 * Operator console that writes to the log. Used when no terminal is attached.
 */
export class LoggerOperatorConsole implements IOperatorConsole {
  constructor(private logger: ILogger) {}

  async deliver(line: string): Promise<void> {
    this.logger.info(line, { channel: 'operator' });
  }
}
