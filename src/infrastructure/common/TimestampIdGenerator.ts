import { randomBytes } from 'crypto';
import { IIdGenerator } from '../../domain/common/IIdGenerator';
import { IClock } from '../../domain/common/IClock';
import { SystemClock } from './SystemClock';

/**
 * ID generator that uses timestamps and random strings.
 * Generates IDs in the format: {prefix}_{timestamp}_{random}
 */
export class TimestampIdGenerator implements IIdGenerator {
  constructor(private clock: IClock = new SystemClock()) {}

  generate(prefix: string): string {
    const timestamp = this.clock.now().getTime();
    const random = randomBytes(5).toString('hex');
    return `${prefix}_${timestamp}_${random}`;
  }
}
