import { IClock } from '../../domain/common/IClock';

export class SystemClock implements IClock {
  now(): Date {
    return new Date();
  }
}
