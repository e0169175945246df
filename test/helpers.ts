import { Config } from '../src/infrastructure/config';
import { ConfigOverrides } from '../src/infrastructure/config/Config';
import { InMemoryCoordinationStore } from '../src/infrastructure/store/InMemoryCoordinationStore';
import { createContainer, Container } from '../src/container';
import { IClock } from '../src/domain/common/IClock';
import { ITicker, TickTask } from '../src/domain/common/ITicker';
import { IOperatorConsole } from '../src/domain/services/IOperatorConsole';
import { CiCheckResult, ICiProvider } from '../src/domain/services/ICiProvider';
import { ITaskArtifactRepository, TaskArtifact } from '../src/domain/repositories/ITaskArtifactRepository';
import { CiUnavailableError } from '../src/domain/common/Errors';

/**
 * Test helper utilities
 */

export const T0 = new Date('2026-03-02T10:00:00.000Z');

export function mockLogger() {
  return {
    error: jest.fn(),
    warn: jest.fn(),
    info: jest.fn(),
    debug: jest.fn(),
  };
}

export class FakeClock implements IClock {
  private current: number;

  constructor(start: Date = T0) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(date: Date): void {
    this.current = date.getTime();
  }
}

/**
 * Ticker driven by the test: nothing runs until `tick(name)` is called.
 */
export class ManualTicker implements ITicker {
  private tasks = new Map<string, { intervalMs: number; task: TickTask }>();

  schedule(name: string, intervalMs: number, task: TickTask, signal: AbortSignal): Promise<void> {
    this.tasks.set(name, { intervalMs, task });
    return new Promise((resolve) => {
      const stop = () => {
        this.tasks.delete(name);
        resolve();
      };
      if (signal.aborted) {
        stop();
        return;
      }
      signal.addEventListener('abort', stop, { once: true });
    });
  }

  scheduled(): Record<string, number> {
    const result: Record<string, number> = {};
    for (const [name, { intervalMs }] of this.tasks) {
      result[name] = intervalMs;
    }
    return result;
  }

  async tick(name: string): Promise<void> {
    const entry = this.tasks.get(name);
    if (!entry) {
      throw new Error(`Nothing scheduled as ${name}`);
    }
    await entry.task();
  }
}

export class RecordingOperatorConsole implements IOperatorConsole {
  lines: string[] = [];
  failNext = 0;

  async deliver(line: string): Promise<void> {
    if (this.failNext > 0) {
      this.failNext--;
      throw new Error('console unavailable');
    }
    this.lines.push(line);
  }
}

/**
 * CI stand-in: every required check passes, the commit is fresh and on the mainline,
 * unless a test says otherwise.
 */
export class StubCiProvider implements ICiProvider {
  conclusions: Record<string, CiCheckResult['conclusion']> = {};
  committedAt: Date | null;
  onMainline = true;
  unavailable = false;

  constructor(private clock: IClock) {
    this.committedAt = clock.now();
  }

  async checkResults(commitSha: string, requiredChecks: string[]): Promise<CiCheckResult[]> {
    this.guard();
    return requiredChecks.map(name => ({ name, conclusion: this.conclusions[name] ?? 'success' }));
  }

  async commitTimestamp(): Promise<Date | null> {
    this.guard();
    return this.committedAt;
  }

  async isOnMainline(): Promise<boolean> {
    this.guard();
    return this.onMainline;
  }

  private guard(): void {
    if (this.unavailable) {
      throw new CiUnavailableError('GitHub token is not configured');
    }
  }
}

export class MemoryArtifactRepository implements ITaskArtifactRepository {
  readonly relativePath = 'tasks/status.yaml';
  current: TaskArtifact = {};
  writes = 0;

  async read(): Promise<TaskArtifact> {
    return this.current;
  }

  async write(artifact: TaskArtifact): Promise<void> {
    this.writes++;
    this.current = artifact;
  }
}

export interface TestHarness extends Container {
  clock: FakeClock;
  ticker: ManualTicker;
  store: InMemoryCoordinationStore;
  ciProvider: StubCiProvider;
  operatorConsole: RecordingOperatorConsole;
  artifactRepo: MemoryArtifactRepository;
  logger: ReturnType<typeof mockLogger>;
}

/**
 * A fully wired container on the in-memory store with deterministic collaborators.
 */
export async function createHarness(overrides: ConfigOverrides = {}): Promise<TestHarness> {
  const clock = new FakeClock();
  const ticker = new ManualTicker();
  const store = new InMemoryCoordinationStore(clock);
  const ciProvider = new StubCiProvider(clock);
  const operatorConsole = new RecordingOperatorConsole();
  const artifactRepo = new MemoryArtifactRepository();
  const logger = mockLogger();

  const config = Config.fromObject({
    nodeEnv: 'test',
    ...overrides,
    store: { type: 'memory', ...overrides.store },
    notifications: { console: 'log', ...overrides.notifications },
  });

  const container = await createContainer({ config, logger, clock, ticker, store, ciProvider, operatorConsole, artifactRepo });
  return { ...container, clock, ticker, store, ciProvider, operatorConsole, artifactRepo, logger };
}

/**
 * Walk a task through the pipeline until it sits in `stage`'s inflight list.
 */
export async function claimInto(h: TestHarness, taskId: string, stage: 'new' | 'dev' | 'validation' | 'integration', agentId = 'agent-1'): Promise<void> {
  const stages = h.queueService.pipelineStages;
  await h.queueService.enqueue(taskId, stages[0]);
  for (const current of stages) {
    const claimed = await h.queueService.claim(current, { agentId, timeoutMs: 0 });
    if (claimed.kind !== 'claimed' || claimed.taskId !== taskId) {
      throw new Error(`expected to claim ${taskId} from ${current}`);
    }
    if (current === stage) return;
    await h.queueService.complete(taskId, current);
  }
}
