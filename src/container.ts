import { Config } from './infrastructure/config';
import { ConsoleLogger } from './infrastructure/common/ConsoleLogger';
import { SystemClock } from './infrastructure/common/SystemClock';
import { IntervalTicker } from './infrastructure/common/IntervalTicker';
import { TimestampIdGenerator } from './infrastructure/common/TimestampIdGenerator';
import { InMemoryEventBus } from './infrastructure/events/InMemoryEventBus';
import { InMemoryCoordinationStore } from './infrastructure/store/InMemoryCoordinationStore';
import { RedisCoordinationStore } from './infrastructure/store/RedisCoordinationStore';
import { StoreTaskRepository } from './infrastructure/repositories/StoreTaskRepository';
import { StoreAgentRepository } from './infrastructure/repositories/StoreAgentRepository';
import { YamlTaskArtifactRepository } from './infrastructure/repositories/YamlTaskArtifactRepository';
import { GitHubCiProvider } from './infrastructure/ci/GitHubCiProvider';
import { TmuxOperatorConsole } from './infrastructure/console/TmuxOperatorConsole';
import { LoggerOperatorConsole } from './infrastructure/console/LoggerOperatorConsole';
import { StableIdService } from './application/services/StableIdService';
import { TaskService } from './application/services/TaskService';
import { QueueService } from './application/services/QueueService';
import { AgentService } from './application/services/AgentService';
import { LivenessMonitor } from './application/services/LivenessMonitor';
import { NotificationService } from './application/services/NotificationService';
import { CommitGateService } from './application/services/CommitGateService';
import { RecoverySweeper } from './application/services/RecoverySweeper';
import { QueueMonitor } from './application/services/QueueMonitor';
import { ILogger, componentLogger } from './domain/common/ILogger';
import { IClock } from './domain/common/IClock';
import { ITicker } from './domain/common/ITicker';
import { IIdGenerator } from './domain/common/IIdGenerator';
import { IEventBus } from './domain/events/IEventBus';
import { ICoordinationStore } from './domain/store/ICoordinationStore';
import { ITaskRepository } from './domain/repositories/ITaskRepository';
import { IAgentRepository } from './domain/repositories/IAgentRepository';
import { ITaskArtifactRepository } from './domain/repositories/ITaskArtifactRepository';
import { ICiProvider } from './domain/services/ICiProvider';
import { IOperatorConsole } from './domain/services/IOperatorConsole';

/** Ledger entries younger than this belong to a mover that may still be running. */
const LEDGER_GRACE_MS = 60_000;

/**
 * Dependency injection container.
 * Wires together all application components.
 */
export interface Container {
  // Configuration
  config: Config;

  // Infrastructure
  logger: ILogger;
  clock: IClock;
  ticker: ITicker;
  idGenerator: IIdGenerator;
  eventBus: IEventBus;
  store: ICoordinationStore;
  ciProvider: ICiProvider;
  operatorConsole: IOperatorConsole;

  // Repositories
  taskRepo: ITaskRepository;
  agentRepo: IAgentRepository;
  artifactRepo: ITaskArtifactRepository;

  // Services
  stableIdService: StableIdService;
  taskService: TaskService;
  queueService: QueueService;
  agentService: AgentService;
  livenessMonitor: LivenessMonitor;
  notificationService: NotificationService;
  commitGateService: CommitGateService;
  recoverySweeper: RecoverySweeper;
  queueMonitor: QueueMonitor;

  // Lifecycle
  initialize(): Promise<void>;
  shutdown(): Promise<void>;
}

/**
 * Collaborators that can be swapped out, mainly by tests.
 */
export interface ContainerOverrides {
  config?: Config;
  logger?: ILogger;
  clock?: IClock;
  ticker?: ITicker;
  store?: ICoordinationStore;
  ciProvider?: ICiProvider;
  operatorConsole?: IOperatorConsole;
  artifactRepo?: ITaskArtifactRepository;
}

function createStore(config: Config, clock: IClock, logger: ILogger): ICoordinationStore {
  if (config.store.type === 'redis') {
    return new RedisCoordinationStore({ url: config.store.redisUrl, keyPrefix: config.store.keyPrefix }, logger);
  }
  return new InMemoryCoordinationStore(clock);
}

function createOperatorConsole(config: Config, logger: ILogger): IOperatorConsole {
  if (config.notifications.console === 'tmux') {
    return new TmuxOperatorConsole(config.notifications.tmuxTarget);
  }
  return new LoggerOperatorConsole(logger);
}

/**
 * Create and wire up all dependencies.
 */
export async function createContainer(overrides: ContainerOverrides = {}): Promise<Container> {
  // 1. Configuration
  const config = overrides.config ?? new Config();

  // 2. Infrastructure - Core
  const logger = overrides.logger ?? new ConsoleLogger(config.log.level, {}, config.log.format);
  const clock = overrides.clock ?? new SystemClock();
  const ticker = overrides.ticker ?? new IntervalTicker(componentLogger(logger, 'ticker'));
  const idGenerator = new TimestampIdGenerator(clock);
  const eventBus = new InMemoryEventBus(componentLogger(logger, 'events'));
  const store = overrides.store ?? createStore(config, clock, componentLogger(logger, 'store'));
  const ciProvider =
    overrides.ciProvider ?? GitHubCiProvider.create(config.github.token, config.github.repository, componentLogger(logger, 'ci'));
  const operatorConsole = overrides.operatorConsole ?? createOperatorConsole(config, componentLogger(logger, 'console'));

  // 3. Repositories
  const taskRepo = new StoreTaskRepository(store, componentLogger(logger, 'tasks'));
  const agentRepo = new StoreAgentRepository(store);
  const artifactRepo =
    overrides.artifactRepo ??
    new YamlTaskArtifactRepository(config.artifact.repoRoot, config.artifact.path, componentLogger(logger, 'artifact'));

  // 4. Services
  const notificationService = new NotificationService(
    store,
    operatorConsole,
    eventBus,
    idGenerator,
    clock,
    ticker,
    componentLogger(logger, 'notifications'),
    {
      dedupCapacity: config.notifications.dedupCapacity,
      pollIntervalMs: config.notifications.pollIntervalMs,
      keepAliveIntervalMs: config.notifications.keepAliveIntervalMs,
    }
  );
  const stableIdService = new StableIdService(store, componentLogger(logger, 'stable-ids'));
  const taskService = new TaskService(
    taskRepo,
    artifactRepo,
    stableIdService,
    ciProvider,
    eventBus,
    clock,
    componentLogger(logger, 'task-state'),
    {
      depth: config.pipeline.depth,
      requiredChecks: config.gate.requiredChecks,
      mainlineBranch: config.gate.mainlineBranch,
      freshnessHours: config.gate.freshnessHours,
    }
  );
  const queueService = new QueueService(
    store,
    taskService,
    notificationService,
    eventBus,
    clock,
    componentLogger(logger, 'queue'),
    {
      depth: config.pipeline.depth,
      maxRetries: config.pipeline.maxRetries,
      ledgerGraceMs: LEDGER_GRACE_MS,
    }
  );
  const agentService = new AgentService(agentRepo, eventBus, clock, componentLogger(logger, 'agents'));
  const livenessMonitor = new LivenessMonitor(
    agentRepo,
    store,
    notificationService,
    eventBus,
    clock,
    componentLogger(logger, 'liveness'),
    { activeMs: config.liveness.activeMs, idleMs: config.liveness.idleMs }
  );
  const commitGateService = new CommitGateService(taskService, componentLogger(logger, 'commit-gate'), {
    failOpen: config.gate.failOpen,
    activeStatuses: config.gate.activeStatuses,
    artifactPath: artifactRepo.relativePath,
  });
  const recoverySweeper = new RecoverySweeper(queueService, ticker, componentLogger(logger, 'sweeper'), {
    intervalMs: config.pipeline.recoveryIntervalMs,
    inflightMaxAgeMs: config.pipeline.inflightMaxAgeMs,
  });
  const queueMonitor = new QueueMonitor(
    queueService,
    taskService,
    livenessMonitor,
    store,
    notificationService,
    ticker,
    componentLogger(logger, 'monitor'),
    {
      scalingThreshold: config.pipeline.scalingThreshold,
      livenessIntervalMs: config.liveness.checkIntervalMs,
      progressReportIntervalMs: config.pipeline.progressReportIntervalMs,
    }
  );

  const container: Container = {
    config,
    logger,
    clock,
    ticker,
    idGenerator,
    eventBus,
    store,
    ciProvider,
    operatorConsole,
    taskRepo,
    agentRepo,
    artifactRepo,
    stableIdService,
    taskService,
    queueService,
    agentService,
    livenessMonitor,
    notificationService,
    commitGateService,
    recoverySweeper,
    queueMonitor,

    async initialize() {
      logger.info('Initializing container...', { store: config.store.type, depth: config.pipeline.depth });

      if (!(await store.ping())) {
        logger.warn('Coordination store did not answer ping');
      }

      logger.info('Container initialized');
    },

    async shutdown() {
      logger.info('Shutting down container...');
      eventBus.removeAllListeners();
      await store.close();
      logger.info('Container shutdown complete');
    }
  };

  return container;
}
