import * as path from 'path';
import * as os from 'os';
import { ConfigError } from '../../domain/common/Errors';
import { LogFormat, LogLevel } from '../../domain/common/ILogger';
import { PipelineDepth, TaskStatus, TASK_STATUSES } from '../../types';

/**
 * Coordination store configuration.
 */
export interface StoreConfig {
  type: 'memory' | 'redis';
  redisUrl: string;
  /** Namespace applied to every key. */
  keyPrefix: string;
}

/**
 * Queue pipeline configuration.
 */
export interface PipelineConfig {
  depth: PipelineDepth;
  maxRetries: number;
  inflightMaxAgeMs: number;
  recoveryIntervalMs: number;
  /** Pending depth at which a `scaling_needed` notification is raised. */
  scalingThreshold: number;
  progressReportIntervalMs: number;
}

/**
 * Agent liveness thresholds.
 */
export interface LivenessConfig {
  activeMs: number;
  idleMs: number;
  checkIntervalMs: number;
}

/**
 * Notification delivery configuration.
 */
export interface NotificationConfig {
  pollIntervalMs: number;
  keepAliveIntervalMs: number;
  dedupCapacity: number;
  console: 'tmux' | 'log';
  tmuxTarget: string;
}

/**
 * Commit/state gate configuration.
 */
export interface GateConfig {
  failOpen: boolean;
  requiredChecks: string[];
  mainlineBranch: string;
  freshnessHours: number;
  /** Statuses in which a task may receive ordinary commits. */
  activeStatuses: TaskStatus[];
}

/**
 * Persisted task artifact location.
 */
export interface ArtifactConfig {
  repoRoot: string;
  /** Path of the artifact relative to `repoRoot`. */
  path: string;
}

export interface GitHubConfig {
  token?: string;
  /** `owner/repo` */
  repository?: string;
}

/**
 * CORS configuration options.
 */
export interface CorsConfig {
  enabled: boolean;
  origins: string[];
  credentials?: boolean;
}

/**
 * Logging configuration.
 */
export interface LogConfig {
  level: LogLevel;
  format: LogFormat;
}

/**
 * Complete configuration options.
 */
export interface ConfigOptions {
  // Server
  port: number;
  host: string;

  // Coordination
  store: StoreConfig;
  pipeline: PipelineConfig;
  liveness: LivenessConfig;
  notifications: NotificationConfig;
  gate: GateConfig;
  artifact: ArtifactConfig;
  github: GitHubConfig;

  // Features
  cors: CorsConfig;

  // Operational
  log: LogConfig;

  // Environment
  nodeEnv: 'development' | 'production' | 'test';
}

/**
 * Overrides accepted by `Config.fromObject`: sections merge field by field.
 */
export type ConfigOverrides = {
  [K in keyof ConfigOptions]?: ConfigOptions[K] extends object ? Partial<ConfigOptions[K]> : ConfigOptions[K];
};

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
const LOG_FORMATS = ['json', 'pretty'] as const;
const NODE_ENVS = ['development', 'production', 'test'] as const;
const STORE_TYPES = ['memory', 'redis'] as const;
const PIPELINE_DEPTHS = ['development', 'validation', 'integration'] as const;
const CONSOLES = ['tmux', 'log'] as const;

/**
 * Expand ~ to home directory in paths.
 */
function expandPath(p: string): string {
  if (p.startsWith('~')) {
    return path.join(os.homedir(), p.slice(1));
  }
  return p;
}

function oneOf<T extends string>(name: string, value: string | undefined, allowed: readonly T[], fallback: T): T {
  if (value === undefined || value === '') return fallback;
  const match = allowed.find(candidate => candidate === value);
  if (!match) {
    throw new ConfigError(`${name} must be one of ${allowed.map(a => `"${a}"`).join(', ')}`);
  }
  return match;
}

function intEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

function listEnv(name: string, fallback: string[]): string[] {
  const raw = process.env[name];
  if (raw === undefined) return fallback;
  return raw.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

function statusList(name: string, fallback: TaskStatus[]): TaskStatus[] {
  return listEnv(name, fallback).map(value => oneOf(name, value, TASK_STATUSES, 'in_progress'));
}

/**
 * Centralized configuration class.
 * Loads configuration from environment variables with sensible defaults.
 */
export class Config implements Readonly<ConfigOptions> {
  private config: ConfigOptions;

  constructor() {
    this.config = this.loadFromEnvironment();
    this.validate();
  }

  private loadFromEnvironment(): ConfigOptions {
    const nodeEnv = oneOf('NODE_ENV', process.env.NODE_ENV, NODE_ENVS, 'development');

    return {
      // Server
      port: intEnv('PORT', 3000),
      host: process.env.HOST || '0.0.0.0',

      store: {
        type: oneOf('STORE_TYPE', process.env.STORE_TYPE, STORE_TYPES, 'memory'),
        redisUrl: process.env.REDIS_URL || 'redis://localhost:6379',
        keyPrefix: process.env.KEY_PREFIX ?? `${nodeEnv}_`
      },

      pipeline: {
        depth: oneOf('PIPELINE_DEPTH', process.env.PIPELINE_DEPTH, PIPELINE_DEPTHS, 'integration'),
        maxRetries: intEnv('MAX_RETRIES', 3),
        inflightMaxAgeMs: intEnv('INFLIGHT_MAX_AGE_MS', 30 * 60 * 1000),
        recoveryIntervalMs: intEnv('RECOVERY_INTERVAL_MS', 60 * 1000),
        scalingThreshold: intEnv('SCALING_THRESHOLD', 20),
        progressReportIntervalMs: intEnv('PROGRESS_REPORT_INTERVAL_MS', 30 * 60 * 1000)
      },

      liveness: {
        activeMs: intEnv('LIVENESS_ACTIVE_MS', 60 * 1000),
        idleMs: intEnv('LIVENESS_IDLE_MS', 300 * 1000),
        checkIntervalMs: intEnv('LIVENESS_CHECK_INTERVAL_MS', 60 * 1000)
      },

      notifications: {
        pollIntervalMs: intEnv('NOTIFY_POLL_INTERVAL_MS', 5 * 1000),
        keepAliveIntervalMs: intEnv('NOTIFY_KEEPALIVE_INTERVAL_MS', 10 * 60 * 1000),
        dedupCapacity: intEnv('NOTIFY_DEDUP_CAPACITY', 1000),
        console: oneOf('OPERATOR_CONSOLE', process.env.OPERATOR_CONSOLE, CONSOLES, 'log'),
        tmuxTarget: process.env.TMUX_TARGET || 'orchestrator:0'
      },

      gate: {
        failOpen: process.env.GATE_FAIL_OPEN !== 'false',
        requiredChecks: listEnv('GATE_REQUIRED_CHECKS', ['test', 'lint']),
        mainlineBranch: process.env.GATE_MAINLINE_BRANCH || 'main',
        freshnessHours: intEnv('GATE_FRESHNESS_HOURS', 24),
        activeStatuses: statusList('GATE_ACTIVE_STATUSES', ['in_progress'])
      },

      artifact: {
        repoRoot: expandPath(process.env.REPO_ROOT || process.cwd()),
        path: process.env.TASK_ARTIFACT_PATH || 'tasks/status.yaml'
      },

      github: {
        token: process.env.GITHUB_TOKEN || undefined,
        repository: process.env.GITHUB_REPOSITORY || undefined
      },

      // CORS
      cors: {
        enabled: process.env.CORS_ENABLED !== 'false',
        origins: process.env.CORS_ORIGINS?.split(',').map(s => s.trim()) || ['*'],
        credentials: process.env.CORS_CREDENTIALS === 'true'
      },

      // Operational
      log: {
        level: oneOf('LOG_LEVEL', process.env.LOG_LEVEL, LOG_LEVELS, 'info'),
        format: oneOf('LOG_FORMAT', process.env.LOG_FORMAT, LOG_FORMATS, 'pretty')
      },

      nodeEnv
    };
  }

  /**
   * Validate configuration values.
   * @throws {ConfigError} if configuration is invalid
   */
  validate(): void {
    // Port validation
    if (this.config.port < 1 || this.config.port > 65535) {
      throw new ConfigError('PORT must be between 1 and 65535');
    }

    if (this.config.store.type === 'redis' && !this.config.store.redisUrl) {
      throw new ConfigError('REDIS_URL required when STORE_TYPE is "redis"');
    }

    if (this.config.pipeline.maxRetries < 0) {
      throw new ConfigError('MAX_RETRIES must not be negative');
    }

    for (const [name, value] of [
      ['INFLIGHT_MAX_AGE_MS', this.config.pipeline.inflightMaxAgeMs],
      ['RECOVERY_INTERVAL_MS', this.config.pipeline.recoveryIntervalMs],
      ['LIVENESS_CHECK_INTERVAL_MS', this.config.liveness.checkIntervalMs],
      ['NOTIFY_POLL_INTERVAL_MS', this.config.notifications.pollIntervalMs],
      ['NOTIFY_KEEPALIVE_INTERVAL_MS', this.config.notifications.keepAliveIntervalMs],
      ['NOTIFY_DEDUP_CAPACITY', this.config.notifications.dedupCapacity]
    ] as const) {
      if (value <= 0) {
        throw new ConfigError(`${name} must be positive`);
      }
    }

    if (this.config.liveness.activeMs >= this.config.liveness.idleMs) {
      throw new ConfigError('LIVENESS_ACTIVE_MS must be lower than LIVENESS_IDLE_MS');
    }

    if (this.config.github.repository && !/^[^/\s]+\/[^/\s]+$/.test(this.config.github.repository)) {
      throw new ConfigError('GITHUB_REPOSITORY must look like "owner/repo"');
    }

    if (path.isAbsolute(this.config.artifact.path)) {
      throw new ConfigError('TASK_ARTIFACT_PATH must be relative to REPO_ROOT');
    }
  }

  // Readonly accessors
  get port(): number { return this.config.port; }
  get host(): string { return this.config.host; }
  get store(): StoreConfig { return this.config.store; }
  get pipeline(): PipelineConfig { return this.config.pipeline; }
  get liveness(): LivenessConfig { return this.config.liveness; }
  get notifications(): NotificationConfig { return this.config.notifications; }
  get gate(): GateConfig { return this.config.gate; }
  get artifact(): ArtifactConfig { return this.config.artifact; }
  get github(): GitHubConfig { return this.config.github; }
  get cors(): CorsConfig { return this.config.cors; }
  get log(): LogConfig { return this.config.log; }
  get nodeEnv(): ConfigOptions['nodeEnv'] { return this.config.nodeEnv; }

  /**
   * Check if running in test mode.
   */
  get isTest(): boolean {
    return this.config.nodeEnv === 'test';
  }

  /**
   * Create a Config instance from an object (useful for testing).
   */
  static fromObject(overrides: ConfigOverrides): Config {
    const config = new Config();
    const base = config.config;
    config.config = {
      port: overrides.port ?? base.port,
      host: overrides.host ?? base.host,
      store: { ...base.store, ...overrides.store },
      pipeline: { ...base.pipeline, ...overrides.pipeline },
      liveness: { ...base.liveness, ...overrides.liveness },
      notifications: { ...base.notifications, ...overrides.notifications },
      gate: { ...base.gate, ...overrides.gate },
      artifact: { ...base.artifact, ...overrides.artifact },
      github: { ...base.github, ...overrides.github },
      cors: { ...base.cors, ...overrides.cors },
      log: { ...base.log, ...overrides.log },
      nodeEnv: overrides.nodeEnv ?? base.nodeEnv
    };
    config.validate();
    return config;
  }

  /**
   * Get configuration as plain object.
   */
  toJSON(): ConfigOptions {
    return { ...this.config };
  }

  /**
   * Get a summary string for logging.
   */
  toString(): string {
    return [
      `Config:`,
      `  port: ${this.port}`,
      `  store: ${this.store.type}${this.store.type === 'redis' ? ` (${this.store.redisUrl})` : ''} prefix=${this.store.keyPrefix}`,
      `  pipeline.depth: ${this.pipeline.depth}`,
      `  pipeline.maxRetries: ${this.pipeline.maxRetries}`,
      `  notifications.console: ${this.notifications.console}`,
      `  gate.failOpen: ${this.gate.failOpen}`,
      `  gate.requiredChecks: ${this.gate.requiredChecks.join(',')}`,
      `  artifact: ${this.artifact.path}`,
      `  nodeEnv: ${this.nodeEnv}`
    ].join('\n');
  }
}
