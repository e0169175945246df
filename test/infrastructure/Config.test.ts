import { Config } from '../../src/infrastructure/config';
import { ConfigError } from '../../src/domain/common/Errors';

describe('Config', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it('should load defaults', () => {
    for (const name of ['PIPELINE_DEPTH', 'MAX_RETRIES', 'GATE_FAIL_OPEN', 'GATE_REQUIRED_CHECKS', 'STORE_TYPE', 'KEY_PREFIX', 'GATE_ACTIVE_STATUSES']) {
      delete process.env[name];
    }
    process.env.NODE_ENV = 'test';

    const config = new Config();

    expect(config.pipeline.depth).toBe('integration');
    expect(config.pipeline.maxRetries).toBe(3);
    expect(config.gate.failOpen).toBe(true);
    expect(config.gate.requiredChecks).toEqual(['test', 'lint']);
    expect(config.gate.activeStatuses).toEqual(['in_progress']);
    expect(config.store).toMatchObject({ type: 'memory', keyPrefix: 'test_' });
    expect(config.isTest).toBe(true);
  });

  it('should read the environment', () => {
    process.env.PIPELINE_DEPTH = 'validation';
    process.env.GATE_FAIL_OPEN = 'false';
    process.env.GATE_REQUIRED_CHECKS = 'unit, e2e';
    process.env.GATE_ACTIVE_STATUSES = 'in_progress,validation';

    const config = new Config();

    expect(config.pipeline.depth).toBe('validation');
    expect(config.gate.failOpen).toBe(false);
    expect(config.gate.requiredChecks).toEqual(['unit', 'e2e']);
    expect(config.gate.activeStatuses).toEqual(['in_progress', 'validation']);
  });

  it('should reject invalid values', () => {
    process.env.PIPELINE_DEPTH = 'deploy';
    expect(() => new Config()).toThrow('PIPELINE_DEPTH must be one of "development", "validation", "integration"');

    delete process.env.PIPELINE_DEPTH;
    process.env.MAX_RETRIES = 'three';
    expect(() => new Config()).toThrow('MAX_RETRIES must be an integer, got "three"');
  });

  it('should validate overrides', () => {
    expect(() => Config.fromObject({ liveness: { activeMs: 600_000 } })).toThrow(ConfigError);
    expect(() => Config.fromObject({ artifact: { path: '/etc/status.yaml' } })).toThrow(
      'TASK_ARTIFACT_PATH must be relative to REPO_ROOT'
    );
    expect(() => Config.fromObject({ github: { repository: 'not-a-repo' } })).toThrow(
      'GITHUB_REPOSITORY must look like "owner/repo"'
    );
  });

  it('should merge overrides field by field', () => {
    const config = Config.fromObject({ pipeline: { maxRetries: 5 } });

    expect(config.pipeline.maxRetries).toBe(5);
    expect(config.pipeline.scalingThreshold).toBe(20);
  });
});
