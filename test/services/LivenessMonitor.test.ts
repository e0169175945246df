import { createHarness, TestHarness, T0 } from '../helpers';
import { classifyHealth, DOWN_NOTIFIED_KEY } from '../../src/application/services/LivenessMonitor';
import { NotFoundError, ValidationError } from '../../src/domain/common/Errors';

const thresholds = { activeMs: 60_000, idleMs: 300_000 };

describe('classifyHealth', () => {
  const at = (offsetMs: number) => new Date(T0.getTime() + offsetMs);

  it('should grade heartbeat age against both thresholds', () => {
    const last = T0.toISOString();
    expect(classifyHealth(last, at(59_999), thresholds)).toBe('active');
    expect(classifyHealth(last, at(60_000), thresholds)).toBe('idle');
    expect(classifyHealth(last, at(299_999), thresholds)).toBe('idle');
    expect(classifyHealth(last, at(300_000), thresholds)).toBe('stale');
  });

  it('should be unknown without a readable heartbeat', () => {
    expect(classifyHealth(null, T0, thresholds)).toBe('unknown');
    expect(classifyHealth('yesterday-ish', T0, thresholds)).toBe('unknown');
  });
});

describe('AgentService', () => {
  let h: TestHarness;

  beforeEach(async () => {
    h = await createHarness();
  });

  it('should register an agent without activity', async () => {
    const agent = await h.agentService.register('agent-1');

    expect(agent).toEqual({
      id: 'agent-1',
      status: 'unknown',
      currentTask: null,
      lastActivity: null,
      registeredAt: '2026-03-02T10:00:00.000Z',
    });
  });

  it('should register on first heartbeat and record activity', async () => {
    h.clock.advance(5000);
    const agent = await h.agentService.heartbeat('agent-1', { currentTask: 'T1' });

    expect(agent.status).toBe('active');
    expect(agent.currentTask).toBe('T1');
    expect(agent.lastActivity).toBe('2026-03-02T10:00:05.000Z');

    const busy = await h.agentService.heartbeat('agent-1', { status: 'busy' });
    expect(busy.status).toBe('busy');
    expect(busy.currentTask).toBe('T1');
    expect(busy.registeredAt).toBe('2026-03-02T10:00:05.000Z');
  });

  it('should clear the current task on request', async () => {
    await h.agentService.heartbeat('agent-1', { currentTask: 'T1' });
    const idle = await h.agentService.heartbeat('agent-1', { currentTask: null, status: 'idle' });

    expect(idle.currentTask).toBeNull();
  });

  it('should reject malformed ids and unknown agents', async () => {
    await expect(h.agentService.register('bad agent')).rejects.toThrow(ValidationError);
    await expect(h.agentService.get('agent-9')).rejects.toThrow(NotFoundError);
  });
});

describe('LivenessMonitor', () => {
  let h: TestHarness;

  const agentDownCount = async () =>
    (await h.notificationService.pending()).filter(n => n.type === 'agent_down').length;

  beforeEach(async () => {
    h = await createHarness();
    await h.agentService.heartbeat('agent-1', { currentTask: 'T1' });
  });

  it('should move from active to idle to stale as the heartbeat ages', async () => {
    const seen: string[] = [];
    for (const step of [30_000, 90_000, 240_000]) {
      h.clock.advance(step);
      seen.push(await h.livenessMonitor.health('agent-1'));
    }

    expect(seen).toEqual(['active', 'idle', 'stale']);
  });

  it('should report a stale agent once per episode', async () => {
    h.clock.advance(6 * 60_000);

    const reports = await h.livenessMonitor.check();
    await h.livenessMonitor.check();

    expect(reports).toEqual([{ agentId: 'agent-1', health: 'stale', lastActivity: '2026-03-02T10:00:00.000Z' }]);
    expect(await agentDownCount()).toBe(1);

    const [notification] = (await h.notificationService.pending()).filter(n => n.type === 'agent_down');
    expect(notification.payload).toEqual({
      agentId: 'agent-1',
      lastActivity: '2026-03-02T10:00:00.000Z',
      currentTask: 'T1',
    });
  });

  it('should report again after the agent recovers and goes stale again', async () => {
    h.clock.advance(6 * 60_000);
    await h.livenessMonitor.check();

    await h.agentService.heartbeat('agent-1');
    await h.livenessMonitor.check();
    expect(await h.store.hgetall(DOWN_NOTIFIED_KEY)).toEqual({});

    h.clock.advance(6 * 60_000);
    await h.livenessMonitor.check();

    expect(await agentDownCount()).toBe(2);
  });

  it('should report a new heartbeat that goes stale before any check saw it', async () => {
    h.clock.advance(6 * 60_000);
    await h.livenessMonitor.check();

    await h.agentService.heartbeat('agent-1');
    h.clock.advance(6 * 60_000);
    await h.livenessMonitor.check();

    expect(await agentDownCount()).toBe(2);
    expect(await h.store.hgetall(DOWN_NOTIFIED_KEY)).toEqual({
      'agent-1|2026-03-02T10:06:00.000Z': '2026-03-02T10:12:00.000Z',
    });
  });

  it('should report an episode once when checks overlap', async () => {
    h.clock.advance(6 * 60_000);

    await Promise.all([h.livenessMonitor.check(), h.livenessMonitor.check()]);

    expect(await agentDownCount()).toBe(1);
  });

  it('should leave agents that never reported alone', async () => {
    await h.agentService.register('agent-2');
    h.clock.advance(60 * 60_000);

    const reports = await h.livenessMonitor.check();

    expect(reports.find(r => r.agentId === 'agent-2')).toEqual({ agentId: 'agent-2', health: 'unknown', lastActivity: null });
    expect(await agentDownCount()).toBe(1);
  });

  it('should reject health queries for unknown agents', async () => {
    await expect(h.livenessMonitor.health('agent-9')).rejects.toThrow(NotFoundError);
  });
});
