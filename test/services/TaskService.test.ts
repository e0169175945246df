import { createHarness, TestHarness, T0 } from '../helpers';
import { InvalidTransitionError, NotFoundError, ValidationError, ValidationGateFailure } from '../../src/domain/common/Errors';

describe('TaskService', () => {
  let h: TestHarness;

  beforeEach(async () => {
    h = await createHarness({ pipeline: { depth: 'development' } });
  });

  describe('createTask', () => {
    it('should assign sequential stable ids', async () => {
      const first = await h.taskService.createTask({ id: 'T1', title: '  Build parser ' });
      const second = await h.taskService.createTask({ id: 'T2', priority: 'high' });

      expect(first.stableId).toBe('PRP-0001');
      expect(first.title).toBe('Build parser');
      expect(first.status).toBe('new');
      expect(first.createdAt).toBe('2026-03-02T10:00:00.000Z');
      expect(second.stableId).toBe('PRP-0002');
      expect(second.priority).toBe('high');
    });

    it('should reject duplicate and malformed ids', async () => {
      await h.taskService.createTask({ id: 'T1' });

      await expect(h.taskService.createTask({ id: 'T1' })).rejects.toThrow('Task T1 already exists');
      await expect(h.taskService.createTask({ id: 'bad id' })).rejects.toThrow(ValidationError);
    });

    it('should write the task artifact', async () => {
      await h.taskService.createTask({ id: 'T1' });

      expect(h.artifactRepo.current).toEqual({
        T1: { status: 'new', priority: 'medium', stable_id: 'PRP-0001', legacy_id: null, migrated_at: null },
      });
    });

    it('should keep going when the artifact cannot be written', async () => {
      jest.spyOn(h.artifactRepo, 'write').mockRejectedValueOnce(new Error('disk full'));

      const task = await h.taskService.createTask({ id: 'T1' });

      expect(task.id).toBe('T1');
      expect(h.logger.error).toHaveBeenCalledWith('Failed to write task artifact', new Error('disk full'));
    });
  });

  describe('lookup', () => {
    it('should find a task by display id or stable id', async () => {
      await h.taskService.createTask({ id: 'T1' });

      expect((await h.taskService.getTask('PRP-0001')).id).toBe('T1');
      expect(await h.taskService.findTask('PRP-0009')).toBeNull();
      await expect(h.taskService.getTask('T404')).rejects.toThrow(NotFoundError);
    });
  });

  describe('transition', () => {
    beforeEach(async () => {
      await h.taskService.createTask({ id: 'T1' });
    });

    it('should walk the forward chain and stamp each entry time', async () => {
      await h.taskService.assign('T1', 'agent-1');
      h.clock.advance(60_000);
      const started = await h.taskService.start('T1');

      expect(started.status).toBe('in_progress');
      expect(started.owner).toBe('agent-1');
      expect(started.assignedAt).toBe('2026-03-02T10:00:00.000Z');
      expect(started.devStartedAt).toBe('2026-03-02T10:01:00.000Z');
      expect(h.artifactRepo.current.T1.status).toBe('in_progress');
    });

    it('should reject a skipped step and name the required status', async () => {
      await expect(h.taskService.start('T1')).rejects.toThrow(
        "Task T1 cannot move to 'in_progress': current state is 'new' (requires 'assigned')"
      );
    });

    it('should reject statuses beyond the configured depth', async () => {
      await h.taskService.assign('T1', 'agent-1');
      await h.taskService.start('T1');

      await expect(h.taskService.submitForValidation('T1')).rejects.toThrow(InvalidTransitionError);
    });

    it('should require an owner to assign', async () => {
      await expect(h.taskService.transition('T1', 'assigned')).rejects.toThrow('Assigning T1 requires an owner');
    });

    it('should reassign when an assigned task is claimed by another agent', async () => {
      await h.taskService.assign('T1', 'agent-1');
      const reassigned = await h.taskService.assign('T1', 'agent-2');

      expect(reassigned.status).toBe('assigned');
      expect(reassigned.owner).toBe('agent-2');
    });

    it('should treat re-entering the current status as a no-op', async () => {
      await h.taskService.assign('T1', 'agent-1');
      await h.taskService.start('T1');
      h.clock.advance(1000);

      const again = await h.taskService.start('T1');

      expect(again.devStartedAt).toBe('2026-03-02T10:00:00.000Z');
    });

    it('should deprecate with a successor and then refuse every move', async () => {
      await expect(h.taskService.transition('T1', 'deprecated')).rejects.toThrow('Deprecating T1 requires superseded_by');

      const deprecated = await h.taskService.deprecate('T1', 'T2');
      expect(deprecated.deprecated).toBe(true);
      expect(deprecated.supersededBy).toBe('T2');
      expect(h.artifactRepo.current.T1).toMatchObject({ status: 'deprecated', deprecated: true, superseded_by: 'T2' });

      await expect(h.taskService.assign('T1', 'agent-1')).rejects.toThrow(
        "Task T1 cannot move to 'assigned': current state is 'deprecated'"
      );
    });

    it('should emit task events', async () => {
      const updates: string[] = [];
      h.eventBus.on('task:updated', ({ task, from }) => {
        updates.push(`${from}->${task.status}`);
      });

      await h.taskService.assign('T1', 'agent-1');
      await h.taskService.start('T1');

      expect(updates).toEqual(['new->assigned', 'assigned->in_progress']);
    });
  });

  describe('completion gate', () => {
    beforeEach(async () => {
      await h.taskService.createTask({ id: 'T1' });
      await h.taskService.assign('T1', 'agent-1');
      await h.taskService.start('T1');
    });

    it('should complete a task whose commit passes every check', async () => {
      const done = await h.taskService.complete('T1', 'abc1234');

      expect(done.status).toBe('complete');
      expect(done.commitSha).toBe('abc1234');
      expect(done.completedAt).toBe('2026-03-02T10:00:00.000Z');
    });

    it('should require a commit hash', async () => {
      expect(await h.taskService.verifyCompletion('T1', undefined)).toEqual([
        { check: 'missing_commit', message: 'no commit hash supplied for T1' },
      ]);
    });

    it('should report each failing required check', async () => {
      h.ciProvider.conclusions.lint = 'failure';
      h.ciProvider.conclusions.test = 'pending';

      expect(await h.taskService.verifyCompletion('T1', 'abc1234')).toEqual([
        { check: 'ci_check_failed', message: "required check 'test' is pending" },
        { check: 'ci_check_failed', message: "required check 'lint' is failure" },
      ]);
    });

    it('should reject commits off the mainline or older than the freshness window', async () => {
      h.ciProvider.onMainline = false;
      h.ciProvider.committedAt = new Date(T0.getTime() - 30 * 3_600_000);

      expect(await h.taskService.verifyCompletion('T1', 'abc1234')).toEqual([
        { check: 'not_on_mainline', message: 'abc1234 is not on main' },
        { check: 'stale_commit', message: 'abc1234 is 30h old (limit 24h)' },
      ]);
    });

    it('should report an unknown commit time', async () => {
      h.ciProvider.committedAt = null;

      expect(await h.taskService.verifyCompletion('T1', 'abc1234')).toEqual([
        { check: 'commit_time_unknown', message: 'commit time of abc1234 is unknown' },
      ]);
    });

    it('should fail once as unverifiable when CI cannot be reached', async () => {
      h.ciProvider.unavailable = true;

      expect(await h.taskService.verifyCompletion('T1', 'abc1234')).toEqual([
        { check: 'ci_unverifiable', message: 'cannot verify abc1234: GitHub token is not configured' },
      ]);
    });

    it('should leave the task unchanged when the gate fails', async () => {
      h.ciProvider.unavailable = true;

      await expect(h.taskService.complete('T1', 'abc1234')).rejects.toThrow(ValidationGateFailure);
      expect((await h.taskService.getTask('T1')).status).toBe('in_progress');
    });
  });

  describe('importLegacy', () => {
    it('should map legacy ids once and keep their status', async () => {
      const imported = await h.taskService.importLegacy([
        { id: 'auth-login', status: 'in_progress', priority: 'high' },
        { id: 'old-report', status: 'deprecated' },
      ]);

      expect(imported.map(t => [t.id, t.stableId, t.status])).toEqual([
        ['auth-login', 'PRP-0001', 'in_progress'],
        ['old-report', 'PRP-0002', 'deprecated'],
      ]);
      expect(imported[0].legacyId).toBe('auth-login');
      expect(imported[0].migratedAt).toBe('2026-03-02T10:00:00.000Z');
      expect(imported[1].deprecated).toBe(true);

      const again = await h.taskService.importLegacy([{ id: 'auth-login' }]);
      expect(again).toEqual([]);
      expect((await h.taskService.getTask('PRP-0001')).id).toBe('auth-login');
    });
  });

  describe('retry bookkeeping', () => {
    it('should count retries and reset them', async () => {
      await h.taskService.createTask({ id: 'T1' });

      expect(await h.taskService.recordRetry('T1', 'flaky')).toBe(1);
      expect(await h.taskService.recordRetry('T1', 'still flaky')).toBe(2);
      expect((await h.taskService.getTask('T1')).lastError).toBe('still flaky');

      const reset = await h.taskService.resetRetries('T1');
      expect(reset.retries).toBe(0);
      expect(reset.deadLetteredAt).toBeNull();
    });
  });
});
