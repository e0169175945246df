import { allowedTransitions, canTransition, completionSource, requiredPredecessor } from '../../src/domain/tasks/stateMachine';
import { nextStage, stagesFor } from '../../src/domain/pipeline/stages';

describe('task state machine', () => {
  it('should chain the in-flight statuses up to the depth and allow deprecation throughout', () => {
    expect(allowedTransitions('new', 'integration')).toEqual(['assigned', 'deprecated']);
    expect(allowedTransitions('in_progress', 'integration')).toEqual(['validation', 'deprecated']);
    expect(allowedTransitions('integration', 'integration')).toEqual(['complete', 'deprecated']);
  });

  it('should cut the chain at the configured depth', () => {
    expect(allowedTransitions('in_progress', 'development')).toEqual(['complete', 'deprecated']);
    expect(allowedTransitions('validation', 'development')).toEqual(['deprecated']);
    expect(completionSource('validation')).toBe('validation');
  });

  it('should have no way out of a terminal status', () => {
    expect(allowedTransitions('complete', 'integration')).toEqual([]);
    expect(allowedTransitions('deprecated', 'integration')).toEqual([]);
    expect(canTransition('complete', 'new', 'integration')).toBe(false);
  });

  it('should name the predecessor of each status', () => {
    expect(requiredPredecessor('in_progress', 'integration')).toBe('assigned');
    expect(requiredPredecessor('complete', 'development')).toBe('in_progress');
    expect(requiredPredecessor('new', 'integration')).toBeNull();
  });
});

describe('pipeline stages', () => {
  it('should truncate the stage list by depth', () => {
    expect(stagesFor('development')).toEqual(['new', 'dev']);
    expect(stagesFor('validation')).toEqual(['new', 'dev', 'validation']);
    expect(stagesFor('integration')).toEqual(['new', 'dev', 'validation', 'integration']);
  });

  it('should return null after the last stage', () => {
    expect(nextStage('new', 'development')).toBe('dev');
    expect(nextStage('dev', 'development')).toBeNull();
    expect(nextStage('validation', 'integration')).toBe('integration');
  });
});
