import { PipelineDepth, Stage, STAGES, TaskStatus } from '../../types';

const STAGES_BY_DEPTH: Record<PipelineDepth, readonly Stage[]> = {
  development: ['new', 'dev'],
  validation: ['new', 'dev', 'validation'],
  integration: STAGES,
};

/**
 * Status a task takes on when a worker claims it from each stage.
 */
export const CLAIM_STATUS: Record<Stage, TaskStatus> = {
  new: 'assigned',
  dev: 'in_progress',
  validation: 'validation',
  integration: 'integration',
};

export function stagesFor(depth: PipelineDepth): readonly Stage[] {
  return STAGES_BY_DEPTH[depth];
}

export function isStage(value: string): value is Stage {
  return STAGES.some(stage => stage === value);
}

/**
 * Stage after `stage`, or null when `stage` is the last one of the pipeline.
 */
export function nextStage(stage: Stage, depth: PipelineDepth): Stage | null {
  const stages = stagesFor(depth);
  const index = stages.indexOf(stage);
  return index >= 0 && index < stages.length - 1 ? stages[index + 1] : null;
}

// Store key layout

export const DEAD_LETTER_KEY = 'queue:dead_letter';
export const MEMBERS_KEY = 'pipeline:members';
export const LEDGER_KEY = 'pipeline:ledger';
export const TRANSITIONS_KEY = 'pipeline:transitions';

export const stageKeys = {
  pending: (stage: Stage) => `queue:${stage}`,
  inflight: (stage: Stage) => `queue:${stage}:inflight`,
  claims: (stage: Stage) => `queue:${stage}:claims`,
  paused: (stage: Stage) => `queue:${stage}:paused`,
};
