import {
  STEP_DESCRIPTIONS,
  STEP_NAMES,
  type InstallStep,
  type StepName,
  type StepStatus,
} from '../types.js';

// Log fragments printed by disko-install at the start of each phase.
const LANDMARKS: ReadonlyArray<{ fragment: string; step: StepName }> = [
  { fragment: "unpacking 'github:", step: 'Deps' },
  { fragment: 'derivations will be built', step: 'Build' },
  { fragment: 'sgdisk', step: 'Disk' },
  { fragment: 'mount /dev/disk', step: 'Mount' },
  { fragment: 'Copying store paths', step: 'Copy' },
  { fragment: 'installing the boot loader', step: 'Bootloader' },
];

export class StepTransitionError extends Error {
  constructor(step: StepName, from: StepStatus, to: StepStatus) {
    super(`Step ${step} cannot move from ${from.type} to ${to.type}`);
    this.name = 'StepTransitionError';
  }
}

export function detectLandmark(line: string): StepName | null {
  for (const { fragment, step } of LANDMARKS) {
    if (line.includes(fragment)) return step;
  }
  return null;
}

/** Waiting -> InProgress -> Done | Failed. Terminal statuses never change. */
export function canTransition(from: StepStatus, to: StepStatus): boolean {
  switch (from.type) {
    case 'Waiting':
      return to.type === 'InProgress';
    case 'InProgress':
      return to.type === 'Done' || to.type === 'Failed';
    case 'Done':
    case 'Failed':
      return false;
  }
}

export function initialSteps(): InstallStep[] {
  return STEP_NAMES.map((name) => ({
    name,
    description: STEP_DESCRIPTIONS[name],
    status: { type: 'Waiting' },
  }));
}

function stepIndex(name: StepName): number {
  return STEP_NAMES.indexOf(name);
}

/**
 * Tracks the ordered install phases of one build. Every mutating method returns
 * the steps it changed, in the order they changed, so the caller can broadcast
 * them.
 */
export class StepTracker {
  private steps: InstallStep[] = initialSteps();
  private current: StepName | null = null;

  get currentStep(): StepName | null {
    return this.current;
  }

  reset(): void {
    this.steps = initialSteps();
    this.current = null;
  }

  snapshot(): InstallStep[] {
    return this.steps.map((step) => ({ ...step }));
  }

  /** Feeds one log line; advances when it carries a landmark ahead of the current step. */
  observe(line: string): InstallStep[] {
    const landmark = detectLandmark(line);
    if (!landmark) return [];
    return this.advanceTo(landmark);
  }

  advanceTo(name: StepName): InstallStep[] {
    if (this.current !== null && stepIndex(name) <= stepIndex(this.current)) return [];

    const changed: InstallStep[] = [];
    if (this.current !== null) {
      changed.push(this.setStatus(this.current, { type: 'Done' }));
    }
    changed.push(this.setStatus(name, { type: 'InProgress' }));
    this.current = name;
    return changed;
  }

  /** Marks the step in progress as done. */
  complete(): InstallStep[] {
    if (!this.isCurrentInProgress()) return [];
    return [this.setStatus(this.requireCurrent(), { type: 'Done' })];
  }

  /** Marks the step in progress as failed. */
  fail(reason: string): InstallStep[] {
    if (!this.isCurrentInProgress()) return [];
    return [this.setStatus(this.requireCurrent(), { type: 'Failed', reason })];
  }

  setStatus(name: StepName, status: StepStatus): InstallStep {
    const index = stepIndex(name);
    const step = this.steps[index];
    if (!canTransition(step.status, status)) {
      throw new StepTransitionError(name, step.status, status);
    }
    const updated: InstallStep = { ...step, status };
    this.steps = this.steps.map((s, i) => (i === index ? updated : s));
    return { ...updated };
  }

  private isCurrentInProgress(): boolean {
    if (this.current === null) return false;
    return this.steps[stepIndex(this.current)].status.type === 'InProgress';
  }

  private requireCurrent(): StepName {
    if (this.current === null) throw new Error('No step in progress');
    return this.current;
  }
}
