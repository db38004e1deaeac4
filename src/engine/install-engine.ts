import { EventBus, type Subscription } from './event-bus.js';
import { StateStore } from './state-store.js';
import { StepTracker } from './step-tracker.js';
import { describeExit } from './supervisor.js';
import { assertNever, describeFailure, rejectCommand, type Engine } from './engine.js';
import { CollaboratorError, CommandRejectedError, errorMessage } from '../errors.js';
import { createLogger } from '../log/logger.js';
import type { Project } from '../system/project.js';
import type {
  CheckResult,
  ClientCommand,
  DiskInfo,
  InstallState,
  InstallStep,
  ProcessList,
  ProcessRunner,
  ServerEvent,
  SystemSummary,
} from '../types.js';

const log = createLogger('install-engine');

export interface InstallCollaborators {
  getSystemSummary(): Promise<SystemSummary>;
  checkSystem(summary: SystemSummary): CheckResult;
  getProcessList(): Promise<ProcessList>;
  getDisks(): Promise<DiskInfo[]>;
  project: Project;
}

export interface InstallEngineOptions {
  /** Directory holding the flake under `src/`. */
  workDir: string;
  configName: string;
  /** Used by StartInstallation straight after a compatible system check. */
  defaultDisk?: string;
  runner: ProcessRunner;
  collaborators: InstallCollaborators;
  busCapacity?: number;
}

const UPDATE_CONFIG_FROM: ReadonlySet<InstallState['type']> = new Set<InstallState['type']>([
  'SystemCheckCompleted',
  'SelectInstallDisk',
  'SelectDiskError',
  'PreInstallConfirm',
]);

export function buildInstallCommand(workDir: string, configName: string, disk: string): [string, string[]] {
  return ['sudo', ['disko-install', '--flake', `${workDir}/src#${configName}`, '--disk', 'main', disk]];
}

/**
 * Command processor for the first-boot installer. Drives the wizard from the
 * system check through disk selection and runs the build in the background.
 */
export class InstallEngine implements Engine<InstallState, ClientCommand, ServerEvent> {
  readonly name = 'install';

  private readonly bus: EventBus<ServerEvent>;
  private readonly store: StateStore<InstallState>;
  private readonly tracker = new StepTracker();
  private disks: DiskInfo[] = [];
  private build: Promise<void> | null = null;
  private checksInFlight = 0;
  private stateBeforeCheck: InstallState = { type: 'Idle' };

  constructor(private readonly options: InstallEngineOptions) {
    this.bus = new EventBus<ServerEvent>(options.busCapacity);
    this.store = new StateStore<InstallState>({ type: 'Idle' }, (state) => {
      this.bus.publish({ type: 'StateChanged', state });
    });
  }

  snapshot(): InstallState {
    return this.store.read();
  }

  subscribe(): Subscription<ServerEvent> {
    return this.bus.subscribe();
  }

  get subscriberCount(): number {
    return this.bus.subscriberCount;
  }

  settled(): Promise<void> {
    return this.build ?? Promise.resolve();
  }

  reportUnsupported(commandType: string): void {
    log.warn(`Received unsupported command: ${commandType}`);
    this.bus.publish({ type: 'Error', message: `Command not implemented: ${commandType}` });
  }

  async handle(command: ClientCommand): Promise<void> {
    log.debug(`Handling ${command.type} in state ${this.snapshot().type}`);
    try {
      await this.dispatch(command);
    } catch (err) {
      this.bus.publish({ type: 'Error', message: describeFailure(log, command.type, err) });
    }
  }

  private async dispatch(command: ClientCommand): Promise<void> {
    switch (command.type) {
      case 'PerformSystemCheck':
        return this.performSystemCheck();
      case 'GetSystemSummary': {
        const summary = await this.collect('System summary', () => this.options.collaborators.getSystemSummary());
        this.bus.publish({ type: 'SystemSummaryUpdated', summary });
        return;
      }
      case 'GetProcessList': {
        const list = await this.collect('Process list', () => this.options.collaborators.getProcessList());
        this.bus.publish({ type: 'ProcessListUpdated', list });
        return;
      }
      case 'UpdateConfig':
        await this.store.update((state) =>
          UPDATE_CONFIG_FROM.has(state.type) && isSelectableAfterCheck(state)
            ? { type: 'UpdateConfig' }
            : rejectCommand(command.type, state),
        );
        return;
      case 'UpdateConfigFinished':
        return this.finishConfigUpdate();
      case 'InstallDiskSelected':
        return this.selectDisk(command.path);
      case 'StartInstallation':
        return this.startInstallation();
      case 'DevReset':
        await this.store.update((state) => {
          if (state.type === 'Installing') {
            throw new CommandRejectedError('Cannot reset while an installation is running.');
          }
          this.tracker.reset();
          this.disks = [];
          return { type: 'Idle' };
        });
        return;
      default:
        return assertNever(command);
    }
  }

  private async collect<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new CollaboratorError(operation, err);
    }
  }

  private async performSystemCheck(): Promise<void> {
    await this.store.update((state) => {
      if (state.type === 'Installing') return rejectCommand('PerformSystemCheck', state);
      if (this.checksInFlight === 0) this.stateBeforeCheck = state;
      this.checksInFlight += 1;
      return { type: 'PerformingCheck' };
    });

    try {
      let result: CheckResult;
      try {
        const summary = await this.options.collaborators.getSystemSummary();
        result = this.options.collaborators.checkSystem(summary);
      } catch (err) {
        // Overlapping checks: only the last one still running puts the earlier state back.
        await this.store.update((state) =>
          this.checksInFlight === 1 && state.type === 'PerformingCheck' ? this.stateBeforeCheck : undefined,
        );
        throw new CollaboratorError('System check', err);
      }

      log.info(`System check finished: ${result.isCompatible ? 'compatible' : `incompatible (${result.issues.join('; ')})`}`);
      const applied = await this.store.update((state) =>
        state.type === 'PerformingCheck' || state.type === 'SystemCheckCompleted'
          ? { type: 'SystemCheckCompleted', result }
          : undefined,
      );
      if (!applied) {
        log.warn('State changed while the system check was running; dropping its result');
      }
    } finally {
      this.checksInFlight -= 1;
    }
  }

  private async finishConfigUpdate(): Promise<void> {
    const current = this.snapshot();
    if (current.type !== 'UpdateConfig') rejectCommand('UpdateConfigFinished', current);

    const disks = await this.collect('Disk enumeration', () => this.options.collaborators.getDisks());
    await this.store.update((state) => {
      if (state.type !== 'UpdateConfig') return rejectCommand('UpdateConfigFinished', state);
      this.disks = disks;
      return { type: 'SelectInstallDisk', disks };
    });
  }

  private async selectDisk(path: string): Promise<void> {
    const current = this.snapshot();
    if (current.type !== 'SelectInstallDisk' && current.type !== 'SelectDiskError') {
      rejectCommand('InstallDiskSelected', current);
    }

    const disk = this.disks.find((d) => d.path === path);
    let next: InstallState;
    if (!disk) {
      log.warn(`Selected disk ${path} is not among the enumerated disks`);
      next = { type: 'SelectDiskError', message: `Disk not found: ${path}` };
    } else if (disk.isLiveSystem) {
      next = { type: 'SelectDiskError', message: `Disk ${path} belongs to the running live system` };
    } else {
      const apps = await this.collect('Reading enabled apps', () => this.options.collaborators.project.getEnabledApps());
      next = { type: 'PreInstallConfirm', data: { apps, disk: disk.path } };
    }

    await this.store.update((state) =>
      state.type === 'SelectInstallDisk' || state.type === 'SelectDiskError'
        ? next
        : rejectCommand('InstallDiskSelected', state),
    );
  }

  private installDiskFor(state: InstallState): string {
    if (state.type === 'PreInstallConfirm') return state.data.disk;
    if (state.type === 'SystemCheckCompleted') {
      if (!state.result.isCompatible) {
        throw new CommandRejectedError('Cannot install on an incompatible system.');
      }
      if (this.options.defaultDisk) return this.options.defaultDisk;
      throw new CommandRejectedError('No install disk selected.');
    }
    return rejectCommand('StartInstallation', state);
  }

  private async startInstallation(): Promise<void> {
    let disk = '';
    await this.store.update((state) => {
      disk = this.installDiskFor(state);
      this.tracker.reset();
      return { type: 'Installing', steps: this.tracker.snapshot() };
    });

    log.info(`Starting installation on ${disk}`);
    this.build = this.runBuild(disk).finally(() => {
      this.build = null;
    });
  }

  private async runBuild(disk: string): Promise<void> {
    const [command, args] = buildInstallCommand(this.options.workDir, this.options.configName, disk);
    try {
      for await (const output of this.options.runner(command, args)) {
        switch (output.type) {
          case 'Stdout':
            await this.onBuildLine(output.line, output.line);
            break;
          case 'Stderr':
            await this.onBuildLine(`[STDERR] ${output.line}`, output.line);
            break;
          case 'Completed':
            if (output.code === 0) {
              await this.finishInstall();
            } else {
              await this.failInstall(`Installation failed with exit code: ${describeExit(output.code, output.signal)}`);
            }
            return;
          case 'Error':
            await this.failInstall(output.message);
            return;
          default:
            assertNever(output);
        }
      }
      await this.failInstall('Installation process ended without an exit status');
    } catch (err) {
      await this.failInstall(`Installation aborted: ${errorMessage(err)}`);
    }
  }

  private publishSteps(steps: InstallStep[]): void {
    for (const step of steps) {
      this.bus.publish({ type: 'InstallStepUpdate', step });
    }
  }

  private async onBuildLine(logLine: string, raw: string): Promise<void> {
    this.bus.publish({ type: 'InstallLog', line: logLine });
    const changed = this.tracker.observe(raw);
    if (changed.length === 0) return;

    await this.store.update(
      (state) => (state.type === 'Installing' ? { type: 'Installing', steps: this.tracker.snapshot() } : undefined),
      { silent: true },
    );
    this.publishSteps(changed);
  }

  private async finishInstall(): Promise<void> {
    this.publishSteps(this.tracker.complete());
    try {
      await this.options.collaborators.project.markChangesApplied();
    } catch (err) {
      const failure = new CollaboratorError('Marking changes as applied', err);
      log.error(failure.message);
      this.bus.publish({ type: 'Error', message: failure.message });
    }
    log.info('Installation succeeded');
    await this.store.update((state) =>
      state.type === 'Installing' ? { type: 'InstallSucceeded', steps: this.tracker.snapshot() } : undefined,
    );
  }

  private async failInstall(message: string): Promise<void> {
    log.error(message);
    this.publishSteps(this.tracker.fail(message));
    this.bus.publish({ type: 'Error', message });
    await this.store.update((state) => (state.type === 'Installing' ? { type: 'InstallFailed', message } : undefined));
  }
}

function isSelectableAfterCheck(state: InstallState): boolean {
  return state.type !== 'SystemCheckCompleted' || state.result.isCompatible;
}
