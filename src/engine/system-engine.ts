import { EventBus, type Subscription } from './event-bus.js';
import { StateStore } from './state-store.js';
import { describeExit } from './supervisor.js';
import { assertNever, describeFailure, rejectCommand, type Engine } from './engine.js';
import { CollaboratorError, errorMessage } from '../errors.js';
import { createLogger } from '../log/logger.js';
import type { Project } from '../system/project.js';
import type { ProcessRunner, SystemClientCommand, SystemServerEvent, SystemState } from '../types.js';

const log = createLogger('system-engine');

export interface SystemEngineOptions {
  workDir: string;
  runner: ProcessRunner;
  project: Project;
  reboot: () => Promise<void>;
  /** Reboot only logs. */
  demo?: boolean;
  busCapacity?: number;
}

export function buildSwitchCommand(workDir: string): [string, string[]] {
  return ['doas', ['nixblitz', 'apply', '--work-dir', workDir]];
}

/** Command processor for an installed appliance: applies configuration changes and reboots. */
export class SystemEngine implements Engine<SystemState, SystemClientCommand, SystemServerEvent> {
  readonly name = 'system';

  private readonly bus: EventBus<SystemServerEvent>;
  private readonly store: StateStore<SystemState>;
  private switching: Promise<void> | null = null;

  constructor(private readonly options: SystemEngineOptions) {
    this.bus = new EventBus<SystemServerEvent>(options.busCapacity);
    this.store = new StateStore<SystemState>({ type: 'Idle' }, (state) => {
      this.bus.publish({ type: 'StateChanged', state });
    });
  }

  snapshot(): SystemState {
    return this.store.read();
  }

  subscribe(): Subscription<SystemServerEvent> {
    return this.bus.subscribe();
  }

  get subscriberCount(): number {
    return this.bus.subscriberCount;
  }

  settled(): Promise<void> {
    return this.switching ?? Promise.resolve();
  }

  reportUnsupported(commandType: string): void {
    log.warn(`Received unsupported command: ${commandType}`);
    this.bus.publish({ type: 'Error', message: `Command not implemented: ${commandType}` });
  }

  async handle(command: SystemClientCommand): Promise<void> {
    log.debug(`Handling ${command.type} in state ${this.snapshot().type}`);
    try {
      await this.dispatch(command);
    } catch (err) {
      this.bus.publish({ type: 'Error', message: describeFailure(log, command.type, err) });
    }
  }

  private async dispatch(command: SystemClientCommand): Promise<void> {
    switch (command.type) {
      case 'SwitchConfig':
        await this.store.update((state) =>
          state.type === 'Idle' || state.type === 'UpdateFailed'
            ? { type: 'Switching' }
            : rejectCommand(command.type, state),
        );
        log.info('Switching to the new configuration');
        this.switching = this.runSwitch().finally(() => {
          this.switching = null;
        });
        return;
      case 'DevReset':
        await this.store.update((state) =>
          state.type === 'Switching' ? rejectCommand(command.type, state) : { type: 'Idle' },
        );
        return;
      case 'Reboot':
        return this.reboot();
      default:
        return assertNever(command);
    }
  }

  private async reboot(): Promise<void> {
    const state = this.snapshot();
    if (state.type === 'Switching') rejectCommand('Reboot', state);

    if (this.options.demo) {
      log.info('Demo mode: skipping reboot');
      return;
    }
    try {
      await this.options.reboot();
    } catch (err) {
      throw new CollaboratorError('Reboot', err);
    }
  }

  private async runSwitch(): Promise<void> {
    const [command, args] = buildSwitchCommand(this.options.workDir);
    try {
      for await (const output of this.options.runner(command, args)) {
        switch (output.type) {
          case 'Stdout':
            this.bus.publish({ type: 'UpdateLog', line: output.line });
            break;
          case 'Stderr':
            this.bus.publish({ type: 'UpdateLog', line: `[STDERR] ${output.line}` });
            break;
          case 'Completed':
            if (output.code === 0) {
              await this.finishSwitch();
            } else {
              await this.failSwitch(`Switch to new config failed with exit code: ${describeExit(output.code, output.signal)}`);
            }
            return;
          case 'Error':
            await this.failSwitch(output.message);
            return;
          default:
            assertNever(output);
        }
      }
      await this.failSwitch('Switch process ended without an exit status');
    } catch (err) {
      await this.failSwitch(`Switch aborted: ${errorMessage(err)}`);
    }
  }

  private async finishSwitch(): Promise<void> {
    try {
      await this.options.project.markChangesApplied();
    } catch (err) {
      await this.failSwitch(new CollaboratorError('Marking changes as applied', err).message);
      return;
    }
    log.info('Switched to the new configuration');
    await this.store.update((state) => (state.type === 'Switching' ? { type: 'Idle' } : undefined));
  }

  private async failSwitch(message: string): Promise<void> {
    log.error(message);
    this.bus.publish({ type: 'Error', message });
    await this.store.update((state) => (state.type === 'Switching' ? { type: 'UpdateFailed', message } : undefined));
  }
}
