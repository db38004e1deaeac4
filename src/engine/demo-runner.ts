import { setTimeout as sleep } from 'node:timers/promises';
import { createLogger } from '../log/logger.js';
import type { ProcessOutput, ProcessRunner } from '../types.js';

const log = createLogger('demo');

export interface DemoLine {
  /** Pause before the line, in multiples of the configured step duration. */
  weight: number;
  line: string;
  stream?: 'stdout' | 'stderr';
}

// Mirrors the phases of a real disko-install run; the landmark lines drive the step tracker.
export const DEMO_INSTALL_SCRIPT: readonly DemoLine[] = [
  { weight: 1, line: "unpacking 'github:nixos/nixpkgs/nixos-24.11' into the Git cache..." },
  { weight: 1, line: '...' },
  { weight: 1, line: 'these 412 derivations will be built:' },
  { weight: 4, line: '...' },
  { weight: 1, line: '+ sgdisk --zap-all /dev/vda', stream: 'stderr' },
  { weight: 1, line: '...' },
  { weight: 1, line: '+ mount /dev/disk/by-partlabel/disk-main-root /mnt', stream: 'stderr' },
  { weight: 1, line: '...' },
  { weight: 1, line: 'Copying store paths to /mnt' },
  { weight: 3, line: '...' },
  { weight: 1, line: 'installing the boot loader...' },
  { weight: 1, line: '...' },
];

export const DEMO_SWITCH_SCRIPT: readonly DemoLine[] = [
  { weight: 1, line: 'Starting step: Deps' },
  { weight: 1, line: '...' },
  { weight: 1, line: 'Starting step: Build' },
  { weight: 4, line: '...' },
  { weight: 1, line: 'Starting step: Bootloader' },
  { weight: 1, line: '...' },
  { weight: 1, line: 'Starting step: PostSwitch' },
  { weight: 3, line: '...' },
];

export interface DemoRunnerOptions {
  stepMs: number;
  /** Exit code reported at the end of the script. */
  exitCode?: number;
}

/** A {@link ProcessRunner} that replays a script instead of spawning anything. */
export function createDemoRunner(script: readonly DemoLine[], options: DemoRunnerOptions): ProcessRunner {
  return async function* demoRun(command: string, args: readonly string[]): AsyncGenerator<ProcessOutput> {
    log.info(`Demo mode: simulating '${[command, ...args].join(' ')}'`);
    for (const entry of script) {
      await sleep(entry.weight * options.stepMs);
      yield entry.stream === 'stderr'
        ? { type: 'Stderr', line: entry.line }
        : { type: 'Stdout', line: entry.line };
    }
    yield { type: 'Completed', code: options.exitCode ?? 0, signal: null };
  };
}
