import { createDemoRunner, DEMO_INSTALL_SCRIPT, DEMO_SWITCH_SCRIPT } from './engine/demo-runner.js';
import { InstallEngine } from './engine/install-engine.js';
import { runProcess } from './engine/supervisor.js';
import { SystemEngine } from './engine/system-engine.js';
import { ConfigError } from './errors.js';
import { createLogger } from './log/logger.js';
import { getDiskInfo } from './system/disks.js';
import { rebootSystem } from './system/power.js';
import { getProcessList } from './system/processes.js';
import { FsProject, InMemoryProject, type Project } from './system/project.js';
import { getSystemSummary, performSystemCheck } from './system/system-info.js';
import type { DiskInfo, ProcessRunner } from './types.js';

export interface AppSettings {
  workDir: string;
  demo: boolean;
  demoStepMs: number;
  configName: string;
  installDisk: string;
  busCapacity: number;
}

const buildLog = createLogger('build');

const DEMO_APPS = ['bitcoind', 'lnd', 'blitz-api', 'web-ui'];

const DEMO_DISKS: DiskInfo[] = [
  { name: 'vda', path: '/dev/vda', sizeBytes: 512 * 1024 ** 3, mountPoints: [], isRemovable: false, isLiveSystem: false },
  { name: 'sda', path: '/dev/sda', sizeBytes: 16 * 1024 ** 3, mountPoints: ['/iso'], isRemovable: true, isLiveSystem: true },
];

function requireWorkDir(settings: AppSettings): string {
  if (settings.demo) return settings.workDir || '/tmp/appliance-demo';
  if (!settings.workDir) {
    throw new ConfigError('A work directory is required: set APPLIANCE_WORK_DIR or pass --work-dir');
  }
  return settings.workDir;
}

function liveRunner(cwd: string): ProcessRunner {
  return (command, args) => runProcess(command, args, { cwd, logger: buildLog });
}

function projectFor(settings: AppSettings, workDir: string): Project {
  return settings.demo ? new InMemoryProject(DEMO_APPS) : new FsProject(workDir);
}

export function createInstallEngine(settings: AppSettings): InstallEngine {
  const workDir = requireWorkDir(settings);
  return new InstallEngine({
    workDir,
    configName: settings.configName,
    defaultDisk: settings.installDisk || undefined,
    busCapacity: settings.busCapacity,
    runner: settings.demo
      ? createDemoRunner(DEMO_INSTALL_SCRIPT, { stepMs: settings.demoStepMs })
      : liveRunner(workDir),
    collaborators: {
      getSystemSummary,
      checkSystem: performSystemCheck,
      getProcessList: () => getProcessList(),
      getDisks: settings.demo ? async () => DEMO_DISKS : () => getDiskInfo(),
      project: projectFor(settings, workDir),
    },
  });
}

export function createSystemEngine(settings: AppSettings): SystemEngine {
  const workDir = requireWorkDir(settings);
  return new SystemEngine({
    workDir,
    busCapacity: settings.busCapacity,
    demo: settings.demo,
    runner: settings.demo
      ? createDemoRunner(DEMO_SWITCH_SCRIPT, { stepMs: settings.demoStepMs })
      : liveRunner(workDir),
    project: projectFor(settings, workDir),
    reboot: () => rebootSystem(),
  });
}
