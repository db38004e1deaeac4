// --- System facts (produced by collaborators, forwarded as opaque payloads) ---

export interface Cpu {
  name: string;
  cpuUsage: number;
  frequency: number;
  vendorId: string;
  brand: string;
}

export interface SystemSummary {
  totalMemory: number;
  usedMemory: number;
  totalSwap: number;
  usedSwap: number;
  osName: string;
  osVersion: string;
  kernelVersion: string;
  hostname: string;
  cpus: Cpu[];
}

export interface CheckResult {
  summary: SystemSummary;
  isCompatible: boolean;
  issues: string[];
}

export interface ProcessInfo {
  pid: number;
  parentPid: number | null;
  user: string;
  name: string;
  command: string;
  cpuUsage: number;
  /** Resident memory in bytes */
  memory: number;
  virtualMemory: number;
  status: string;
  /** Seconds */
  runTime: number;
}

export interface ProcessList {
  processes: ProcessInfo[];
}

export interface DiskInfo {
  name: string;
  path: string;
  sizeBytes: number;
  mountPoints: string[];
  isRemovable: boolean;
  isLiveSystem: boolean;
}

export interface PreInstallConfirmData {
  apps: string[];
  disk: string;
}

// --- Install steps ---

export const STEP_NAMES = ['Deps', 'Build', 'Disk', 'Mount', 'Copy', 'Bootloader'] as const;

export type StepName = (typeof STEP_NAMES)[number];

export const STEP_DESCRIPTIONS: Readonly<Record<StepName, string>> = {
  Deps: 'Fetching Dependencies',
  Build: 'Building NixOS System',
  Disk: 'Partitioning & Formatting Disk',
  Mount: 'Mounting Filesystems',
  Copy: 'Copying System to Disk',
  Bootloader: 'Installing Bootloader',
};

export type StepStatus =
  | { type: 'Waiting' }
  | { type: 'InProgress' }
  | { type: 'Done' }
  | { type: 'Failed'; reason: string };

export interface InstallStep {
  name: StepName;
  description: string;
  status: StepStatus;
}

// --- Install protocol ---

export type InstallState =
  | { type: 'Idle' }
  | { type: 'PerformingCheck' }
  | { type: 'SystemCheckCompleted'; result: CheckResult }
  | { type: 'UpdateConfig' }
  | { type: 'SelectInstallDisk'; disks: DiskInfo[] }
  | { type: 'SelectDiskError'; message: string }
  | { type: 'PreInstallConfirm'; data: PreInstallConfirmData }
  | { type: 'Installing'; steps: InstallStep[] }
  | { type: 'InstallFailed'; message: string }
  | { type: 'InstallSucceeded'; steps: InstallStep[] };

export type ClientCommand =
  | { type: 'PerformSystemCheck' }
  | { type: 'GetSystemSummary' }
  | { type: 'GetProcessList' }
  | { type: 'UpdateConfig' }
  | { type: 'UpdateConfigFinished' }
  | { type: 'InstallDiskSelected'; path: string }
  | { type: 'StartInstallation' }
  | { type: 'DevReset' };

export type ServerEvent =
  | { type: 'StateChanged'; state: InstallState }
  | { type: 'SystemSummaryUpdated'; summary: SystemSummary }
  | { type: 'ProcessListUpdated'; list: ProcessList }
  | { type: 'InstallStepUpdate'; step: InstallStep }
  | { type: 'InstallLog'; line: string }
  | { type: 'Error'; message: string };

// --- Update (system) protocol ---

export type SystemState =
  | { type: 'Idle' }
  | { type: 'Switching' }
  | { type: 'UpdateFailed'; message: string }
  | { type: 'UpdateSucceeded' };

export type SystemClientCommand =
  | { type: 'SwitchConfig' }
  | { type: 'DevReset' }
  | { type: 'Reboot' };

export type SystemServerEvent =
  | { type: 'StateChanged'; state: SystemState }
  | { type: 'UpdateLog'; line: string }
  | { type: 'Error'; message: string };

// --- Supervisor output (never on the wire) ---

export type ProcessOutput =
  | { type: 'Stdout'; line: string }
  | { type: 'Stderr'; line: string }
  | { type: 'Completed'; code: number | null; signal: NodeJS.Signals | null }
  | { type: 'Error'; message: string };

export type ProcessRunner = (command: string, args: readonly string[]) => AsyncIterable<ProcessOutput>;
