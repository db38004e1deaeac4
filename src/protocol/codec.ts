import { ProtocolError, errorMessage } from '../errors.js';
import {
  STEP_NAMES,
  type CheckResult,
  type ClientCommand,
  type Cpu,
  type DiskInfo,
  type InstallState,
  type InstallStep,
  type ProcessInfo,
  type ProcessList,
  type ServerEvent,
  type StepName,
  type StepStatus,
  type SystemClientCommand,
  type SystemServerEvent,
  type SystemState,
  type SystemSummary,
} from '../types.js';

// One JSON object per frame, tagged by its `type` field. Payload fields sit
// next to the tag, e.g. {"type":"InstallDiskSelected","path":"/dev/vda"}.

export type DecodeResult<C> =
  | { ok: true; command: C }
  | { ok: false; reason: 'malformed'; message: string }
  | { ok: false; reason: 'unsupported'; message: string; commandType: string };

export interface Protocol<S, C, E> {
  decodeCommand(raw: string): DecodeResult<C>;
  encodeCommand(command: C): string;
  decodeEvent(raw: string): E;
  encodeEvent(event: E): string;
  stateChanged(state: S): E;
}

type Guard<T> = (value: unknown) => value is T;

type Fields = Record<string, unknown>;

function isRecord(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const isString = (value: unknown): value is string => typeof value === 'string';
const isNumber = (value: unknown): value is number => typeof value === 'number' && Number.isFinite(value);
const isBoolean = (value: unknown): value is boolean => typeof value === 'boolean';

function arrayOf<T>(guard: Guard<T>): Guard<T[]> {
  return (value: unknown): value is T[] => Array.isArray(value) && value.every((item) => guard(item));
}

function nullable<T>(guard: Guard<T>): Guard<T | null> {
  return (value: unknown): value is T | null => value === null || guard(value);
}

/** Builds a guard for an object whose listed fields all pass their guards. */
function shape<T>(fields: { [K in keyof T]-?: Guard<T[K]> }): Guard<T> {
  return (value: unknown): value is T => {
    if (!isRecord(value)) return false;
    for (const key of Object.keys(fields)) {
      const guard: Guard<unknown> = Reflect.get(fields, key);
      if (!guard(value[key])) return false;
    }
    return true;
  };
}

const isStringArray = arrayOf(isString);

const isCpu = shape<Cpu>({
  name: isString,
  cpuUsage: isNumber,
  frequency: isNumber,
  vendorId: isString,
  brand: isString,
});

const isSystemSummary = shape<SystemSummary>({
  totalMemory: isNumber,
  usedMemory: isNumber,
  totalSwap: isNumber,
  usedSwap: isNumber,
  osName: isString,
  osVersion: isString,
  kernelVersion: isString,
  hostname: isString,
  cpus: arrayOf(isCpu),
});

const isCheckResult = shape<CheckResult>({
  summary: isSystemSummary,
  isCompatible: isBoolean,
  issues: isStringArray,
});

const isProcessInfo = shape<ProcessInfo>({
  pid: isNumber,
  parentPid: nullable(isNumber),
  user: isString,
  name: isString,
  command: isString,
  cpuUsage: isNumber,
  memory: isNumber,
  virtualMemory: isNumber,
  status: isString,
  runTime: isNumber,
});

const isProcessList = shape<ProcessList>({ processes: arrayOf(isProcessInfo) });

const isDiskInfo = shape<DiskInfo>({
  name: isString,
  path: isString,
  sizeBytes: isNumber,
  mountPoints: isStringArray,
  isRemovable: isBoolean,
  isLiveSystem: isBoolean,
});

function isStepName(value: unknown): value is StepName {
  return STEP_NAMES.some((name) => name === value);
}

function isStepStatus(value: unknown): value is StepStatus {
  if (!isRecord(value)) return false;
  switch (value.type) {
    case 'Waiting':
    case 'InProgress':
    case 'Done':
      return true;
    case 'Failed':
      return isString(value.reason);
    default:
      return false;
  }
}

const isInstallStep = shape<InstallStep>({ name: isStepName, description: isString, status: isStepStatus });
const isSteps = arrayOf(isInstallStep);

function isInstallState(value: unknown): value is InstallState {
  if (!isRecord(value)) return false;
  switch (value.type) {
    case 'Idle':
    case 'PerformingCheck':
    case 'UpdateConfig':
      return true;
    case 'SystemCheckCompleted':
      return isCheckResult(value.result);
    case 'SelectInstallDisk':
      return arrayOf(isDiskInfo)(value.disks);
    case 'SelectDiskError':
    case 'InstallFailed':
      return isString(value.message);
    case 'PreInstallConfirm':
      return isRecord(value.data) && isStringArray(value.data.apps) && isString(value.data.disk);
    case 'Installing':
    case 'InstallSucceeded':
      return isSteps(value.steps);
    default:
      return false;
  }
}

function isSystemState(value: unknown): value is SystemState {
  if (!isRecord(value)) return false;
  switch (value.type) {
    case 'Idle':
    case 'Switching':
    case 'UpdateSucceeded':
      return true;
    case 'UpdateFailed':
      return isString(value.message);
    default:
      return false;
  }
}

function parseFrame(raw: string): Fields & { type: string } {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    throw new ProtocolError(`Invalid JSON: ${errorMessage(err)}`);
  }
  if (!isRecord(value)) throw new ProtocolError('Frame is not a JSON object');
  const type = value.type;
  if (!isString(type)) throw new ProtocolError("Frame has no string 'type' tag");
  return { ...value, type };
}

function malformed(message: string): DecodeResult<never> {
  return { ok: false, reason: 'malformed', message };
}

function unsupported(commandType: string): DecodeResult<never> {
  return { ok: false, reason: 'unsupported', message: `Unsupported command: ${commandType}`, commandType };
}

function decodeWith<C>(raw: string, pick: (frame: Fields & { type: string }) => DecodeResult<C>): DecodeResult<C> {
  let frame: Fields & { type: string };
  try {
    frame = parseFrame(raw);
  } catch (err) {
    return malformed(errorMessage(err));
  }
  return pick(frame);
}

function decodeEventWith<E>(raw: string, pick: (frame: Fields & { type: string }) => E | null): E {
  const frame = parseFrame(raw);
  const event = pick(frame);
  if (event === null) throw new ProtocolError(`Malformed or unknown event: ${frame.type}`);
  return event;
}

const encode = (value: unknown): string => JSON.stringify(value);

export const installProtocol: Protocol<InstallState, ClientCommand, ServerEvent> = {
  decodeCommand(raw) {
    return decodeWith<ClientCommand>(raw, (frame) => {
      switch (frame.type) {
        case 'PerformSystemCheck':
        case 'GetSystemSummary':
        case 'GetProcessList':
        case 'UpdateConfig':
        case 'UpdateConfigFinished':
        case 'StartInstallation':
        case 'DevReset':
          return { ok: true, command: { type: frame.type } };
        case 'InstallDiskSelected':
          return isString(frame.path)
            ? { ok: true, command: { type: 'InstallDiskSelected', path: frame.path } }
            : malformed("InstallDiskSelected requires a string 'path'");
        default:
          return unsupported(frame.type);
      }
    });
  },

  encodeCommand: encode,

  decodeEvent(raw) {
    return decodeEventWith<ServerEvent>(raw, (frame) => {
      switch (frame.type) {
        case 'StateChanged':
          return isInstallState(frame.state) ? { type: 'StateChanged', state: frame.state } : null;
        case 'SystemSummaryUpdated':
          return isSystemSummary(frame.summary) ? { type: 'SystemSummaryUpdated', summary: frame.summary } : null;
        case 'ProcessListUpdated':
          return isProcessList(frame.list) ? { type: 'ProcessListUpdated', list: frame.list } : null;
        case 'InstallStepUpdate':
          return isInstallStep(frame.step) ? { type: 'InstallStepUpdate', step: frame.step } : null;
        case 'InstallLog':
          return isString(frame.line) ? { type: 'InstallLog', line: frame.line } : null;
        case 'Error':
          return isString(frame.message) ? { type: 'Error', message: frame.message } : null;
        default:
          return null;
      }
    });
  },

  encodeEvent: encode,

  stateChanged(state) {
    return { type: 'StateChanged', state };
  },
};

export const systemProtocol: Protocol<SystemState, SystemClientCommand, SystemServerEvent> = {
  decodeCommand(raw) {
    return decodeWith<SystemClientCommand>(raw, (frame) => {
      switch (frame.type) {
        case 'SwitchConfig':
        case 'DevReset':
        case 'Reboot':
          return { ok: true, command: { type: frame.type } };
        default:
          return unsupported(frame.type);
      }
    });
  },

  encodeCommand: encode,

  decodeEvent(raw) {
    return decodeEventWith<SystemServerEvent>(raw, (frame) => {
      switch (frame.type) {
        case 'StateChanged':
          return isSystemState(frame.state) ? { type: 'StateChanged', state: frame.state } : null;
        case 'UpdateLog':
          return isString(frame.line) ? { type: 'UpdateLog', line: frame.line } : null;
        case 'Error':
          return isString(frame.message) ? { type: 'Error', message: frame.message } : null;
        default:
          return null;
      }
    });
  },

  encodeEvent: encode,

  stateChanged(state) {
    return { type: 'StateChanged', state };
  },
};
