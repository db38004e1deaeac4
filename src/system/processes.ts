import path from 'node:path';
import { execSimple, type Exec } from './exec.js';
import { createLogger } from '../log/logger.js';
import type { ProcessInfo, ProcessList } from '../types.js';

const log = createLogger('processes');

// args may contain spaces and must be the last column. comm may contain spaces
// as well, so the name is taken from args instead.
export const PS_ARGS = ['-eo', 'pid=,ppid=,user=,pcpu=,rss=,vsz=,stat=,etimes=,args='] as const;

/** Kernel threads show as `[name]`; everything else by the basename of its executable. */
export function processName(args: readonly string[]): string {
  const [first = ''] = args;
  const kernelThread = /^\[(.+)\]$/.exec(args.join(' '));
  if (kernelThread) return kernelThread[1];
  return path.basename(first);
}

export function parsePsOutput(stdout: string): ProcessList {
  const processes: ProcessInfo[] = [];
  for (const raw of stdout.split('\n')) {
    const line = raw.trim();
    if (!line) continue;
    const fields = line.split(/\s+/);
    if (fields.length < 9) {
      log.debug(`Skipping unparsable ps line: ${line}`);
      continue;
    }
    const [pid, ppid, user, pcpu, rss, vsz, stat, etimes, ...args] = fields;
    const parsedPid = parseInt(pid, 10);
    if (Number.isNaN(parsedPid)) continue;
    const parentPid = parseInt(ppid, 10);

    processes.push({
      pid: parsedPid,
      parentPid: Number.isNaN(parentPid) || parentPid === 0 ? null : parentPid,
      user,
      name: processName(args),
      command: args.join(' '),
      cpuUsage: parseFloat(pcpu) || 0,
      memory: (parseInt(rss, 10) || 0) * 1024,
      virtualMemory: (parseInt(vsz, 10) || 0) * 1024,
      status: stat,
      runTime: parseInt(etimes, 10) || 0,
    });
  }
  return { processes };
}

export async function getProcessList(exec: Exec = execSimple): Promise<ProcessList> {
  log.info('Gathering process list');
  const { stdout } = await exec('ps', PS_ARGS);
  return parsePsOutput(stdout);
}
