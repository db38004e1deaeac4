import os, { type CpuInfo } from 'node:os';
import fs from 'node:fs/promises';
import { createLogger } from '../log/logger.js';
import { errorMessage } from '../errors.js';
import type { CheckResult, Cpu, SystemSummary } from '../types.js';

const log = createLogger('system-info');

export const MIN_RAM_MB = 8192;
export const MIN_CPU_CORES = 4;

const BYTES_PER_MB = 1024 * 1024;

/** Compatibility check against the appliance's minimum hardware. */
export function performSystemCheck(summary: SystemSummary): CheckResult {
  const issues: string[] = [];
  const ramMb = Math.floor(summary.totalMemory / BYTES_PER_MB);

  if (ramMb < MIN_RAM_MB) {
    issues.push(`Insufficient RAM: ${ramMb} MB found, ${MIN_RAM_MB} MB required.`);
  }
  if (summary.cpus.length < MIN_CPU_CORES) {
    issues.push(`Insufficient CPU cores: ${summary.cpus.length} found, ${MIN_CPU_CORES} required.`);
  }

  return { summary, isCompatible: issues.length === 0, issues };
}

/** Parses SwapTotal/SwapFree (kB) out of /proc/meminfo text. */
export function parseSwap(meminfo: string): { totalSwap: number; usedSwap: number } {
  const read = (key: string): number => {
    const match = new RegExp(`^${key}:\\s+(\\d+)\\s*kB`, 'm').exec(meminfo);
    return match ? parseInt(match[1], 10) * 1024 : 0;
  };
  const totalSwap = read('SwapTotal');
  return { totalSwap, usedSwap: Math.max(0, totalSwap - read('SwapFree')) };
}

function cpuUsage(times: CpuInfo['times']): number {
  const total = times.user + times.nice + times.sys + times.idle + times.irq;
  if (total === 0) return 0;
  return Math.round(((total - times.idle) / total) * 1000) / 10;
}

async function readSwap(): Promise<{ totalSwap: number; usedSwap: number }> {
  try {
    return parseSwap(await fs.readFile('/proc/meminfo', 'utf-8'));
  } catch (err) {
    log.debug(`No swap information available: ${errorMessage(err)}`);
    return { totalSwap: 0, usedSwap: 0 };
  }
}

export async function getSystemSummary(): Promise<SystemSummary> {
  log.info('Gathering system information');
  const cpus: Cpu[] = os.cpus().map((cpu, i) => ({
    name: `cpu${i}`,
    cpuUsage: cpuUsage(cpu.times),
    frequency: cpu.speed,
    vendorId: '',
    brand: cpu.model,
  }));
  const totalMemory = os.totalmem();

  return {
    totalMemory,
    usedMemory: totalMemory - os.freemem(),
    ...(await readSwap()),
    osName: os.type(),
    osVersion: os.version(),
    kernelVersion: os.release(),
    hostname: os.hostname(),
    cpus,
  };
}
