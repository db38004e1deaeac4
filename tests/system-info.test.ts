import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { MIN_CPU_CORES, MIN_RAM_MB, parseSwap, performSystemCheck } from '../src/system/system-info.js';
import type { SystemSummary } from '../src/types.js';

const MiB = 1024 * 1024;

function summary(memoryMb: number, cores: number): SystemSummary {
  return {
    totalMemory: memoryMb * MiB,
    usedMemory: 0,
    totalSwap: 0,
    usedSwap: 0,
    osName: 'Linux',
    osVersion: 'test',
    kernelVersion: '6.6.0',
    hostname: 'test-host',
    cpus: Array.from({ length: cores }, (_, i) => ({
      name: `cpu${i}`,
      cpuUsage: 0,
      frequency: 0,
      vendorId: '',
      brand: '',
    })),
  };
}

describe('performSystemCheck', () => {
  it('accepts a system exactly at the minimum', () => {
    const result = performSystemCheck(summary(MIN_RAM_MB, MIN_CPU_CORES));
    assert.equal(result.isCompatible, true);
    assert.deepEqual(result.issues, []);
  });

  it('reports missing memory', () => {
    const result = performSystemCheck(summary(MIN_RAM_MB - 1, MIN_CPU_CORES));
    assert.equal(result.isCompatible, false);
    assert.deepEqual(result.issues, ['Insufficient RAM: 8191 MB found, 8192 MB required.']);
  });

  it('reports too few cores', () => {
    const result = performSystemCheck(summary(32768, 2));
    assert.deepEqual(result.issues, ['Insufficient CPU cores: 2 found, 4 required.']);
  });

  it('keeps the summary it checked', () => {
    const checked = summary(16384, 8);
    assert.equal(performSystemCheck(checked).summary, checked);
  });
});

describe('parseSwap', () => {
  it('reads swap totals in bytes', () => {
    const meminfo = ['MemTotal:       16314444 kB', 'SwapTotal:       2097148 kB', 'SwapFree:        2097000 kB'].join('\n');
    assert.deepEqual(parseSwap(meminfo), { totalSwap: 2097148 * 1024, usedSwap: 148 * 1024 });
  });

  it('reports zero without swap lines', () => {
    assert.deepEqual(parseSwap('MemTotal: 1 kB'), { totalSwap: 0, usedSwap: 0 });
  });
});
