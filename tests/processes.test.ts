import test from 'node:test';
import assert from 'node:assert/strict';
import { PS_ARGS, getProcessList, parsePsOutput, processName } from '../src/system/processes.js';
import { captureLogs } from './helpers.js';

const PS_OUTPUT = [
  '    1     0 root      0.0  12000 170000 Ss      3600 /sbin/init splash',
  '  812     1 bitcoin  12.5 2048000 4096000 Sl       120 bitcoind -conf=/etc/bitcoin.conf',
  '  900     2 root      0.1      0      0 I           5 [kworker/0:1-events]',
  'garbage',
  '',
].join('\n');

test('parses ps rows into process entries', () => {
  const logs = captureLogs();
  try {
    assert.deepEqual(parsePsOutput(PS_OUTPUT), {
      processes: [
        {
          pid: 1,
          parentPid: null,
          user: 'root',
          name: 'systemd',
          command: '/sbin/init splash',
          cpuUsage: 0,
          memory: 12000 * 1024,
          virtualMemory: 170000 * 1024,
          status: 'Ss',
          runTime: 3600,
        },
        {
          pid: 812,
          parentPid: 1,
          user: 'bitcoin',
          name: 'bitcoind',
          command: 'bitcoind -conf=/etc/bitcoin.conf',
          cpuUsage: 12.5,
          memory: 2048000 * 1024,
          virtualMemory: 4096000 * 1024,
          status: 'Sl',
          runTime: 120,
        },
        {
          pid: 900,
          parentPid: 2,
          user: 'root',
          name: 'kworker/0:1-events',
          command: '[kworker/0:1-events]',
          cpuUsage: 0.1,
          memory: 0,
          virtualMemory: 0,
          status: 'I',
          runTime: 5,
        },
      ],
    });
  } finally {
    logs.restore();
  }
});

test('names a process whose short name contains spaces by its executable', () => {
  const logs = captureLogs();
  try {
    const [content] = parsePsOutput(
      ' 4242  4000 user      3.0 300000 900000 Sl        60 /usr/lib/firefox/firefox -contentproc -isForBrowser 7\n',
    ).processes;
    assert.equal(content.name, 'firefox');
    assert.equal(content.command, '/usr/lib/firefox/firefox -contentproc -isForBrowser 7');
    assert.equal(content.runTime, 60);
  } finally {
    logs.restore();
  }
});

test('reads kernel thread names from their brackets', () => {
  assert.equal(processName(['[rcu_sched]']), 'rcu_sched');
  assert.equal(processName(['/usr/bin/python3', '-m', 'http.server']), 'python3');
});

test('asks ps for every process', async () => {
  const logs = captureLogs();
  const calls: string[][] = [];
  try {
    const list = await getProcessList(async (command, args) => {
      calls.push([command, ...args]);
      return { stdout: '', stderr: '' };
    });
    assert.deepEqual(list, { processes: [] });
    assert.deepEqual(calls, [['ps', ...PS_ARGS]]);
  } finally {
    logs.restore();
  }
});
