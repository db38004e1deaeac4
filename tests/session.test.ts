import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { InstallEngine } from '../src/engine/install-engine.js';
import { installProtocol } from '../src/protocol/codec.js';
import { InMemoryProject } from '../src/system/project.js';
import { performSystemCheck } from '../src/system/system-info.js';
import type { InstallState, ServerEvent, SystemSummary } from '../src/types.js';
import { MemoryConnection } from '../src/web/connection.js';
import { Session, type SessionEnd } from '../src/web/session.js';
import { captureLogs, exited, scriptedRunner } from './helpers.js';

const SUMMARY: SystemSummary = {
  totalMemory: 16 * 1024 ** 3,
  usedMemory: 0,
  totalSwap: 0,
  usedSwap: 0,
  osName: 'Linux',
  osVersion: 'test',
  kernelVersion: '6.6.0',
  hostname: 'test-host',
  cpus: Array.from({ length: 4 }, (_, i) => ({
    name: `cpu${i}`,
    cpuUsage: 0,
    frequency: 2000,
    vendorId: 'test-vendor',
    brand: 'Test CPU',
  })),
};

function createEngine(busCapacity?: number): InstallEngine {
  return new InstallEngine({
    busCapacity,
    workDir: '/work',
    configName: 'appliancevm',
    runner: scriptedRunner([exited(0)]).runner,
    collaborators: {
      getSystemSummary: async () => SUMMARY,
      checkSystem: performSystemCheck,
      getProcessList: async () => ({ processes: [] }),
      getDisks: async () => [],
      project: new InMemoryProject(),
    },
  });
}

async function nextEvent(connection: MemoryConnection): Promise<ServerEvent> {
  const frame = await connection.nextSent(AbortSignal.timeout(2000));
  assert.ok(frame !== null, 'expected a frame from the session');
  return installProtocol.decodeEvent(frame);
}

describe('Session', () => {
  let restoreLogs: () => void = () => {};

  beforeEach(() => {
    restoreLogs = captureLogs().restore;
  });

  afterEach(() => {
    restoreLogs();
  });

  it('sends the current state first and ends when the peer disconnects', async () => {
    const engine = createEngine();
    const connection = new MemoryConnection();
    const session = new Session(engine, installProtocol, connection);
    const running = session.run();

    assert.equal(await connection.nextSent(), '{"type":"StateChanged","state":{"type":"Idle"}}');
    assert.equal(engine.subscriberCount, 1);

    connection.disconnect();
    assert.equal(await running, 'inbound');
    assert.equal(engine.subscriberCount, 0);
    assert.equal(connection.isOpen, false);
  });

  it('sends a snapshot of a non-initial state to a late observer', async () => {
    const engine = createEngine();
    await engine.handle({ type: 'PerformSystemCheck' });

    const connection = new MemoryConnection();
    const running = new Session(engine, installProtocol, connection).run();
    assert.deepEqual(await nextEvent(connection), {
      type: 'StateChanged',
      state: { type: 'SystemCheckCompleted', result: { summary: SUMMARY, isCompatible: true, issues: [] } },
    });

    connection.disconnect();
    await running;
  });

  it('gives each observer the state at connect while other commands change it', async () => {
    const engine = createEngine();
    const observers: Array<{ connection: MemoryConnection; expected: InstallState; running: Promise<SessionEnd> }> = [];
    const checks: Promise<void>[] = [];

    for (let i = 0; i < 4; i++) {
      checks.push(engine.handle({ type: 'PerformSystemCheck' }));
      for (let j = 0; j < i; j++) await Promise.resolve();
      const connection = new MemoryConnection();
      const expected = engine.snapshot();
      observers.push({ connection, expected, running: new Session(engine, installProtocol, connection).run() });
      await new Promise((resolve) => setImmediate(resolve));
    }
    await Promise.all(checks);

    for (const { connection, expected } of observers) {
      assert.deepEqual(await nextEvent(connection), { type: 'StateChanged', state: expected });
      connection.disconnect();
    }
    await Promise.all(observers.map((o) => o.running));
  });

  it('closes the connection when the engine cannot take another subscriber', async () => {
    const engine = createEngine(0);
    const connection = new MemoryConnection();

    assert.equal(await new Session(engine, installProtocol, connection).run(), 'outbound');
    assert.deepEqual(connection.sent, []);
    assert.equal(connection.isOpen, false);
  });

  it('feeds commands to the engine and forwards the resulting events', async () => {
    const engine = createEngine();
    const connection = new MemoryConnection();
    const running = new Session(engine, installProtocol, connection).run();
    await nextEvent(connection);

    connection.deliver('{"type":"PerformSystemCheck"}');
    assert.deepEqual(await nextEvent(connection), { type: 'StateChanged', state: { type: 'PerformingCheck' } });
    const completed = await nextEvent(connection);
    assert.equal(completed.type === 'StateChanged' && completed.state.type, 'SystemCheckCompleted');

    connection.disconnect();
    await running;
  });

  it('drops malformed frames and keeps the connection open', async () => {
    const engine = createEngine();
    const connection = new MemoryConnection();
    const running = new Session(engine, installProtocol, connection).run();
    await nextEvent(connection);

    connection.deliver('this is not json');
    connection.deliver('{"type":"InstallDiskSelected"}');
    connection.deliver('{"type":"GetProcessList"}');
    assert.deepEqual(await nextEvent(connection), { type: 'ProcessListUpdated', list: { processes: [] } });
    assert.equal(connection.isOpen, true);

    connection.disconnect();
    await running;
  });

  it('answers an unknown command type with an Error event', async () => {
    const engine = createEngine();
    const connection = new MemoryConnection();
    const running = new Session(engine, installProtocol, connection).run();
    await nextEvent(connection);

    connection.deliver('{"type":"FormatEverything"}');
    assert.deepEqual(await nextEvent(connection), { type: 'Error', message: 'Command not implemented: FormatEverything' });

    connection.disconnect();
    await running;
  });

  it('broadcasts the events of a command to every observer', async () => {
    const engine = createEngine();
    const a = new MemoryConnection();
    const b = new MemoryConnection();
    const runningA = new Session(engine, installProtocol, a).run();
    const runningB = new Session(engine, installProtocol, b).run();
    await nextEvent(a);
    await nextEvent(b);

    a.deliver('{"type":"GetProcessList"}');
    assert.deepEqual(await nextEvent(b), { type: 'ProcessListUpdated', list: { processes: [] } });

    a.disconnect();
    b.disconnect();
    await Promise.all([runningA, runningB]);
  });

  it('can be stopped from outside', async () => {
    const engine = createEngine();
    const connection = new MemoryConnection();
    const session = new Session(engine, installProtocol, connection);
    const running = session.run();
    await nextEvent(connection);

    session.stop();
    const end = await running;
    assert.ok(['stopped', 'inbound', 'outbound'].includes(end));
    assert.equal(engine.subscriberCount, 0);
    assert.equal(connection.isOpen, false);
  });

  it('ends when the initial state cannot be sent', async () => {
    const engine = createEngine();
    const connection = new MemoryConnection();
    connection.close();

    assert.equal(await new Session(engine, installProtocol, connection).run(), 'outbound');
    assert.equal(engine.subscriberCount, 0);
  });
});
