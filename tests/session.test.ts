import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test } from './testHarness';
import { ManualClock } from './fakes/clock';
import { FakeSupervisor, InMemorySessionStore } from './fakes/session';
import { SessionDaemon } from '../src/application/session/sessionDaemon';
import { SessionStore } from '../src/adapters/storage/sessionStore';
import { ProcessSupervisor } from '../src/adapters/process/processSupervisor';
import { buildSessionPaths, sanitizeLabel } from '../src/config/session';
import { SessionAlreadyRunningError, SessionNotRunningError } from '../src/domain/errors';
import { deviceLabel, parseSessionRecord, type DaemonArgs, type SessionRecord } from '../src/domain/session/types';

const STARTED_AT = '1970-01-01T00:16:40.000Z';

const kitchen: DaemonArgs = {
  name: 'Kitchen',
  host: null,
  uuid: null,
  wait: 5,
  retryWait: 2,
  icon: false,
  logLevel: 'info',
};

function makeDaemon() {
  const store = new InMemorySessionStore();
  const supervisor = new FakeSupervisor();
  const daemon = new SessionDaemon({
    store,
    supervisor,
    clock: new ManualClock(),
    buildCommand: (args) => ['cli.js', 'connect', '--name', args.name ?? ''],
    logFile: (label) => `/state/${label}.log`,
  });
  return { store, supervisor, daemon };
}

async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cast-bridge-tests-'));
  try {
    return await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

test('session: labels prefer name, then host, then uuid', () => {
  assert.equal(deviceLabel({ name: 'A', host: 'B', uuid: 'C' }), 'A');
  assert.equal(deviceLabel({ name: null, host: 'B', uuid: 'C' }), 'B');
  assert.equal(deviceLabel({ name: '', host: null, uuid: 'C' }), 'C');
  assert.equal(deviceLabel({ name: null, host: null, uuid: null }), 'Device');
});

test('session: unknown device is not started', async () => {
  const { daemon } = makeDaemon();
  const record = await daemon.status(kitchen);
  assert.equal(record.id, 'Kitchen');
  assert.equal(record.status, 'not-started');
  assert.equal(record.pid, null);
  assert.equal(record.updatedAt, STARTED_AT);
});

test('session: start spawns the connect command and saves the record', async () => {
  const { daemon, store, supervisor } = makeDaemon();
  const record = await daemon.start(kitchen);

  assert.deepEqual(record, {
    id: 'Kitchen',
    status: 'running',
    pid: 4001,
    args: kitchen,
    updatedAt: STARTED_AT,
  });
  assert.deepEqual(supervisor.spawned, [
    { args: ['cli.js', 'connect', '--name', 'Kitchen'], logFile: '/state/Kitchen.log', pid: 4001 },
  ]);
  assert.deepEqual(store.records.get('Kitchen'), record);
  assert.equal((await daemon.status(kitchen)).status, 'running');
});

test('session: a second start is refused while running', async () => {
  const { daemon, supervisor } = makeDaemon();
  await daemon.start(kitchen);
  await assert.rejects(() => daemon.start(kitchen), SessionAlreadyRunningError);
  assert.equal(supervisor.spawned.length, 1);
});

test('session: a dead process reads as stopped and can start again', async () => {
  const { daemon, supervisor } = makeDaemon();
  await daemon.start(kitchen);
  supervisor.alive.delete(4001);

  assert.equal((await daemon.status(kitchen)).status, 'stopped');
  const record = await daemon.start(kitchen);
  assert.equal(record.pid, 4002);
});

test('session: stop terminates and forgets the session', async () => {
  const { daemon, store, supervisor } = makeDaemon();
  await daemon.start(kitchen);

  const record = await daemon.stop(kitchen);
  assert.equal(record.status, 'stopped');
  assert.equal(record.pid, 4001);
  assert.deepEqual(supervisor.terminated, [4001]);
  assert.equal(store.records.size, 0);
  await assert.rejects(() => daemon.stop(kitchen), SessionNotRunningError);
});

test('session: stopping a dead session only clears its record', async () => {
  const { daemon, store, supervisor } = makeDaemon();
  await daemon.start(kitchen);
  supervisor.alive.clear();

  await daemon.stop(kitchen);
  assert.deepEqual(supervisor.terminated, []);
  assert.equal(store.records.size, 0);
});

test('session: restart reuses the saved arguments', async () => {
  const { daemon, supervisor } = makeDaemon();
  await daemon.start(kitchen);

  const record = await daemon.restart({ name: 'Kitchen', host: null, uuid: null });
  assert.equal(record.pid, 4002);
  assert.deepEqual(record.args, kitchen);
  assert.deepEqual(supervisor.terminated, [4001]);
});

test('session: restart without a saved session needs arguments', async () => {
  const { daemon } = makeDaemon();
  const ids = { name: 'Kitchen', host: null, uuid: null };
  await assert.rejects(() => daemon.restart(ids), SessionNotRunningError);
  const record = await daemon.restart(ids, kitchen);
  assert.equal(record.pid, 4001);
});

test('session paths: labels cannot leave the state directory', () => {
  assert.equal(sanitizeLabel('../etc'), '__etc');
  assert.equal(sanitizeLabel('Living Room'), 'Living_Room');
  assert.equal(sanitizeLabel('192.168.1.20'), '192.168.1.20');
  const paths = buildSessionPaths({ stateDir: '/state' });
  assert.equal(paths.argsFile('Living Room'), '/state/Living_Room-args.json');
  assert.equal(paths.logFile('Living Room'), '/state/Living_Room.log');
});

test('session records: malformed payloads are rejected', () => {
  const record: SessionRecord = {
    id: 'Kitchen',
    status: 'running',
    pid: 12,
    args: kitchen,
    updatedAt: STARTED_AT,
  };
  assert.deepEqual(parseSessionRecord(JSON.parse(JSON.stringify(record))), record);
  assert.equal(parseSessionRecord({ ...record, status: 'paused' }), null);
  assert.equal(parseSessionRecord({ ...record, args: { ...kitchen, logLevel: 'loud' } }), null);
  assert.equal(parseSessionRecord([]), null);
});

test('session store: records persist as json files per label', async () => {
  await withTempDir(async (dir) => {
    const stateDir = path.join(dir, 'state');
    const store = new SessionStore(buildSessionPaths({ stateDir }));
    assert.equal(await store.load('Living Room'), null);

    const record: SessionRecord = {
      id: 'Living Room',
      status: 'running',
      pid: 77,
      args: { ...kitchen, name: 'Living Room' },
      updatedAt: STARTED_AT,
    };
    await store.save(record);
    assert.deepEqual(await fs.readdir(stateDir), ['Living_Room-args.json']);
    assert.deepEqual(await store.load('Living Room'), record);

    await store.delete('Living Room');
    assert.equal(await store.load('Living Room'), null);
    await store.delete('Living Room');
  });
});

test('session store: malformed files load as missing', async () => {
  await withTempDir(async (dir) => {
    const store = new SessionStore(buildSessionPaths({ stateDir: dir }));
    await fs.writeFile(path.join(dir, 'Kitchen-args.json'), '{"id":"Kitchen"}');
    await fs.writeFile(path.join(dir, 'Office-args.json'), '{not json');
    assert.equal(await store.load('Kitchen'), null);
    assert.equal(await store.load('Office'), null);
  });
});

const errorWithCode = (code: string): Error => Object.assign(new Error(code), { code });

test('process supervisor: liveness probes with signal 0', () => {
  const probes: Array<[number, NodeJS.Signals | 0 | undefined]> = [];
  const responses: Record<number, Error | null> = { 1: null, 2: errorWithCode('EPERM'), 3: errorWithCode('ESRCH') };
  const supervisor = new ProcessSupervisor({
    kill: (pid, signal) => {
      probes.push([pid, signal]);
      const error = responses[pid];
      if (error) throw error;
      return true;
    },
  });
  assert.equal(supervisor.isAlive(1), true);
  assert.equal(supervisor.isAlive(2), true);
  assert.equal(supervisor.isAlive(3), false);
  assert.deepEqual(probes, [
    [1, 0],
    [2, 0],
    [3, 0],
  ]);
});

test('process supervisor: terminate sends SIGTERM', () => {
  const signals: Array<NodeJS.Signals | 0 | undefined> = [];
  const supervisor = new ProcessSupervisor({
    kill: (pid, signal) => {
      signals.push(signal);
      if (pid === 9) throw errorWithCode('ESRCH');
      if (pid === 10) throw errorWithCode('EPERM');
      return true;
    },
  });
  assert.equal(supervisor.terminate(8), true);
  assert.equal(supervisor.terminate(9), false);
  assert.throws(() => supervisor.terminate(10), /EPERM/);
  assert.deepEqual(signals, ['SIGTERM', 'SIGTERM', 'SIGTERM']);
});
