import assert from 'node:assert/strict';
import { test } from './testHarness';
import { FakeCastDevice } from './fakes/castDevice';
import { makeCastStatus } from './fakes/castStatus';
import { ManualClock } from './fakes/clock';
import { FakeMprisServer } from './fakes/mpris';
import { FakeTransport } from './fakes/transport';
import { DiscoveryLoop } from '../src/application/discovery/retryLoop';
import { DeviceWrapper } from '../src/application/wrapper/deviceWrapper';
import type { DaemonArgs } from '../src/domain/session/types';
import { RC_NO_DEVICE, RC_OK } from '../src/domain/exitCodes';
import { NoDeviceFoundError } from '../src/domain/errors';

const icons = { defaultIcon: '/assets/icon.svg', lightIcon: '/assets/icon-light.svg' };

function makeLoop(transport: FakeTransport) {
  const sleeps: number[] = [];
  const servers: FakeMprisServer[] = [];
  const loop = new DiscoveryLoop({
    transport,
    createAdapter: (device) =>
      new DeviceWrapper(device, {
        clock: new ManualClock(),
        icons,
        desktopEntries: { create: () => null },
      }),
    createServer: (name, adapter) => {
      const server = new FakeMprisServer(name, adapter);
      servers.push(server);
      return server;
    },
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });
  return { loop, sleeps, servers };
}

const args = (overrides: Partial<DaemonArgs> = {}): DaemonArgs => ({
  name: null,
  host: null,
  uuid: null,
  wait: null,
  retryWait: 5,
  icon: false,
  logLevel: 'none',
  ...overrides,
});

const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

test('discovery: host, then uuid, then name', async () => {
  const device = new FakeCastDevice();
  const transport = new FakeTransport([null, null, device]);
  const { loop } = makeLoop(transport);

  const found = await loop.findDevice({ name: 'N', host: 'H', uuid: 'U' }, 5);
  assert.equal(found, device);
  assert.deepEqual(transport.calls, ['host:H:5', 'uuid:U:5', 'name:N:5']);
});

test('discovery: first hit stops the search', async () => {
  const device = new FakeCastDevice();
  const transport = new FakeTransport([device]);
  const { loop } = makeLoop(transport);

  await loop.findDevice({ name: 'N', host: 'H', uuid: 'U' }, 5);
  assert.deepEqual(transport.calls, ['host:H:5']);
});

test('discovery: no identifiers searches for any device', async () => {
  const transport = new FakeTransport([]);
  const { loop } = makeLoop(transport);
  assert.equal(await loop.findDevice({ name: null, host: null, uuid: null }, null), null);
  assert.deepEqual(transport.calls, ['any:null']);
});

test('discovery: no wait means a single attempt without sleeping', async () => {
  const transport = new FakeTransport([]);
  const { loop, sleeps } = makeLoop(transport);
  const server = await loop.retryUntilFound({ name: 'Kitchen', host: null, uuid: null }, null, 5);
  assert.equal(server, null);
  assert.deepEqual(transport.calls, ['name:Kitchen:5']);
  assert.deepEqual(sleeps, []);
});

test('discovery: waits between sweeps until a device appears', async () => {
  const device = new FakeCastDevice();
  const transport = new FakeTransport([null, null, device]);
  const { loop, sleeps, servers } = makeLoop(transport);

  const server = await loop.retryUntilFound({ name: 'Kitchen', host: null, uuid: null }, 7, 5);
  assert.equal(server, servers[0]);
  assert.deepEqual(sleeps, [7000, 7000]);
  assert.equal(servers[0]?.published, 1);
  assert.equal(loop.current?.device, device);
});

test('discovery: missing device maps to its exit code', async () => {
  const { loop } = makeLoop(new FakeTransport([]));
  assert.equal(await loop.runSafe(args({ name: 'Kitchen' })), RC_NO_DEVICE);
  await assert.rejects(() => loop.runServer(args({ name: 'Kitchen' })), NoDeviceFoundError);
});

test('discovery: bound session refreshes on status and tears down on stop', async () => {
  const device = new FakeCastDevice();
  device.castStatus = makeCastStatus();
  const { loop, servers } = makeLoop(new FakeTransport([device]));

  const running = loop.runSafe(args({ name: 'Living Room', icon: true }));
  while (!loop.current) {
    await tick();
  }
  const server = servers[0];
  assert.ok(server);
  assert.equal(server.refreshes, 1);
  assert.equal(server.adapter.metadata()['mpris:artUrl'], '/assets/icon-light.svg');

  device.emitStatus();
  assert.equal(server.refreshes, 2);

  await loop.stop();
  assert.equal(await running, RC_OK);
  assert.equal(server.closed, true);
  assert.equal(device.disconnected, true);
  assert.equal(device.listenerCount, 0);
  assert.equal(loop.current, null);
});

test('discovery: a dropped device is searched for and bound again', async () => {
  const first = new FakeCastDevice();
  first.castStatus = makeCastStatus();
  const second = new FakeCastDevice();
  second.castStatus = makeCastStatus();
  const transport = new FakeTransport([first, null, second]);
  const { loop, sleeps, servers } = makeLoop(transport);

  const running = loop.runSafe(args({ name: 'Living Room', wait: 3 }));
  while (loop.current?.device !== first) {
    await tick();
  }
  first.drop('socket closed');
  while (loop.current?.device !== second) {
    await tick();
  }

  assert.equal(servers.length, 2);
  assert.equal(servers[0]?.closed, true);
  assert.equal(servers[1]?.published, 1);
  assert.notEqual(servers[1]?.adapter, servers[0]?.adapter);
  assert.equal(first.disconnected, true);
  assert.equal(first.listenerCount, 0);
  assert.deepEqual(sleeps, [3000]);
  assert.deepEqual(transport.calls, ['name:Living Room:5', 'name:Living Room:5', 'name:Living Room:5']);

  await loop.stop();
  assert.equal(await running, RC_OK);
  assert.equal(second.disconnected, true);
});

test('discovery: a dropped device without retrying ends with the no-device code', async () => {
  const device = new FakeCastDevice();
  device.castStatus = makeCastStatus();
  const { loop, servers } = makeLoop(new FakeTransport([device]));

  const running = loop.runSafe(args({ name: 'Living Room' }));
  while (loop.current?.device !== device) {
    await tick();
  }
  device.drop();

  assert.equal(await running, RC_NO_DEVICE);
  assert.equal(servers[0]?.closed, true);
  assert.equal(loop.current, null);
});
