import assert from 'node:assert/strict';
import { test } from './testHarness';
import { FakeCastClient } from './fakes/castClient';
import { FakeCastDevice } from './fakes/castDevice';
import { makeMediaStatus } from './fakes/castStatus';
import { ManualClock } from './fakes/clock';
import { FakeMdns } from './fakes/mdns';
import { parseMediaStatus, parseReceiverStatus } from '../src/adapters/cast/statusParser';
import { CastV2Transport, normalizeUuid, toCastTarget } from '../src/adapters/cast/castTransport';
import { CastV2Device, type CastTarget } from '../src/adapters/cast/castDevice';
import type { MdnsServiceRecord } from '../src/ports/MdnsPort';
import type { CastDeviceHandle } from '../src/ports/CastDevicePort';

const MEDIA_NS = 'urn:x-cast:com.google.cast.media';

test('status parser: receiver status', () => {
  const status = parseReceiverStatus({
    applications: [
      {
        appId: 'CC1AD845',
        displayName: 'Default Media Receiver',
        sessionId: 's1',
        transportId: 't1',
        statusText: 'Ready',
        namespaces: [{ name: MEDIA_NS }, { bogus: true }],
      },
    ],
    volume: { level: 0.25, muted: true },
  });
  assert.deepEqual(status, {
    appId: 'CC1AD845',
    displayName: 'Default Media Receiver',
    iconUrl: null,
    statusText: 'Ready',
    sessionId: 's1',
    transportId: 't1',
    namespaces: [MEDIA_NS],
    volumeLevel: 0.25,
    volumeMuted: true,
  });
});

test('status parser: idle receiver', () => {
  assert.deepEqual(parseReceiverStatus({ volume: { level: 1 } }), {
    appId: null,
    displayName: null,
    iconUrl: null,
    statusText: null,
    sessionId: null,
    transportId: null,
    namespaces: [],
    volumeLevel: 1,
    volumeMuted: false,
  });
  assert.equal(parseReceiverStatus('nope'), null);
});

test('status parser: full media status', () => {
  const status = parseMediaStatus(
    {
      mediaSessionId: 3,
      playerState: 'PLAYING',
      currentTime: 12.5,
      playbackRate: 1,
      supportedMediaCommands: 15,
      media: {
        contentId: 'http://media.test/a.mp3',
        contentType: 'audio/mpeg',
        duration: 180,
        metadata: {
          metadataType: 3,
          title: 'Song',
          artist: 'Band',
          albumName: 'Record',
          trackNumber: 2,
          images: [{ url: 'http://img.test/cover.jpg', width: 300 }, { nope: 1 }],
        },
      },
    },
    5000,
  );
  assert.ok(status);
  assert.equal(status.mediaSessionId, 3);
  assert.equal(status.playerState, 'PLAYING');
  assert.equal(status.currentTime, 12.5);
  assert.equal(status.duration, 180);
  assert.equal(status.contentId, 'http://media.test/a.mp3');
  assert.equal(status.title, 'Song');
  assert.equal(status.artist, 'Band');
  assert.equal(status.albumName, 'Record');
  assert.equal(status.trackNumber, 2);
  assert.equal(status.metadataType, 3);
  assert.deepEqual(status.images, [{ url: 'http://img.test/cover.jpg', width: 300 }]);
  assert.equal(status.supportedMediaCommands, 15);
  assert.equal(status.idleReason, null);
  assert.equal(status.lastUpdated, 5000);
});

test('status parser: partial update keeps the media block of the same session', () => {
  const previous = makeMediaStatus({ mediaSessionId: 3, title: 'Song', duration: 180 });
  const status = parseMediaStatus([{ mediaSessionId: 3, playerState: 'PAUSED', currentTime: 42 }], 9000, previous);
  assert.ok(status);
  assert.equal(status.playerState, 'PAUSED');
  assert.equal(status.currentTime, 42);
  assert.equal(status.title, 'Song');
  assert.equal(status.duration, 180);
  assert.equal(status.lastUpdated, 9000);
});

test('status parser: a new session without media starts empty', () => {
  const previous = makeMediaStatus({ mediaSessionId: 3, title: 'Song' });
  const status = parseMediaStatus({ mediaSessionId: 4, playerState: 'LOADING' }, 1, previous);
  assert.ok(status);
  assert.equal(status.title, null);
  assert.equal(status.playerState, 'UNKNOWN');
  assert.equal(parseMediaStatus([], 1, previous), null);
});

test('cast discovery: uuids normalize to dashed lower case', () => {
  assert.equal(normalizeUuid('0123456789ABCDEF0123456789abcdef'), '01234567-89ab-cdef-0123-456789abcdef');
  assert.equal(normalizeUuid('01234567-89ab-cdef-0123-456789abcdef'), '01234567-89ab-cdef-0123-456789abcdef');
  assert.equal(normalizeUuid('short'), null);
});

test('cast discovery: service records become targets', () => {
  assert.deepEqual(
    toCastTarget({
      name: 'Chromecast-abc',
      host: 'chromecast-abc.local.',
      port: 8009,
      addresses: ['fe80::1', '192.0.2.20'],
      txt: { fn: 'Kitchen', id: '0123456789abcdef0123456789abcdef' },
    }),
    { host: '192.0.2.20', port: 8009, name: 'Kitchen', uuid: '01234567-89ab-cdef-0123-456789abcdef' },
  );
  assert.deepEqual(toCastTarget({ name: 'Bare', host: 'bare.local.', port: 0 }), {
    host: 'bare.local',
    port: 8009,
    name: 'Bare',
    uuid: null,
  });
  assert.equal(toCastTarget({ port: 8009 }), null);
});

const services: MdnsServiceRecord[] = [
  {
    name: 'Chromecast-1',
    port: 8009,
    addresses: ['192.0.2.21'],
    txt: { fn: 'Kitchen', id: '11111111111111111111111111111111' },
  },
  {
    name: 'Chromecast-2',
    port: 8010,
    addresses: ['192.0.2.22'],
    txt: { fn: 'Office', id: '22222222222222222222222222222222' },
  },
];

function makeTransport(options: {
  failures?: number;
  probe?: (host: string) => Promise<Partial<CastTarget> | null>;
} = {}) {
  const mdns = new FakeMdns(services);
  const targets: CastTarget[] = [];
  const sleeps: number[] = [];
  let failures = options.failures ?? 0;
  const transport = new CastV2Transport({
    mdns,
    connect: async (target): Promise<CastDeviceHandle> => {
      targets.push(target);
      if (failures > 0) {
        failures -= 1;
        throw new Error('connection refused');
      }
      return new FakeCastDevice(target.name, target.host, target.uuid);
    },
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    connectTries: 3,
    discoveryTimeoutMs: 10,
    probeHost: options.probe ?? (async () => null),
  });
  return { mdns, targets, sleeps, transport };
}

test('cast discovery: finds a device by friendly name', async () => {
  const { mdns, targets, transport } = makeTransport();
  const device = await transport.findByName('Office', 5);
  assert.equal(device?.host, '192.0.2.22');
  assert.deepEqual(targets, [
    { host: '192.0.2.22', port: 8010, name: 'Office', uuid: '22222222-2222-2222-2222-222222222222' },
  ]);
  assert.deepEqual(mdns.browsed, ['googlecast']);
  assert.equal(mdns.stopped, 1);
});

test('cast discovery: finds a device by uuid in any layout', async () => {
  const { transport } = makeTransport();
  const device = await transport.findByUuid('11111111-1111-1111-1111-111111111111', 5);
  assert.equal(device?.name, 'Kitchen');
});

test('cast discovery: any device takes the first announcement', async () => {
  const { transport } = makeTransport();
  const device = await transport.findAny(null);
  assert.equal(device?.name, 'Kitchen');
});

test('cast discovery: unmatched name times out without connecting', async () => {
  const { mdns, targets, transport } = makeTransport();
  assert.equal(await transport.findByName('Garage', 5), null);
  assert.deepEqual(targets, []);
  assert.equal(mdns.stopped, 1);
});

test('cast discovery: connection attempts retry with the retry wait', async () => {
  const { targets, sleeps, transport } = makeTransport({ failures: 2 });
  const device = await transport.findByName('Kitchen', 2);
  assert.equal(device?.name, 'Kitchen');
  assert.equal(targets.length, 3);
  assert.deepEqual(sleeps, [2000, 2000]);
});

test('cast discovery: no retry wait means one connection attempt', async () => {
  const { targets, sleeps, transport } = makeTransport({ failures: 1 });
  assert.equal(await transport.findByName('Kitchen', null), null);
  assert.equal(targets.length, 1);
  assert.deepEqual(sleeps, []);
});

test('cast discovery: hosts connect directly with probed details', async () => {
  const { mdns, targets, transport } = makeTransport({ probe: async () => ({ name: 'Den', uuid: null }) });
  const device = await transport.findByHost('192.0.2.30', 5);
  assert.equal(device?.name, 'Den');
  assert.deepEqual(targets, [{ host: '192.0.2.30', port: 8009, name: 'Den', uuid: null }]);
  assert.deepEqual(mdns.browsed, []);
});

test('cast discovery: a failed host probe still connects', async () => {
  const { targets, transport } = makeTransport({
    probe: async () => {
      throw new Error('unreachable');
    },
  });
  await transport.findByHost('192.0.2.31', 5);
  assert.deepEqual(targets, [{ host: '192.0.2.31', port: 8009, name: null, uuid: null }]);
});

const den: CastTarget = { host: '192.0.2.20', port: 8009, name: 'Den', uuid: null };

test('cast device: a dropped connection clears status and reports once', async () => {
  const client = new FakeCastClient();
  const device = new CastV2Device(client, den, new ManualClock());
  await device.refreshStatus();
  assert.equal(device.getCastStatus()?.volumeLevel, 0.4);

  const cleared: boolean[] = [];
  const reasons: Array<string | null> = [];
  device.onStatus(() => cleared.push(device.getCastStatus() === null));
  device.onDisconnect((reason) => reasons.push(reason));

  client.emit('error', new Error('socket reset'));
  client.emit('close');
  client.emit('status', { volume: { level: 0.9 } });

  assert.deepEqual(cleared, [true]);
  assert.deepEqual(reasons, ['socket reset']);
  assert.equal(device.getCastStatus(), null);
  assert.equal(device.getMediaStatus(), null);
  assert.equal(client.closes, 1);
});

test('cast device: a requested disconnect is not reported as a loss', async () => {
  const client = new FakeCastClient();
  const device = new CastV2Device(client, den, new ManualClock());
  const reasons: Array<string | null> = [];
  device.onDisconnect((reason) => reasons.push(reason));

  await device.disconnect();
  client.emit('close');

  assert.deepEqual(reasons, []);
  assert.equal(client.closes, 1);
});
