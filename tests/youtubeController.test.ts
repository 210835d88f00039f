import assert from 'node:assert/strict';
import { test } from './testHarness';
import { FakeCastDevice } from './fakes/castDevice';
import { makeCastStatus } from './fakes/castStatus';
import { YOUTUBE_APP_ID, YouTubeController } from '../src/application/providers/youtubeController';
import { getVideoId, isYoutube, resolveContentUrl } from '../src/application/wrapper/contentId';

function registered() {
  const device = new FakeCastDevice();
  const controller = new YouTubeController();
  device.registerController(controller);
  device.castStatus = makeCastStatus({ appId: YOUTUBE_APP_ID });
  return { device, controller };
}

test('youtube: video ids from long and short links', () => {
  assert.equal(getVideoId('https://www.youtube.com/watch?v=abc123&t=10'), 'abc123');
  assert.equal(getVideoId('https://youtu.be/xyz789?t=5'), 'xyz789');
  assert.equal(getVideoId('https://youtu.be/xyz789#frag'), 'xyz789');
  assert.equal(getVideoId('https://www.youtube.com/feed/trending'), null);
  assert.equal(getVideoId('http://media.test/a.mp3'), null);
  assert.equal(isYoutube('HTTPS://YOUTU.BE/ABC'), true);
});

test('youtube: content urls', () => {
  assert.equal(resolveContentUrl('abc123', true), 'https://youtube.com/watch?v=abc123');
  assert.equal(resolveContentUrl('abc123', false), 'abc123');
  assert.equal(resolveContentUrl('http://media.test/a.mp3', true), 'http://media.test/a.mp3');
  assert.equal(resolveContentUrl(null, true), null);
});

test('youtube: active only while its app runs', () => {
  const { device, controller } = registered();
  assert.equal(controller.isActive, true);
  device.castStatus = makeCastStatus();
  assert.equal(controller.isActive, false);
});

test('youtube: session status message records the screen id', async () => {
  const { device, controller } = registered();
  await controller.playVideo('v1');
  device.channels[0]?.receive({ type: 'mdxSessionStatus', data: { screenId: 'screen-1' } });
  assert.equal(controller.currentScreenId, 'screen-1');
});

test('youtube: channel is reused and dropped when the app changes', async () => {
  const { device, controller } = registered();
  await controller.playVideo('v1');
  await controller.playVideo('v2');
  assert.equal(device.channels.length, 1);

  device.castStatus = makeCastStatus({ appId: 'CC1AD845' });
  device.emitStatus();
  assert.equal(device.channels[0]?.closed, true);
  assert.equal(controller.currentScreenId, null);

  device.castStatus = makeCastStatus({ appId: YOUTUBE_APP_ID });
  await controller.playVideo('v3');
  assert.equal(device.channels.length, 2);
});

test('youtube: play next drains the local queue', async () => {
  const { controller } = registered();
  controller.addToQueue('a');
  controller.addToQueue('b');
  assert.equal(await controller.playNext(), true);
  assert.deepEqual(controller.queuedVideos, ['b']);
  assert.equal(await controller.playNext(), true);
  assert.equal(await controller.playNext(), false);
});

test('youtube: unregistered controller refuses to launch', async () => {
  const controller = new YouTubeController();
  await assert.rejects(() => controller.launch(), /not registered/);
});
