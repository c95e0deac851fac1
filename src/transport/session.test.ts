import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Session } from './session';
import {
  ConnectFailedError,
  DeviceNotFoundError,
  SubscribeFailedError,
} from '../exceptions';
import { DEFAULT_DEVICE_IDENTITY } from '../models/identity';
import type { Reading } from '../models/reading';
import type { OpenStage } from '../models/state';
import { FakeAdapter, FakePeripheral } from '../testing/fake-ble';
import { concat, vitalsFrame } from '../testing/frames';

const A = vitalsFrame(97, 72);
const B = vitalsFrame(98, 75);

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'debug').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});

function setup() {
  const peripheral = new FakePeripheral();
  const adapter = new FakeAdapter([peripheral]);
  return { peripheral, adapter };
}

describe('Session.open', () => {
  it('connects and subscribes, reporting each stage', async () => {
    const { peripheral, adapter } = setup();
    const stages: OpenStage[] = [];

    const session = await Session.open(DEFAULT_DEVICE_IDENTITY, adapter, {
      onStage: (stage) => stages.push(stage),
    });

    expect(stages).toEqual(['discovering', 'connecting', 'subscribing']);
    expect(peripheral.connected).toBe(true);
    expect(peripheral.characteristic.subscribed).toBe(true);
    expect(session.peripheralName).toBe('OxySmart 500');
    expect(session.terminated).toBe(false);
  });

  it('fails with not-found when no peripheral matches', async () => {
    const adapter = new FakeAdapter([new FakePeripheral({ name: 'Heart Strap' })]);

    const error = await Session.open(DEFAULT_DEVICE_IDENTITY, adapter).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeviceNotFoundError);
    expect(error).toMatchObject({
      kind: 'not-found',
      message: 'No peripheral found with name contains "OxySmart"',
    });
  });

  it('reports scan failures as not-found', async () => {
    const { adapter } = setup();
    adapter.scanError = new Error('radio off');

    await expect(Session.open(DEFAULT_DEVICE_IDENTITY, adapter)).rejects.toThrow(
      new DeviceNotFoundError('Failed to scan: radio off')
    );
  });

  it('fails with connect-failed and releases the link once', async () => {
    const { peripheral, adapter } = setup();
    peripheral.connectError = new Error('link refused');

    const error = await Session.open(DEFAULT_DEVICE_IDENTITY, adapter).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConnectFailedError);
    expect(error).toMatchObject({ kind: 'connect-failed', message: 'Failed to connect: link refused' });
    expect(peripheral.disconnectCalls).toBe(1);
    expect(peripheral.disconnectListenerCount).toBe(0);
  });

  it('fails with subscribe-failed when the characteristic is missing', async () => {
    const { peripheral, adapter } = setup();
    peripheral.characteristicMissing = true;

    const error = await Session.open(DEFAULT_DEVICE_IDENTITY, adapter).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SubscribeFailedError);
    expect(error).toMatchObject({
      kind: 'subscribe-failed',
      message: 'Notify characteristic 6e400003-b5a3-f393-e0a9-e50e24dcca9e not found',
    });
    expect(peripheral.disconnectCalls).toBe(1);
  });

  it('wraps subscription errors as subscribe-failed', async () => {
    const { peripheral, adapter } = setup();
    peripheral.characteristic.subscribeError = new Error('CCCD write rejected');

    await expect(Session.open(DEFAULT_DEVICE_IDENTITY, adapter)).rejects.toThrow(
      new SubscribeFailedError('Failed to subscribe: CCCD write rejected')
    );
    expect(peripheral.disconnectCalls).toBe(1);
  });

  it('stops a hanging scan when aborted', async () => {
    const { peripheral, adapter } = setup();
    adapter.hangScan = true;
    const controller = new AbortController();
    const reason = new Error('shutdown');

    const opening = Session.open(DEFAULT_DEVICE_IDENTITY, adapter, { signal: controller.signal });
    controller.abort(reason);

    await expect(opening).rejects.toBe(reason);
    expect(peripheral.connectCalls).toBe(0);
    expect(peripheral.disconnectCalls).toBe(0);
  });

  it('releases the link when aborted during connect', async () => {
    const { peripheral, adapter } = setup();
    peripheral.hangConnect = true;
    const controller = new AbortController();
    const reason = new Error('shutdown');

    const opening = Session.open(DEFAULT_DEVICE_IDENTITY, adapter, { signal: controller.signal });
    await vi.waitFor(() => expect(peripheral.connectCalls).toBe(1));
    controller.abort(reason);

    await expect(opening).rejects.toBe(reason);
    expect(peripheral.disconnectCalls).toBe(1);
  });

  it('releases the link when aborted during subscribe', async () => {
    const { peripheral, adapter } = setup();
    peripheral.characteristic.hangSubscribe = true;
    const controller = new AbortController();
    const reason = new Error('shutdown');

    const opening = Session.open(DEFAULT_DEVICE_IDENTITY, adapter, { signal: controller.signal });
    await vi.waitFor(() => expect(peripheral.characteristic.subscribeCalls).toBe(1));
    controller.abort(reason);

    await expect(opening).rejects.toBe(reason);
    expect(peripheral.disconnectCalls).toBe(1);
  });
});

describe('Session.nextChunk', () => {
  it('decodes each notification into readings', async () => {
    const { peripheral, adapter } = setup();
    const session = await Session.open(DEFAULT_DEVICE_IDENTITY, adapter);

    peripheral.characteristic.notify(concat(A, B));
    const outcome = await session.nextChunk();

    expect(outcome).toMatchObject({
      kind: 'data',
      readings: [
        { type: 'vitals', spo2: 97, pulseRate: 72 },
        { type: 'vitals', spo2: 98, pulseRate: 75 },
      ],
      discardedBytes: 0,
      malformedFrames: 0,
    });
  });

  it('carries partial frames across notifications', async () => {
    const { peripheral, adapter } = setup();
    const session = await Session.open(DEFAULT_DEVICE_IDENTITY, adapter);

    peripheral.characteristic.notify(A.subarray(0, 7));
    peripheral.characteristic.notify(A.subarray(7));

    expect(await session.nextChunk()).toMatchObject({ kind: 'data', readings: [] });
    expect(await session.nextChunk()).toMatchObject({
      kind: 'data',
      readings: [{ type: 'vitals', spo2: 97, pulseRate: 72 }],
    });
  });

  it('reports disconnected after delivering what was already received', async () => {
    const { peripheral, adapter } = setup();
    const session = await Session.open(DEFAULT_DEVICE_IDENTITY, adapter);

    peripheral.characteristic.notify(A);
    peripheral.dropLink();

    expect(session.terminated).toBe(true);
    expect(await session.nextChunk()).toMatchObject({ kind: 'data' });
    expect(await session.nextChunk()).toEqual({ kind: 'disconnected' });
  });

  it('completes a frame split around the disconnect', async () => {
    const { peripheral, adapter } = setup();
    const session = await Session.open(DEFAULT_DEVICE_IDENTITY, adapter);

    peripheral.characteristic.notify(A.subarray(0, 6));
    expect(await session.nextChunk()).toMatchObject({ kind: 'data', readings: [] });
    peripheral.characteristic.notify(A.subarray(6));
    peripheral.dropLink();

    expect(await session.nextChunk()).toMatchObject({
      kind: 'data',
      readings: [{ type: 'vitals', spo2: 97, pulseRate: 72 }],
    });
    expect(await session.nextChunk()).toEqual({ kind: 'disconnected' });
  });

  it('wakes a waiting caller on disconnect', async () => {
    const { peripheral, adapter } = setup();
    const session = await Session.open(DEFAULT_DEVICE_IDENTITY, adapter);

    const pending = session.nextChunk();
    peripheral.dropLink();

    expect(await pending).toEqual({ kind: 'disconnected' });
  });

  it('reports stalled when nothing arrives in time', async () => {
    vi.useFakeTimers();
    const { adapter } = setup();
    const session = await Session.open(DEFAULT_DEVICE_IDENTITY, adapter);

    const pending = session.nextChunk({ timeoutMs: 15000 });
    await vi.advanceTimersByTimeAsync(15000);

    expect(await pending).toEqual({ kind: 'stalled' });
    expect(session.terminated).toBe(false);
  });

  it('reports decode-fatal once too much garbage arrives without a frame', async () => {
    const { peripheral, adapter } = setup();
    const session = await Session.open(DEFAULT_DEVICE_IDENTITY, adapter, { maxGarbageBytes: 10 });

    peripheral.characteristic.notify(new Array(6).fill(0x01));
    expect(await session.nextChunk()).toMatchObject({ kind: 'data', discardedBytes: 6 });

    peripheral.characteristic.notify(new Array(5).fill(0x02));
    const fatal = { kind: 'decode-fatal', reason: '11 bytes discarded without a valid frame' };
    expect(await session.nextChunk()).toEqual(fatal);
    expect(session.terminated).toBe(true);
    expect(await session.nextChunk()).toEqual(fatal);
  });

  it('resets the garbage count after a valid frame', async () => {
    const { peripheral, adapter } = setup();
    const session = await Session.open(DEFAULT_DEVICE_IDENTITY, adapter, { maxGarbageBytes: 10 });

    peripheral.characteristic.notify(concat(new Array(8).fill(0x01), A));
    peripheral.characteristic.notify(new Array(8).fill(0x01));

    expect(await session.nextChunk()).toMatchObject({ kind: 'data', discardedBytes: 8 });
    expect(await session.nextChunk()).toMatchObject({ kind: 'data', discardedBytes: 8 });
  });

  it('rejects with the abort reason', async () => {
    const { adapter } = setup();
    const session = await Session.open(DEFAULT_DEVICE_IDENTITY, adapter);
    const controller = new AbortController();
    const reason = new Error('shutdown');

    const pending = session.nextChunk({ signal: controller.signal });
    controller.abort(reason);

    await expect(pending).rejects.toBe(reason);
  });
});

describe('Session.readings', () => {
  it('yields readings until the link drops', async () => {
    const { peripheral, adapter } = setup();
    const session = await Session.open(DEFAULT_DEVICE_IDENTITY, adapter);

    peripheral.characteristic.notify(A);
    peripheral.characteristic.notify(B);
    peripheral.dropLink();

    const readings: Reading[] = [];
    for await (const reading of session.readings()) {
      readings.push(reading);
    }

    expect(readings).toEqual([
      { type: 'vitals', spo2: 97, pulseRate: 72 },
      { type: 'vitals', spo2: 98, pulseRate: 75 },
    ]);
  });
});

describe('Session.close', () => {
  it('releases the link exactly once', async () => {
    const { peripheral, adapter } = setup();
    const session = await Session.open(DEFAULT_DEVICE_IDENTITY, adapter);

    await session.close();
    await session.close();

    expect(peripheral.disconnectCalls).toBe(1);
    expect(peripheral.characteristic.unsubscribeCalls).toBe(1);
    expect(peripheral.disconnectListenerCount).toBe(0);
    expect(session.terminated).toBe(true);
    expect(await session.nextChunk()).toEqual({ kind: 'disconnected' });
  });

  it('still releases the handle after the link dropped', async () => {
    const { peripheral, adapter } = setup();
    const session = await Session.open(DEFAULT_DEVICE_IDENTITY, adapter);

    peripheral.dropLink();
    await session.close();

    expect(peripheral.disconnectCalls).toBe(1);
  });

  it('does not carry undecoded bytes into the next session', async () => {
    const { peripheral, adapter } = setup();
    const first = await Session.open(DEFAULT_DEVICE_IDENTITY, adapter);
    peripheral.characteristic.notify(B.subarray(0, 6));
    expect(await first.nextChunk()).toMatchObject({ kind: 'data', readings: [] });
    peripheral.dropLink();
    await first.close();

    const second = await Session.open(DEFAULT_DEVICE_IDENTITY, adapter);
    peripheral.characteristic.notify(B.subarray(6));

    expect(await second.nextChunk()).toMatchObject({
      kind: 'data',
      readings: [],
      discardedBytes: 6,
    });
  });
});
