import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { FTMS_CONTROL_POINT_UUID, INDOOR_BIKE_DATA_UUID } from '../../src/constants.js';
import { TrainerWriteError } from '../../src/errors.js';
import type { ControlPointResponse, IndoorBikeData } from '../../src/ftms-commands.js';
import { TrainerController } from '../../src/trainer-controller.js';
import { FakeDeviceLink } from '../fake-connector.js';

describe('TrainerController', () => {
  let link: FakeDeviceLink;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    link = new FakeDeviceLink('trainer', 'trainer-1', 'KICKR CORE');
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('requests control on initialize', async () => {
    const trainer = new TrainerController(link, { writeTimeoutMs: 1000, minWriteIntervalMs: 0 });
    await trainer.initialize();

    expect(link.writes).toEqual([{ uuid: FTMS_CONTROL_POINT_UUID, data: [0x00], withResponse: true }]);
    expect(trainer.name).toBe('KICKR CORE');
  });

  it('writes resistance, power and reset commands', async () => {
    const trainer = new TrainerController(link, { writeTimeoutMs: 1000, minWriteIntervalMs: 0 });
    await trainer.initialize();

    await trainer.apply({ kind: 'resistance', percent: 32.5 });
    await trainer.apply({ kind: 'power', watts: 250 });
    await trainer.release();

    expect(link.controlPointWrites()).toEqual([[0x00], [0x04, 32], [0x05, 0xfa, 0x00], [0x01]]);
  });

  it('levels a simulated road before resetting on release', async () => {
    const trainer = new TrainerController(link, { writeTimeoutMs: 1000, minWriteIntervalMs: 0 });
    await trainer.initialize();

    await trainer.apply({ kind: 'simulation', gradePercent: 4, windSpeedMps: 0, rollingResistance: 0.004, windResistance: 0 });
    await trainer.release({ kind: 'simulation', gradePercent: 0, windSpeedMps: 0, rollingResistance: 0.004, windResistance: 0 });

    expect(link.controlPointWrites()).toEqual([
      [0x00],
      [0x11, 0x00, 0x00, 0x90, 0x01, 40, 0],
      [0x11, 0x00, 0x00, 0x00, 0x00, 40, 0],
      [0x01]
    ]);
  });

  it('still resets when the neutral setting cannot be written', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const trainer = new TrainerController(link, { writeTimeoutMs: 1000, minWriteIntervalMs: 0 });
    await trainer.initialize();
    link.failNextWrites = 1;

    await trainer.release({ kind: 'simulation', gradePercent: 0, windSpeedMps: 0, rollingResistance: 0.004, windResistance: 0 });

    expect(link.controlPointWrites()).toEqual([[0x00], [0x01]]);
    expect(warnSpy).toHaveBeenCalledWith(
      '[Trainer]',
      'Could not restore neutral setting: 0.0% grade failed: GATT write failed'
    );
  });

  it('spaces writes by the minimum interval', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
    const trainer = new TrainerController(link, { writeTimeoutMs: 1000, minWriteIntervalMs: 100 });
    await trainer.initialize();

    const pending = trainer.apply({ kind: 'resistance', percent: 10 });
    await vi.advanceTimersByTimeAsync(99);
    expect(link.controlPointWrites()).toEqual([[0x00]]);

    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(link.controlPointWrites()).toEqual([[0x00], [0x04, 10]]);
  });

  it('fails a write that does not complete in time', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
    const trainer = new TrainerController(link, { writeTimeoutMs: 1000, minWriteIntervalMs: 0 });
    await trainer.initialize();
    link.hangWrites = true;

    const failure = trainer.apply({ kind: 'resistance', percent: 10 }).catch((error: unknown) => error);
    await vi.advanceTimersByTimeAsync(1000);

    const error = await failure;
    expect(error).toBeInstanceOf(TrainerWriteError);
    expect(error).toHaveProperty('message', '10.0% resistance failed: timed out after 1000ms');
  });

  it('wraps link errors in TrainerWriteError', async () => {
    const trainer = new TrainerController(link, { writeTimeoutMs: 1000, minWriteIntervalMs: 0 });
    link.failWrites = true;

    await expect(trainer.initialize()).rejects.toThrow(
      new TrainerWriteError('request control failed: GATT write failed')
    );
  });

  it('reports control point responses', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const trainer = new TrainerController(link, { writeTimeoutMs: 1000, minWriteIntervalMs: 0 });
    const responses: ControlPointResponse[] = [];
    trainer.on('controlPointResponse', (response: ControlPointResponse) => responses.push(response));
    await trainer.initialize();

    link.notify(FTMS_CONTROL_POINT_UUID, [0x80, 0x00, 0x01]);
    link.notify(FTMS_CONTROL_POINT_UUID, [0x80, 0x04, 0x03]);

    expect(responses.map(response => response.success)).toEqual([true, false]);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledWith('[Trainer]', 'Control point op 0x04 rejected: Invalid parameter');
  });

  it('ignores control point frames that are not responses', async () => {
    const trainer = new TrainerController(link, { writeTimeoutMs: 1000, minWriteIntervalMs: 0 });
    const listener = vi.fn();
    trainer.on('controlPointResponse', listener);
    await trainer.initialize();

    link.notify(FTMS_CONTROL_POINT_UUID, [0x04, 0x10]);
    expect(listener).not.toHaveBeenCalled();
  });

  it('emits parsed indoor bike data', async () => {
    const trainer = new TrainerController(link, { writeTimeoutMs: 1000, minWriteIntervalMs: 0 });
    const samples: IndoorBikeData[] = [];
    trainer.on('bikeData', (data: IndoorBikeData) => samples.push(data));
    await trainer.initialize();

    link.notify(INDOOR_BIKE_DATA_UUID, [0x44, 0x00, 0xc4, 0x09, 0xb4, 0x00, 0xc8, 0x00]);
    expect(samples).toEqual([{ speedKmh: 25, cadenceRpm: 90, powerWatts: 200 }]);
  });
});
