import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EventEmitter } from 'events';

const { fakeNoble } = await vi.hoisted(async () => {
  const { EventEmitter: Emitter } = await import('events');

  class FakeNoble extends Emitter {
    state = 'poweredOn';
    advertised: unknown[] = [];
    startScanningAsync = vi.fn(async () => {
      const peripherals = [...this.advertised];
      setTimeout(() => {
        for (const peripheral of peripherals) {
          this.emit('discover', peripheral);
        }
      }, 0);
    });
    stopScanningAsync = vi.fn(async () => {});
  }

  return { fakeNoble: new FakeNoble() };
});

vi.mock('@stoprocent/noble', () => ({ default: fakeNoble }));

import { NobleConnector } from '../../src/noble-connector.js';
import { CLICK_ASYNC_CHARACTERISTIC_UUID, CLICK_SERVICE_UUID } from '../../src/constants.js';
import { ConnectionError, DeviceNotFoundError } from '../../src/errors.js';

class FakeCharacteristic extends EventEmitter {
  readonly subscribeAsync = vi.fn(async () => {});
  readonly writeAsync = vi.fn(async (_data: Buffer, _withoutResponse: boolean) => {});

  constructor(readonly uuid: string) {
    super();
  }
}

class FakePeripheral extends EventEmitter {
  state = 'disconnected';
  readonly advertisement: { localName: string };
  readonly characteristics: FakeCharacteristic[];

  readonly connectAsync = vi.fn(async () => {
    this.state = 'connected';
  });

  readonly disconnectAsync = vi.fn(async () => {
    this.state = 'disconnected';
    this.emit('disconnect');
  });

  readonly discoverAllServicesAndCharacteristicsAsync = vi.fn(async () => ({
    services: [{ uuid: this.serviceUuid }],
    characteristics: this.characteristics
  }));

  constructor(
    readonly id: string,
    localName: string,
    readonly rssi: number,
    private readonly serviceUuid: string,
    characteristicUuids: string[]
  ) {
    super();
    this.advertisement = { localName };
    this.characteristics = characteristicUuids.map(uuid => new FakeCharacteristic(uuid));
  }
}

function trainerPeripheral(id = 'aa:01'): FakePeripheral {
  return new FakePeripheral(id, 'KICKR CORE 5D21', -58, '1826', ['2ad9', '2ad2']);
}

function clickPeripheral(id: string): FakePeripheral {
  return new FakePeripheral(
    id,
    'Zwift Click',
    -70,
    CLICK_SERVICE_UUID.replace(/-/g, ''),
    [CLICK_ASYNC_CHARACTERISTIC_UUID.replace(/-/g, '')]
  );
}

describe('NobleConnector', () => {
  let connector: NobleConnector;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    fakeNoble.advertised = [];
    fakeNoble.state = 'poweredOn';
    connector = new NobleConnector();
  });

  afterEach(() => {
    fakeNoble.removeAllListeners();
    vi.restoreAllMocks();
  });

  it('connects to the first peripheral whose name contains the substring', async () => {
    const trainer = trainerPeripheral();
    fakeNoble.advertised = [clickPeripheral('cc:01'), trainer];

    const link = await connector.discover('trainer', 'kickr', 1);

    expect(link.id).toBe('aa:01');
    expect(link.name).toBe('KICKR CORE 5D21');
    expect(trainer.connectAsync).toHaveBeenCalledTimes(1);
    expect(fakeNoble.startScanningAsync).toHaveBeenCalledWith([], true);
  });

  it('writes through the resolved characteristic', async () => {
    const trainer = trainerPeripheral();
    fakeNoble.advertised = [trainer];

    const link = await connector.discover('trainer', 'KICKR', 1);
    await link.write('2ad9', new Uint8Array([0x04, 0x1b]), true);

    const controlPoint = trainer.characteristics[0];
    expect(controlPoint.writeAsync).toHaveBeenCalledWith(Buffer.from([0x04, 0x1b]), false);
  });

  it('gives two controllers with the same name two different peripherals', async () => {
    fakeNoble.advertised = [clickPeripheral('cc:01'), clickPeripheral('cc:02')];

    const left = await connector.discover('left_controller', 'Zwift Click', 1);
    const right = await connector.discover('right_controller', 'Zwift Click', 1);

    expect([left.id, right.id]).toEqual(['cc:01', 'cc:02']);
  });

  it('finds the same peripheral again after its link drops', async () => {
    const trainer = trainerPeripheral();
    fakeNoble.advertised = [trainer];
    const reasons: unknown[] = [];

    const first = await connector.discover('trainer', 'KICKR', 1);
    first.onDisconnect(reason => reasons.push(reason));

    trainer.state = 'disconnected';
    trainer.emit('disconnect', 0x08);
    expect(reasons).toEqual([0x08]);

    const second = await connector.discover('trainer', 'KICKR', 1);
    expect(second.id).toBe('aa:01');
    expect(second).not.toBe(first);
    expect(trainer.connectAsync).toHaveBeenCalledTimes(2);
  });

  it('stops delivering notifications from a dropped link', async () => {
    const trainer = trainerPeripheral();
    fakeNoble.advertised = [trainer];
    const received: number[][] = [];

    const link = await connector.discover('trainer', 'KICKR', 1);
    await link.subscribe('2ad2', data => received.push(Array.from(data)));
    trainer.characteristics[1].emit('data', Buffer.from([0x01]));

    trainer.emit('disconnect');
    trainer.characteristics[1].emit('data', Buffer.from([0x02]));

    expect(received).toEqual([[0x01]]);
  });

  it('does not report its own disconnect as link loss', async () => {
    const trainer = trainerPeripheral();
    fakeNoble.advertised = [trainer];
    const listener = vi.fn();

    const link = await connector.discover('trainer', 'KICKR', 1);
    link.onDisconnect(listener);
    await link.disconnect();

    expect(trainer.disconnectAsync).toHaveBeenCalledTimes(1);
    expect(listener).not.toHaveBeenCalled();
    await expect(connector.discover('trainer', 'KICKR', 1)).resolves.toHaveProperty('id', 'aa:01');
  });

  it('rejects with DeviceNotFoundError when nothing matches in time', async () => {
    fakeNoble.advertised = [clickPeripheral('cc:01')];

    await expect(connector.discover('trainer', 'KICKR', 0.05)).rejects.toThrow(
      new DeviceNotFoundError('trainer', 'KICKR', 0.05)
    );
  });

  it('rejects with a cancellation when the signal aborts mid-scan', async () => {
    const abort = new AbortController();

    const pending = connector.discover('trainer', 'KICKR', 5, abort.signal);
    await vi.waitFor(() => expect(fakeNoble.listenerCount('discover')).toBe(1));
    abort.abort();

    await expect(pending).rejects.toThrow(new ConnectionError('trainer', 'discovery cancelled'));
    expect(fakeNoble.listenerCount('discover')).toBe(0);
  });

  it('fails and frees the peripheral when the role service is missing', async () => {
    const wrong = new FakePeripheral('aa:09', 'KICKR BIKE', -60, '180d', ['2a37']);
    fakeNoble.advertised = [wrong];

    await expect(connector.discover('trainer', 'KICKR', 1)).rejects.toThrow(
      new ConnectionError('trainer', 'Service 1826 not found')
    );
    expect(wrong.disconnectAsync).toHaveBeenCalledTimes(1);
  });

  it('disconnects every open link on shutdown', async () => {
    const trainer = trainerPeripheral();
    const click = clickPeripheral('cc:01');
    fakeNoble.advertised = [trainer, click];

    await connector.discover('trainer', 'KICKR', 1);
    await connector.discover('left_controller', 'Zwift Click', 1);
    await connector.shutdown();

    expect(trainer.disconnectAsync).toHaveBeenCalledTimes(1);
    expect(click.disconnectAsync).toHaveBeenCalledTimes(1);
  });

  it('lists each advertising peripheral once, named devices first', async () => {
    const unnamed = new FakePeripheral('ff:01', '', -90, '180f', []);
    fakeNoble.advertised = [clickPeripheral('cc:01'), unnamed, trainerPeripheral(), clickPeripheral('cc:01')];

    const devices = await connector.scan(0.05);

    expect(devices).toEqual([
      { id: 'aa:01', name: 'KICKR CORE 5D21', rssi: -58 },
      { id: 'cc:01', name: 'Zwift Click', rssi: -70 },
      { id: 'ff:01', name: null, rssi: -90 }
    ]);
    expect(fakeNoble.listenerCount('discover')).toBe(0);
  });
});
