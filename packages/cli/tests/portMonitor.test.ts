import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { IngestionQueue, ManualClock, noteOn } from '@pianolog/engine';
import type { QueueItem } from '@pianolog/engine';
import { PortMonitor, selectPort } from '../src/portMonitor';
import { FakeSource } from './fakes';

const THROUGH = 'Midi Through (hw:0,0)';
const PIANO = 'Digital Piano (hw:1,0)';

describe('selectPort', () => {
  it('prefers a case-insensitive name match, else the first port', () => {
    expect(selectPort([THROUGH, PIANO], 'pia')).toBe(PIANO);
    expect(selectPort([THROUGH, PIANO], 'PIANO')).toBe(PIANO);
    expect(selectPort([THROUGH, PIANO], 'roland')).toBe(THROUGH);
    expect(selectPort([THROUGH, PIANO], '')).toBe(THROUGH);
    expect(selectPort([], 'pia')).toBeUndefined();
  });
});

describe('PortMonitor', () => {
  let source: FakeSource;
  let queue: IngestionQueue<QueueItem>;
  let clock: ManualClock;
  let monitor: PortMonitor;

  beforeEach(() => {
    source = new FakeSource();
    queue = new IngestionQueue<QueueItem>();
    clock = new ManualClock(0);
    monitor = new PortMonitor({ source, queue, match: 'pia', scanInterval: 1, errorBackoff: 2, clock });
  });

  afterEach(() => {
    monitor.stop();
    jest.useRealTimers();
  });

  it('connects to the preferred port and announces it', () => {
    source.ports = [THROUGH, PIANO];
    clock.set(4);
    monitor.scan();

    expect(monitor.currentPort).toBe(PIANO);
    expect(queue.drain()).toEqual([{ type: 'port', name: PIANO, timestamp: 4 }]);
  });

  it('forwards port input onto the queue', () => {
    source.ports = [PIANO];
    monitor.scan();
    queue.drain();

    const message = noteOn(60, 90);
    source.opened[0].emit(message, 1.5);
    expect(queue.drain()).toEqual([{ type: 'midi', message, timestamp: 1.5 }]);
  });

  it('leaves a healthy connection alone', () => {
    source.ports = [PIANO];
    monitor.scan();
    queue.drain();
    monitor.scan();

    expect(source.opened).toHaveLength(1);
    expect(queue.size).toBe(0);
  });

  it('replaces a port that disappeared', () => {
    source.ports = [THROUGH, PIANO];
    monitor.scan();
    queue.drain();

    source.ports = [THROUGH];
    clock.set(9);
    monitor.scan();

    expect(source.opened[0].closed).toBe(true);
    expect(monitor.currentPort).toBe(THROUGH);
    expect(queue.drain()).toEqual([
      { type: 'port', name: null, timestamp: 9 },
      { type: 'port', name: THROUGH, timestamp: 9 },
    ]);
  });

  it('reports a lost port when nothing replaces it', () => {
    source.ports = [PIANO];
    monitor.scan();
    queue.drain();

    source.ports = [];
    monitor.scan();
    expect(monitor.currentPort).toBeNull();
    expect(queue.drain()).toEqual([{ type: 'port', name: null, timestamp: 0 }]);

    monitor.scan();
    expect(queue.size).toBe(0);
  });

  it('reopens a handle that closed on its own', () => {
    source.ports = [PIANO];
    monitor.scan();
    source.opened[0].closed = true;
    monitor.scan();

    expect(source.opened.map(h => h.name)).toEqual([PIANO, PIANO]);
  });

  it('rescans on its interval and backs off after a failure', () => {
    jest.useFakeTimers();
    source.ports = [PIANO];
    monitor.start();
    expect(source.listCalls).toBe(1);

    source.failList = true;
    jest.advanceTimersByTime(1000);
    expect(source.listCalls).toBe(2);

    jest.advanceTimersByTime(1999);
    expect(source.listCalls).toBe(2);
    source.failList = false;
    jest.advanceTimersByTime(1);
    expect(source.listCalls).toBe(3);

    jest.advanceTimersByTime(1000);
    expect(source.listCalls).toBe(4);

    monitor.stop();
    expect(source.opened[0].closed).toBe(true);
    jest.advanceTimersByTime(5000);
    expect(source.listCalls).toBe(4);
  });
});
