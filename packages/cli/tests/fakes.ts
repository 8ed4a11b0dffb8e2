import type { MidiMessage } from '@pianolog/engine';
import type { EventSource, PortHandle } from '../src/portMonitor';

export class FakeHandle implements PortHandle {
  closed = false;

  constructor(
    readonly name: string,
    readonly emit: (message: MidiMessage, timestamp: number) => void,
  ) {}

  close(): void {
    this.closed = true;
  }
}

/** In-memory port list; tests plug and unplug by editing `ports`. */
export class FakeSource implements EventSource {
  ports: string[] = [];
  opened: FakeHandle[] = [];
  listCalls = 0;
  failList = false;

  list(): string[] {
    this.listCalls++;
    if (this.failList) throw new Error('sequencer unavailable');
    return [...this.ports];
  }

  open(name: string, onMessage: (message: MidiMessage, timestamp: number) => void): PortHandle {
    const handle = new FakeHandle(name, onMessage);
    this.opened.push(handle);
    return handle;
  }
}
