/**
 * ALSA raw MIDI input.
 *
 * Ports are the character devices `/dev/snd/midiC<card>D<device>`, named after
 * their card in `/proc/asound/cards`, e.g. `Digital Piano (hw:1,0)`. An open
 * port is read as a byte stream and decoded by the engine's stream parser;
 * each message is stamped with the monotonic clock as it is decoded.
 */
import { createReadStream, existsSync, readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import { MidiStreamParser, monotonicClock } from '@pianolog/engine';
import type { Clock, MidiMessage } from '@pianolog/engine';
import { createLogger } from '@pianolog/engine/util/logger';
import type { EventSource, PortHandle } from './portMonitor.js';

const log = createLogger('alsa');

const DEVICE_RE = /^midiC(\d+)D(\d+)$/;
const PORT_NAME_RE = /\(hw:(\d+),(\d+)\)$/;
const CARD_LINE_RE = /^\s*(\d+)\s+\[([^\]]*)\]:\s*(.*)$/;

export interface AlsaSourceOptions {
  /** Directory holding the midiC*D* devices. */
  devDir?: string;
  /** Card list in the /proc/asound/cards format. */
  cardsFile?: string;
  clock?: Clock;
}

/** Card number -> human readable name. */
export function parseCards(source: string): Map<number, string> {
  const cards = new Map<number, string>();
  for (const line of source.split('\n')) {
    const m = CARD_LINE_RE.exec(line);
    if (!m) continue;
    // "USB-Audio - Digital Piano": the part after the driver is the long name
    const description = m[3];
    const dash = description.indexOf(' - ');
    const name = dash >= 0 ? description.slice(dash + 3).trim() : m[2].trim();
    cards.set(Number(m[1]), name || m[2].trim());
  }
  return cards;
}

export class AlsaRawMidiSource implements EventSource {
  private readonly devDir: string;
  private readonly cardsFile: string;
  private readonly clock: Clock;

  constructor(opts: AlsaSourceOptions = {}) {
    this.devDir = opts.devDir ?? '/dev/snd';
    this.cardsFile = opts.cardsFile ?? '/proc/asound/cards';
    this.clock = opts.clock ?? monotonicClock;
  }

  list(): string[] {
    if (!existsSync(this.devDir)) return [];
    const cards = existsSync(this.cardsFile) ? parseCards(readFileSync(this.cardsFile, 'utf8')) : new Map<number, string>();

    const ports: Array<{ card: number; device: number; name: string }> = [];
    for (const entry of readdirSync(this.devDir)) {
      const m = DEVICE_RE.exec(entry);
      if (!m) continue;
      const card = Number(m[1]);
      const device = Number(m[2]);
      const cardName = cards.get(card) ?? `Card ${card}`;
      ports.push({ card, device, name: `${cardName} (hw:${card},${device})` });
    }
    ports.sort((a, b) => a.card - b.card || a.device - b.device);
    return ports.map(p => p.name);
  }

  /** Device file behind a port name returned by {@link list}. */
  devicePath(name: string): string {
    const m = PORT_NAME_RE.exec(name);
    if (!m) throw new Error(`Not an ALSA raw MIDI port name: ${name}`);
    return join(this.devDir, `midiC${m[1]}D${m[2]}`);
  }

  open(name: string, onMessage: (message: MidiMessage, timestamp: number) => void): PortHandle {
    const path = this.devicePath(name);
    const parser = new MidiStreamParser(message => onMessage(message, this.clock.now()));
    const stream = createReadStream(path, { highWaterMark: 256 });
    let closed = false;

    stream.on('data', chunk => {
      parser.feed(typeof chunk === 'string' ? Buffer.from(chunk, 'latin1') : chunk);
    });
    stream.on('error', err => {
      closed = true;
      log.warn(`Read error on ${name}:`, err.message);
    });
    stream.on('close', () => {
      closed = true;
      if (parser.droppedBytes > 0) log.debug(`${name}: ${parser.droppedBytes} stray byte(s) dropped`);
    });
    log.debug(`Opened ${path}`);

    return {
      name,
      get closed() {
        return closed;
      },
      close: () => {
        if (closed) return;
        closed = true;
        stream.destroy();
      },
    };
  }
}
