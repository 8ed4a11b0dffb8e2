import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ManualClock } from '@pianolog/engine';
import type { MidiMessage } from '@pianolog/engine';
import { AlsaRawMidiSource, parseCards } from '../src/alsaSource';

const CARDS = [
  ' 0 [PCH            ]: HDA-Intel - HDA Intel PCH',
  '                      HDA Intel PCH at 0xf7f10000 irq 32',
  ' 1 [Piano          ]: USB-Audio - Digital Piano',
  '                      Digital Piano at usb-0000:00:14.0-2, full speed',
  '',
].join('\n');

async function waitFor(condition: () => boolean): Promise<void> {
  for (let i = 0; i < 400 && !condition(); i++) {
    await new Promise<void>(resolve => setTimeout(resolve, 5));
  }
}

describe('parseCards', () => {
  it('reads the long name of each card', () => {
    expect([...parseCards(CARDS)]).toEqual([
      [0, 'HDA Intel PCH'],
      [1, 'Digital Piano'],
    ]);
  });
});

describe('AlsaRawMidiSource', () => {
  let root: string;
  let devDir: string;
  let cardsFile: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'pianolog-alsa-'));
    devDir = root;
    cardsFile = join(root, 'cards');
    writeFileSync(cardsFile, CARDS);
    for (const name of ['midiC1D0', 'midiC0D0', 'pcmC0D0p', 'controlC0']) {
      writeFileSync(join(devDir, name), '');
    }
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('lists raw MIDI devices in card order with their card names', () => {
    const source = new AlsaRawMidiSource({ devDir, cardsFile });
    expect(source.list()).toEqual(['HDA Intel PCH (hw:0,0)', 'Digital Piano (hw:1,0)']);
  });

  it('falls back to the card number without a card list', () => {
    const source = new AlsaRawMidiSource({ devDir, cardsFile: join(root, 'missing') });
    expect(source.list()).toEqual(['Card 0 (hw:0,0)', 'Card 1 (hw:1,0)']);
  });

  it('lists nothing when the device directory is absent', () => {
    expect(new AlsaRawMidiSource({ devDir: join(root, 'snd'), cardsFile }).list()).toEqual([]);
  });

  it('maps a port name back to its device', () => {
    const source = new AlsaRawMidiSource({ devDir, cardsFile });
    expect(source.devicePath('Digital Piano (hw:1,0)')).toBe(join(devDir, 'midiC1D0'));
    expect(() => source.devicePath('Digital Piano')).toThrow('Not an ALSA raw MIDI port name: Digital Piano');
  });

  it('decodes the byte stream of an open port and stamps each message', async () => {
    // note on, running-status note on with velocity 0, timing clock
    writeFileSync(join(devDir, 'midiC1D0'), Buffer.from([0x90, 60, 100, 62, 0, 0xf8]));
    const source = new AlsaRawMidiSource({ devDir, cardsFile, clock: new ManualClock(3.5) });
    const received: Array<{ message: MidiMessage; timestamp: number }> = [];

    const handle = source.open('Digital Piano (hw:1,0)', (message, timestamp) => received.push({ message, timestamp }));
    await waitFor(() => handle.closed);

    expect(handle.closed).toBe(true);
    expect(received.map(r => [r.message.kind, r.message.note, r.message.velocity, r.timestamp])).toEqual([
      ['note_on', 60, 100, 3.5],
      ['note_on', 62, 0, 3.5],
      ['clock', undefined, undefined, 3.5],
    ]);
    expect(() => handle.close()).not.toThrow();
  });

  it('marks the handle closed when the device cannot be read', async () => {
    const source = new AlsaRawMidiSource({ devDir, cardsFile });
    const handle = source.open('Gone (hw:7,0)', () => undefined);
    await waitFor(() => handle.closed);
    expect(handle.closed).toBe(true);
  });
});
