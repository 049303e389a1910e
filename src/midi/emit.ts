import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import midiPackage from '@tonejs/midi';
import type { Midi as MidiFile } from '@tonejs/midi';

import { ConfigError } from '../core/errors.js';
import type { Event, EventGroup } from '../core/event.js';
import { noteToMidiNumber } from '../core/note.js';
import { resolveInstrument, type InstrumentSound } from './gm-programs.js';

// The package is CommonJS; its named export is reached through the default import.
const { Midi } = midiPackage;

export const DEFAULT_INSTRUMENT = 'piano';
export const DEFAULT_VELOCITY = 127;
const PERCUSSION_CHANNEL = 9;
const CHANNEL_COUNT = 16;

export interface MidiRenderOptions {
  /** Ticks per quarter note of the event durations. */
  resolution: number;
  /** Quarter-note beats per minute. */
  tempo: number;
  /** One tag for every voice, or one per voice. Defaults to `piano`. */
  instruments?: string | readonly string[];
  /** Note-on velocity 0..127. */
  velocity?: number;
}

interface VoiceTrack {
  tag: string;
  sound: InstrumentSound;
  channel: number;
}

/**
 * Render a composition as a Standard MIDI File with one track per voice.
 *
 * Each event lasts its `duration` when present, else `type × resolution`
 * ticks, rescaled to the file's PPQ. Rests only move the cursor, so runs of
 * rests add up to the delay before the next sounding event.
 */
export function compositionToMidi(
  composition: readonly EventGroup[] | readonly Event[],
  options: MidiRenderOptions
): Uint8Array {
  const groups = toGroups(composition);
  const voiceCount = validateShape(groups);
  validateTiming(options);

  const velocity = options.velocity ?? DEFAULT_VELOCITY;
  if (!Number.isInteger(velocity) || velocity < 0 || velocity > 127) {
    throw new ConfigError(`Velocity must be an integer in 0..127, got ${velocity}.`);
  }

  const voices = assignChannels(instrumentTags(options.instruments, voiceCount));
  const midi: MidiFile = new Midi();
  midi.header.setTempo(options.tempo);
  const scale = midi.header.ppq / options.resolution;

  voices.forEach((voice, index) => {
    const track = midi.addTrack();
    track.name = voice.tag;
    track.channel = voice.channel;
    track.instrument.number = voice.sound.program;

    let cursor = 0;
    for (const group of groups) {
      const event = group[index];
      if (!event) {
        continue;
      }
      const length = eventTicks(event, options.resolution);
      const start = Math.round(cursor * scale);
      const durationTicks = Math.round((cursor + length) * scale) - start;

      for (const note of event.notes) {
        const pitch = noteToMidiNumber(note);
        if (pitch !== undefined && durationTicks > 0) {
          track.addNote({ midi: pitch, ticks: start, durationTicks, velocity: velocity / 127 });
        }
      }
      cursor += length;
    }
  });

  return midi.toArray();
}

/** Render and write a composition, creating parent directories. */
export async function writeCompositionMidi(
  filePath: string,
  composition: readonly EventGroup[] | readonly Event[],
  options: MidiRenderOptions
): Promise<void> {
  const bytes = compositionToMidi(composition, options);
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, bytes);
}

/** Length of an event in source ticks. */
export function eventTicks(event: Event, resolution: number): number {
  return event.duration ?? (event.type.numerator / event.type.denominator) * resolution;
}

function toGroups(composition: readonly EventGroup[] | readonly Event[]): EventGroup[] {
  const items: readonly (Event | EventGroup)[] = composition;
  return items.map((item) => ('notes' in item ? [item] : item));
}

function validateShape(groups: readonly EventGroup[]): number {
  const first = groups[0];
  if (!first) {
    throw new ConfigError('Cannot write MIDI for an empty event list.');
  }
  if (first.length === 0) {
    throw new ConfigError('Each time step needs at least one voice.');
  }

  groups.forEach((group, step) => {
    if (group.length !== first.length) {
      throw new ConfigError(`Time step ${step} has ${group.length} voice(s); expected ${first.length}.`);
    }
  });
  return first.length;
}

function validateTiming(options: MidiRenderOptions): void {
  if (!Number.isFinite(options.resolution) || options.resolution <= 0) {
    throw new ConfigError(`Resolution must be positive, got ${options.resolution}.`);
  }
  if (!Number.isFinite(options.tempo) || options.tempo <= 0) {
    throw new ConfigError(`Tempo must be positive, got ${options.tempo}.`);
  }
}

function instrumentTags(instruments: string | readonly string[] | undefined, voiceCount: number): string[] {
  if (instruments === undefined || typeof instruments === 'string') {
    const tag = instruments ?? DEFAULT_INSTRUMENT;
    return Array.from({ length: voiceCount }, () => tag);
  }
  if (instruments.length !== voiceCount) {
    throw new ConfigError(`Got ${instruments.length} instrument(s) for ${voiceCount} voice(s).`);
  }
  return [...instruments];
}

/** Percussion goes to channel 10; melodic voices take channels in order, skipping it. */
function assignChannels(tags: readonly string[]): VoiceTrack[] {
  let nextMelodic = 0;
  return tags.map((tag) => {
    const sound = resolveInstrument(tag);
    if (!sound) {
      throw new ConfigError(`Unknown General MIDI instrument '${tag}'.`);
    }
    if (sound.percussion) {
      return { tag, sound, channel: PERCUSSION_CHANNEL };
    }

    if (nextMelodic === PERCUSSION_CHANNEL) {
      nextMelodic += 1;
    }
    if (nextMelodic >= CHANNEL_COUNT) {
      throw new ConfigError(`At most ${CHANNEL_COUNT - 1} melodic voices fit in one MIDI file.`);
    }
    const channel = nextMelodic;
    nextMelodic += 1;
    return { tag, sound, channel };
  });
}
