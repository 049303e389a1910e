import type { Event } from './event.js';

/** Default tick resolution (`<divisions>` per quarter) when a score declares none. */
export const DEFAULT_RESOLUTION = 1;

/** Default tempo in quarter-note beats per minute when no `<sound tempo>` is present. */
export const DEFAULT_TEMPO = 120;

/** How notes of a part are grouped into voice streams. */
export type VoiceKey = 'staff' | 'voice';

/** Event streams of one `<part>`, keyed by staff (or `<voice>`) number. */
export interface InstrumentStreams {
  id: string;
  /** Part name from `<part-list>`, falling back to the part id. */
  name: string;
  voices: ReadonlyMap<string, readonly Event[]>;
}

/** Score ingestion output consumed by corpus aggregation. */
export interface IngestedScore {
  sourceName?: string;
  /** Ticks per quarter note (first `<divisions>` seen). */
  resolution: number;
  /** Beats per minute (first `<sound tempo>` seen). */
  tempo: number;
  instruments: InstrumentStreams[];
}

/** Voice ids of every instrument, in first-seen order and without duplicates. */
export function listVoiceIds(score: IngestedScore): string[] {
  const ids = new Set<string>();
  for (const instrument of score.instruments) {
    for (const id of instrument.voices.keys()) {
      ids.add(id);
    }
  }
  return [...ids];
}
