import type { Diagnostic } from '../core/diagnostics.js';
import { ConfigError, MissingVoiceError } from '../core/errors.js';
import type { Event } from '../core/event.js';
import { DEFAULT_RESOLUTION, DEFAULT_TEMPO, type IngestedScore } from '../core/score.js';
import { minVoiceLength } from './build.js';

/** Voice selection for `aggregateVoices`. */
export interface AggregateOptions {
  voices: readonly string[];
  /** Restrict lookup to instruments with this part name or id. */
  instrument?: string;
}

export interface AggregatedVoice {
  id: string;
  events: readonly Event[];
}

/** Merged corpus: one concatenated stream per selected voice. */
export interface AggregatedCorpus {
  voices: AggregatedVoice[];
  /** Shortest merged voice length; the synchronized time axis. */
  alignedLength: number;
  resolution: number;
  tempo: number;
  diagnostics: Diagnostic[];
}

/**
 * Events of `voiceId` in one score, concatenated across matching instruments in
 * score order. `undefined` when no matching instrument carries the voice.
 */
export function lookupVoice(score: IngestedScore, voiceId: string, instrument?: string): Event[] | undefined {
  let events: Event[] | undefined;
  for (const streams of score.instruments) {
    if (instrument !== undefined && streams.name !== instrument && streams.id !== instrument) {
      continue;
    }
    const voice = streams.voices.get(voiceId);
    if (voice) {
      events = [...(events ?? []), ...voice];
    }
  }
  return events;
}

/**
 * Concatenate each selected voice across `scores`, in the order supplied.
 *
 * A voice missing from some scores is skipped there with a warning. A voice
 * missing from all of them throws `MissingVoiceError`. Tick resolution and
 * tempo are taken from the first score.
 */
export function aggregateVoices(scores: readonly IngestedScore[], options: AggregateOptions): AggregatedCorpus {
  if (scores.length === 0) {
    throw new ConfigError('At least one score is required to aggregate voices.');
  }
  if (options.voices.length === 0) {
    throw new ConfigError('At least one voice must be selected.');
  }
  if (new Set(options.voices).size !== options.voices.length) {
    throw new ConfigError(`Voice selection contains duplicates: ${options.voices.join(', ')}.`);
  }

  const diagnostics: Diagnostic[] = [];
  const voices: AggregatedVoice[] = options.voices.map((id) => {
    const events: Event[] = [];
    let found = false;

    scores.forEach((score, index) => {
      const stream = lookupVoice(score, id, options.instrument);
      if (!stream) {
        diagnostics.push({
          code: 'VOICE_MISSING_IN_SCORE',
          severity: 'warning',
          message: `Voice '${id}' is missing in score ${describeScore(score, index)}; skipping it there.`
        });
        return;
      }
      found = true;
      events.push(...stream);
    });

    if (!found) {
      throw new MissingVoiceError(id, scores.length);
    }
    return { id, events };
  });

  const alignedLength = minVoiceLength(voices.map((voice) => voice.events));
  const discarded = voices.reduce((total, voice) => total + voice.events.length - alignedLength, 0);
  if (discarded > 0) {
    diagnostics.push({
      code: 'VOICES_TRUNCATED',
      severity: 'info',
      message: `Voices are aligned to ${alignedLength} step(s); ${discarded} trailing event(s) are ignored.`
    });
  }

  const first = scores[0];
  return {
    voices,
    alignedLength,
    resolution: first?.resolution ?? DEFAULT_RESOLUTION,
    tempo: first?.tempo ?? DEFAULT_TEMPO,
    diagnostics
  };
}

/** Event streams cut to the shared length, in selection order. */
export function alignVoices(corpus: AggregatedCorpus): Event[][] {
  return corpus.voices.map((voice) => voice.events.slice(0, corpus.alignedLength));
}

function describeScore(score: IngestedScore, index: number): string {
  return score.sourceName ? `'${score.sourceName}'` : `#${index + 1}`;
}
