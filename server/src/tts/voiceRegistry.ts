import { InvalidOptionsError, VoiceNotFoundError } from "./errors.js";
import { Mutex } from "./mutex.js";
import type { TtsEngine } from "./ttsEngine.js";
import {
  FALLBACK_SPEAKER_NAME,
  type ResolvedSynthesisOptions,
  type SpeakerSelector,
  type SynthesisOptions,
  type SynthesisOptionsOverride,
  type Voice,
  type VoiceRuntimeConfig
} from "./types.js";

export const OPTION_BOUNDS = {
  lengthScale: { min: 0, max: 10, exclusiveMin: true },
  noiseScale: { min: 0, max: 10, exclusiveMin: false },
  noiseW: { min: 0, max: 10, exclusiveMin: false }
} as const;

type ScaleName = keyof typeof OPTION_BOUNDS;
const SCALE_NAMES: readonly ScaleName[] = ["lengthScale", "noiseScale", "noiseW"];

export type VoiceEntry = Readonly<{
  voice: Voice;
  runtime: VoiceRuntimeConfig;
  engine: TtsEngine;
  /** Serializes engine calls for voices that are not concurrency-safe. */
  mutex: Mutex;
}>;

export type ResolvedVoice = {
  entry: VoiceEntry;
  voice: Voice;
  options: ResolvedSynthesisOptions;
};

export function validateOptionsOverride(override: SynthesisOptionsOverride) {
  for (const name of SCALE_NAMES) {
    const value = override[name];
    if (value === undefined) continue;
    const bounds = OPTION_BOUNDS[name];
    const tooLow = bounds.exclusiveMin ? value <= bounds.min : value < bounds.min;
    if (!Number.isFinite(value) || tooLow || value > bounds.max) {
      const lower = bounds.exclusiveMin ? `> ${bounds.min}` : `>= ${bounds.min}`;
      throw new InvalidOptionsError(`${name} must be ${lower} and <= ${bounds.max} (got ${value})`);
    }
  }
  const speaker = override.speaker;
  if (typeof speaker === "number" && (!Number.isInteger(speaker) || speaker < 0)) {
    throw new InvalidOptionsError(`speaker index must be a non-negative integer (got ${speaker})`);
  }
}

function resolveSpeaker(voice: Voice, selector: SpeakerSelector | undefined): { speaker: string; speakerId?: number } {
  const speakers = [...voice.speakers.entries()].sort(([a], [b]) => a - b);
  const first = speakers[0];
  if (!first) {
    if (selector === undefined || selector === FALLBACK_SPEAKER_NAME || selector === 0) {
      return { speaker: FALLBACK_SPEAKER_NAME };
    }
    throw new InvalidOptionsError(`Voice ${voice.id} has a single speaker; got speaker ${selector}`);
  }
  if (selector === undefined || selector === FALLBACK_SPEAKER_NAME) {
    return { speaker: first[1], speakerId: first[0] };
  }
  if (typeof selector === "number") {
    const name = voice.speakers.get(selector);
    if (name === undefined) throw new InvalidOptionsError(`Voice ${voice.id} has no speaker #${selector}`);
    return { speaker: name, speakerId: selector };
  }
  const match = speakers.find(([, name]) => name === selector);
  if (!match) throw new InvalidOptionsError(`Voice ${voice.id} has no speaker named '${selector}'`);
  return { speaker: match[1], speakerId: match[0] };
}

function normalizeLanguage(lang: string) {
  return lang.trim().replace(/-/g, "_").toLowerCase();
}

function freezeVoice(voice: Voice): Voice {
  return Object.freeze({
    ...voice,
    speakers: new Map(voice.speakers),
    audio: Object.freeze({ ...voice.audio }),
    defaultOptions: Object.freeze({ ...voice.defaultOptions })
  });
}

/**
 * Loaded voices in registration order. Entries are immutable snapshots:
 * changing a voice's defaults swaps in a new snapshot and never mutates one
 * that an in-flight request may still hold.
 */
export class VoiceRegistry {
  private readonly entries = new Map<string, VoiceEntry>();

  register(voice: Voice, runtime: VoiceRuntimeConfig, engine: TtsEngine): Voice {
    validateOptionsOverride(voice.defaultOptions);
    if (voice.audio.sampleRate <= 0 || voice.audio.numChannels <= 0) {
      throw new InvalidOptionsError(`Voice ${voice.id} has an invalid audio format`);
    }
    const frozen = freezeVoice(voice);
    resolveSpeaker(frozen, frozen.defaultOptions.speaker);
    const existing = this.entries.get(voice.id);
    this.entries.set(voice.id, Object.freeze({
      voice: frozen,
      runtime: Object.freeze({ ...runtime }),
      engine,
      mutex: existing?.engine === engine ? existing.mutex : new Mutex()
    }));
    return frozen;
  }

  unregister(voiceId: string): boolean {
    return this.entries.delete(voiceId);
  }

  has(voiceId: string) {
    return this.entries.has(voiceId);
  }

  list(): Voice[] {
    return [...this.entries.values()].map((entry) => entry.voice);
  }

  get(voiceId: string): VoiceEntry {
    const entry = this.entries.get(voiceId);
    if (!entry) throw new VoiceNotFoundError(voiceId, [...this.entries.keys()]);
    return entry;
  }

  resolve(voiceId: string, override: SynthesisOptionsOverride = {}): ResolvedVoice {
    const entry = this.get(voiceId);
    validateOptionsOverride(override);
    const defaults = entry.voice.defaultOptions;
    const speaker = resolveSpeaker(entry.voice, override.speaker ?? defaults.speaker);
    return {
      entry,
      voice: entry.voice,
      options: {
        ...speaker,
        lengthScale: override.lengthScale ?? defaults.lengthScale,
        noiseScale: override.noiseScale ?? defaults.noiseScale,
        noiseW: override.noiseW ?? defaults.noiseW
      }
    };
  }

  /** Exact language match first, then the first voice sharing the primary subtag. */
  findByLanguage(language: string): Voice {
    const wanted = normalizeLanguage(language);
    const primary = `${wanted.split("_")[0]}_`;
    const voices = this.list();
    const exact = voices.find((voice) => normalizeLanguage(voice.language) === wanted);
    if (exact) return exact;
    const close = voices.find((voice) => {
      const lang = normalizeLanguage(voice.language);
      return lang === primary.slice(0, -1) || lang.startsWith(primary);
    });
    if (close) return close;
    throw new VoiceNotFoundError(`language:${language}`);
  }

  getSynthesisOptions(voiceId: string): SynthesisOptions {
    return { ...this.get(voiceId).voice.defaultOptions };
  }

  setSynthesisOptions(voiceId: string, override: SynthesisOptionsOverride): Voice {
    const entry = this.get(voiceId);
    validateOptionsOverride(override);
    const defaults = entry.voice.defaultOptions;
    const next: SynthesisOptions = {
      speaker: override.speaker ?? defaults.speaker,
      lengthScale: override.lengthScale ?? defaults.lengthScale,
      noiseScale: override.noiseScale ?? defaults.noiseScale,
      noiseW: override.noiseW ?? defaults.noiseW
    };
    return this.register({ ...entry.voice, defaultOptions: next }, entry.runtime, entry.engine);
  }
}
