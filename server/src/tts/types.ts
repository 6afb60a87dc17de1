export const SYNTHESIS_MODES = ["lazy", "parallel", "batched"] as const;
export type SynthesisMode = (typeof SYNTHESIS_MODES)[number];

export const QUALITIES = ["x-low", "low", "medium", "high"] as const;
export type Quality = (typeof QUALITIES)[number];

export type SampleWidth = 1 | 2 | 4;

export type AudioInfo = {
  sampleRate: number;
  numChannels: number;
  sampleWidth: SampleWidth;
};

export type SpeakerSelector = string | number;

export type SynthesisOptions = {
  speaker?: SpeakerSelector;
  lengthScale: number;
  noiseScale: number;
  noiseW: number;
};

export type SynthesisOptionsOverride = Partial<SynthesisOptions>;

/** Options after defaults are merged and the speaker selector is resolved against the voice. */
export type ResolvedSynthesisOptions = {
  speaker: string;
  speakerId?: number;
  lengthScale: number;
  noiseScale: number;
  noiseW: number;
};

export type SpeechArgs = {
  rate: number;
  volume: number;
  pitch: number;
  appendedSilenceMs: number;
};

export const DEFAULT_SPEECH_ARGS: Readonly<SpeechArgs> = Object.freeze({
  rate: 50,
  volume: 100,
  pitch: 50,
  appendedSilenceMs: 0
});

export type Utterance = {
  voiceId: string;
  text: string;
  speechArgs: SpeechArgs;
  mode: SynthesisMode;
  synthesisOptions?: SynthesisOptionsOverride;
};

export type Voice = Readonly<{
  id: string;
  language: string;
  quality: Quality;
  speakers: ReadonlyMap<number, string>;
  audio: Readonly<AudioInfo>;
  defaultOptions: Readonly<SynthesisOptions>;
  supportsStreamingOutput: boolean;
}>;

/** Per-voice capabilities, resolved once when the voice is loaded. */
export type VoiceRuntimeConfig = Readonly<{
  concurrencySafe: boolean;
  supportsBatching: boolean;
}>;

export type SynthesisResult = {
  wavSamples: Buffer;
  rtf: number;
};

export type WaveSamples = {
  wavSamples: Buffer;
};

export type VersionInfo = {
  version: string;
};

export const FALLBACK_SPEAKER_NAME = "default";
