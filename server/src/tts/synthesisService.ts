import crypto from "node:crypto";
import type { AuditEvent, AuditSink } from "../logging/audit.js";
import { applyVolume, RtfTracker, silence } from "./audio.js";
import {
  CancelledError,
  InvalidOptionsError,
  StreamingUnsupportedError,
  toSynthesisError,
  type SynthesisError
} from "./errors.js";
import type { SegmentAudio, SynthesisPlan, SynthesisScheduler } from "./scheduler.js";
import { segmentText } from "./textSegmenter.js";
import {
  SYNTHESIS_MODES,
  type AudioInfo,
  type SpeechArgs,
  type SynthesisMode,
  type SynthesisOptions,
  type SynthesisOptionsOverride,
  type SynthesisResult,
  type Utterance,
  type VersionInfo,
  type Voice,
  type WaveSamples
} from "./types.js";
import type { VoiceLoader } from "./voiceLoader.js";
import type { VoiceRegistry } from "./voiceRegistry.js";

export type SynthesisServiceOptions = {
  version: string;
  maxTextChars: number;
  maxAppendedSilenceMs?: number;
  loader?: VoiceLoader;
  audit?: AuditSink;
  requestId?: () => string;
};

type PreparedRequest = {
  requestId: string;
  utterance: Utterance;
  voice: Voice;
  plan: SynthesisPlan;
  streaming: boolean;
};

type StreamHooks = {
  onStart: () => void;
  onDone: (chunks: number, audioBytes: number, rtf: number) => void;
  onError: (error: SynthesisError, chunks: number) => void;
};

const SPEECH_ARG_RANGES = {
  rate: [0, 100],
  volume: [0, 100],
  pitch: [0, 100]
} as const;

const now = () => new Date().toISOString();

function isSynthesisMode(value: unknown): value is SynthesisMode {
  return SYNTHESIS_MODES.some((mode) => mode === value);
}

/**
 * Ordered chunk stream for one utterance. Iterate it once; `rtf` becomes
 * readable after the last chunk has been delivered.
 */
export class SynthesisStream implements AsyncIterable<WaveSamples> {
  private started = false;
  private delivered = 0;
  private rtfValue?: number;

  constructor(
    private readonly source: AsyncIterable<SegmentAudio>,
    readonly audio: AudioInfo,
    private readonly speechArgs: SpeechArgs,
    private readonly makeTracker: () => RtfTracker,
    private readonly hooks: StreamHooks,
    private readonly signal?: AbortSignal
  ) {}

  get chunks() {
    return this.delivered;
  }

  get completed() {
    return this.rtfValue !== undefined;
  }

  get rtf(): number {
    if (this.rtfValue === undefined) throw new Error("rtf is only available once the stream has completed");
    return this.rtfValue;
  }

  [Symbol.asyncIterator](): AsyncIterator<WaveSamples> {
    if (this.started) throw new Error("SynthesisStream can only be consumed once");
    this.started = true;
    return this.run();
  }

  private async *run(): AsyncGenerator<WaveSamples, void, undefined> {
    const tracker = this.makeTracker();
    let audioBytes = 0;
    let settled = false;
    this.hooks.onStart();
    try {
      for await (const segment of this.source) {
        tracker.record(segment.samples.length, segment.elapsedMs);
        let bytes = applyVolume(segment.samples, this.audio, this.speechArgs.volume);
        if (segment.final) {
          bytes = Buffer.concat([bytes, silence(this.speechArgs.appendedSilenceMs, this.audio)]);
        }
        audioBytes += bytes.length;
        this.delivered += 1;
        yield { wavSamples: bytes };
      }
      tracker.finish();
      const rtf = tracker.compute();
      this.rtfValue = rtf;
      settled = true;
      this.hooks.onDone(this.delivered, audioBytes, rtf);
    } catch (err) {
      const error = toSynthesisError(err, this.signal);
      settled = true;
      this.hooks.onError(error, this.delivered);
      throw error;
    } finally {
      // The consumer stopped iterating before the end.
      if (!settled) this.hooks.onError(new CancelledError(), this.delivered);
    }
  }
}

export class SynthesisService {
  private readonly opts: SynthesisServiceOptions;

  constructor(
    private readonly registry: VoiceRegistry,
    private readonly scheduler: SynthesisScheduler,
    opts: SynthesisServiceOptions
  ) {
    this.opts = opts;
  }

  getVersion(): VersionInfo {
    return { version: this.opts.version };
  }

  listVoices(): Voice[] {
    return this.registry.list();
  }

  getVoice(voiceId: string): Voice {
    return this.registry.get(voiceId).voice;
  }

  findVoiceByLanguage(language: string): Voice {
    return this.registry.findByLanguage(language);
  }

  async loadVoice(configPath: string): Promise<Voice> {
    const loader = this.opts.loader;
    if (!loader) throw new Error("Voice loading is not configured on this server");
    const loaded = await loader(configPath);
    const voice = this.registry.register(loaded.voice, loaded.runtime, loaded.engine);
    this.logEvent({
      type: "voice_load",
      at: now(),
      voiceId: voice.id,
      language: voice.language,
      quality: voice.quality,
      source: configPath
    });
    return voice;
  }

  unloadVoice(voiceId: string): void {
    const voice = this.registry.get(voiceId).voice;
    this.registry.unregister(voice.id);
    this.logEvent({ type: "voice_unload", at: now(), voiceId: voice.id });
  }

  getSynthesisOptions(voiceId: string): SynthesisOptions {
    return this.registry.getSynthesisOptions(voiceId);
  }

  setSynthesisOptions(voiceId: string, options: SynthesisOptionsOverride): SynthesisOptions {
    const voice = this.registry.setSynthesisOptions(voiceId, options);
    this.logEvent({ type: "voice_options", at: now(), voiceId: voice.id });
    return { ...voice.defaultOptions };
  }

  async synthesize(utterance: Utterance, signal?: AbortSignal): Promise<SynthesisResult> {
    const prepared = this.prepare(utterance, false);
    if (prepared.utterance.mode === "batched") return this.runBatched(prepared, signal);
    const stream = this.openStream(prepared, signal);
    const parts: Buffer[] = [];
    for await (const chunk of stream) parts.push(chunk.wavSamples);
    return { wavSamples: Buffer.concat(parts), rtf: stream.rtf };
  }

  /** Validation failures throw here, before any engine call is made. */
  synthesizeStreaming(utterance: Utterance, signal?: AbortSignal): SynthesisStream {
    return this.openStream(this.prepare(utterance, true), signal);
  }

  private prepare(utterance: Utterance, streaming: boolean): PreparedRequest {
    if (!isSynthesisMode(utterance.mode)) {
      throw new InvalidOptionsError(`synthesis mode must be one of ${SYNTHESIS_MODES.join(", ")}`);
    }
    const text = utterance.text.trim();
    if (!text) throw new InvalidOptionsError("text must not be empty");
    if (text.length > this.opts.maxTextChars) {
      throw new InvalidOptionsError(`text exceeds ${this.opts.maxTextChars} characters`);
    }
    this.validateSpeechArgs(utterance.speechArgs);

    const resolved = this.registry.resolve(utterance.voiceId, utterance.synthesisOptions);
    if (streaming) {
      if (utterance.mode === "batched") {
        throw new StreamingUnsupportedError("batched mode returns a single result and cannot stream");
      }
      if (!resolved.voice.supportsStreamingOutput) {
        throw new StreamingUnsupportedError(`Voice ${resolved.voice.id} does not support streaming output`);
      }
    }

    return {
      requestId: this.opts.requestId?.() ?? crypto.randomUUID(),
      utterance: { ...utterance, text },
      voice: resolved.voice,
      streaming,
      plan: {
        entry: resolved.entry,
        options: resolved.options,
        prosody: { rate: utterance.speechArgs.rate, pitch: utterance.speechArgs.pitch },
        segments: segmentText(text)
      }
    };
  }

  private validateSpeechArgs(args: SpeechArgs) {
    for (const name of ["rate", "volume", "pitch"] as const) {
      const [min, max] = SPEECH_ARG_RANGES[name];
      const value = args[name];
      if (!Number.isInteger(value) || value < min || value > max) {
        throw new InvalidOptionsError(`${name} must be an integer in [${min}, ${max}] (got ${value})`);
      }
    }
    const maxSilence = this.opts.maxAppendedSilenceMs ?? 10_000;
    const silenceMs = args.appendedSilenceMs;
    if (!Number.isInteger(silenceMs) || silenceMs < 0 || silenceMs > maxSilence) {
      throw new InvalidOptionsError(`appendedSilenceMs must be an integer in [0, ${maxSilence}] (got ${silenceMs})`);
    }
  }

  private openStream(prepared: PreparedRequest, signal?: AbortSignal): SynthesisStream {
    const { plan, voice, utterance } = prepared;
    const mode = utterance.mode;
    const source = mode === "parallel" ? this.scheduler.parallel(plan, signal) : this.scheduler.lazy(plan, signal);
    return new SynthesisStream(
      source,
      voice.audio,
      utterance.speechArgs,
      () => new RtfTracker(voice.audio, mode === "parallel" ? "span" : "sequential"),
      this.streamHooks(prepared),
      signal
    );
  }

  private async runBatched(prepared: PreparedRequest, signal?: AbortSignal): Promise<SynthesisResult> {
    const { plan, voice, utterance } = prepared;
    const hooks = this.streamHooks(prepared);
    hooks.onStart();
    try {
      const tracker = new RtfTracker(voice.audio, "sequential");
      const batch = await this.scheduler.batched(plan, signal);
      tracker.record(batch.samples.length, batch.elapsedMs);
      const rtf = tracker.compute();
      const wavSamples = Buffer.concat([
        applyVolume(batch.samples, voice.audio, utterance.speechArgs.volume),
        silence(utterance.speechArgs.appendedSilenceMs, voice.audio)
      ]);
      hooks.onDone(1, wavSamples.length, rtf);
      return { wavSamples, rtf };
    } catch (err) {
      const error = toSynthesisError(err);
      hooks.onError(error, 0);
      throw error;
    }
  }

  private streamHooks(prepared: PreparedRequest): StreamHooks {
    const base = {
      requestId: prepared.requestId,
      voiceId: prepared.voice.id,
      mode: prepared.utterance.mode,
      streaming: prepared.streaming
    };
    return {
      onStart: () =>
        this.logEvent({ ...base, type: "synth_start", at: now(), textChars: prepared.utterance.text.length }),
      onDone: (chunks, audioBytes, rtf) =>
        this.logEvent({ ...base, type: "synth_done", at: now(), chunks, audioBytes, rtf }),
      onError: (error, chunks) =>
        this.logEvent({
          ...base,
          at: now(),
          type: error.code === "Cancelled" ? "synth_cancel" : "synth_error",
          chunks,
          code: error.code,
          message: error.message
        })
    };
  }

  private logEvent(event: AuditEvent) {
    this.opts.audit?.(event);
  }
}
