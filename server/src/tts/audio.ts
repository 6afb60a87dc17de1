import { ZeroDurationAudioError } from "./errors.js";
import type { AudioInfo } from "./types.js";

export function sameAudioInfo(a: AudioInfo, b: AudioInfo) {
  return a.sampleRate === b.sampleRate && a.numChannels === b.numChannels && a.sampleWidth === b.sampleWidth;
}

export function frameBytes(audio: AudioInfo) {
  return audio.numChannels * audio.sampleWidth;
}

/** Total samples across all channels. */
export function sampleCount(byteLength: number, audio: AudioInfo) {
  return Math.floor(byteLength / audio.sampleWidth);
}

export function audioDurationSeconds(byteLength: number, audio: AudioInfo) {
  return sampleCount(byteLength, audio) / (audio.sampleRate * audio.numChannels);
}

export function silence(ms: number, audio: AudioInfo): Buffer {
  if (!(ms > 0)) return Buffer.alloc(0);
  const frames = Math.round((ms / 1000) * audio.sampleRate);
  // 8-bit PCM is unsigned; its zero level is 0x80.
  return Buffer.alloc(frames * frameBytes(audio), audio.sampleWidth === 1 ? 0x80 : 0);
}

/**
 * Scales every sample by `volume / 100`, clipping at the format's range.
 * Returns the input untouched at full volume.
 */
export function applyVolume(samples: Buffer, audio: AudioInfo, volume: number): Buffer {
  if (volume === 100) return samples;
  const gain = Math.max(0, volume) / 100;
  const out = Buffer.alloc(samples.length - (samples.length % audio.sampleWidth));
  switch (audio.sampleWidth) {
    case 1:
      for (let i = 0; i < out.length; i += 1) {
        const centered = (samples.readUInt8(i) - 128) * gain;
        out.writeUInt8(clamp(Math.round(centered), -128, 127) + 128, i);
      }
      break;
    case 2:
      for (let i = 0; i < out.length; i += 2) {
        out.writeInt16LE(clamp(Math.round(samples.readInt16LE(i) * gain), -32_768, 32_767), i);
      }
      break;
    case 4:
      for (let i = 0; i < out.length; i += 4) {
        out.writeInt32LE(clamp(Math.round(samples.readInt32LE(i) * gain), -2_147_483_648, 2_147_483_647), i);
      }
      break;
  }
  return out;
}

function clamp(value: number, min: number, max: number) {
  return Math.min(max, Math.max(min, value));
}

export type TimingStrategy = "sequential" | "span";

/**
 * Accumulates produced audio and synthesis time for one request.
 * `sequential` sums the per-call durations reported by the model;
 * `span` measures the wall clock from construction to `finish()`, which is
 * what overlapping (parallel) work should be judged by.
 */
export class RtfTracker {
  private audioBytes = 0;
  private sequentialMs = 0;
  private readonly startedAt: number;
  private finishedAt?: number;

  constructor(
    private readonly audio: AudioInfo,
    private readonly timing: TimingStrategy,
    private readonly now: () => number = () => performance.now()
  ) {
    this.startedAt = now();
  }

  record(byteLength: number, elapsedMs: number) {
    this.audioBytes += byteLength;
    this.sequentialMs += elapsedMs;
  }

  finish() {
    if (this.finishedAt === undefined) this.finishedAt = this.now();
  }

  get synthesisSeconds() {
    if (this.timing === "sequential") return this.sequentialMs / 1000;
    const end = this.finishedAt ?? this.now();
    return (end - this.startedAt) / 1000;
  }

  get audioSeconds() {
    return audioDurationSeconds(this.audioBytes, this.audio);
  }

  compute(): number {
    const audioSeconds = this.audioSeconds;
    if (audioSeconds === 0) throw new ZeroDurationAudioError();
    return this.synthesisSeconds / audioSeconds;
  }
}
