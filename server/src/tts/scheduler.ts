import { sameAudioInfo } from "./audio.js";
import { BoundedChannel } from "./channel.js";
import {
  CancelledError,
  ModelFailureError,
  throwIfCancelled,
  toSynthesisError,
  type SynthesisError
} from "./errors.js";
import type { TextSegment } from "./textSegmenter.js";
import type { ModelOutput, Prosody } from "./ttsEngine.js";
import type { ResolvedSynthesisOptions } from "./types.js";
import type { VoiceEntry } from "./voiceRegistry.js";

export type SynthesisPlan = {
  entry: VoiceEntry;
  options: ResolvedSynthesisOptions;
  prosody: Prosody;
  segments: Iterable<TextSegment>;
};

export type SegmentAudio = {
  index: number;
  samples: Buffer;
  elapsedMs: number;
  /** Set on the last segment of the utterance. */
  final: boolean;
};

export type BatchAudio = {
  samples: Buffer;
  elapsedMs: number;
  segmentCount: number;
};

export type SchedulerOptions = {
  maxConcurrentInferences: number;
  streamBufferChunks: number;
};

type SlotResult = { ok: true; audio: Omit<SegmentAudio, "final"> } | { ok: false; error: SynthesisError };

type Slot = {
  promise: Promise<SlotResult>;
  resolve: (result: SlotResult) => void;
};

function createSlot(): Slot {
  let resolve: (result: SlotResult) => void = () => {};
  const promise = new Promise<SlotResult>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

/**
 * Dispatches the segments of one utterance to the voice's engine. All three
 * strategies yield the same bytes in the same order; they differ in how much
 * work is in flight and when audio becomes visible to the caller.
 */
export class SynthesisScheduler {
  private readonly opts: SchedulerOptions;

  constructor(opts: SchedulerOptions) {
    if (opts.maxConcurrentInferences < 1) throw new Error("maxConcurrentInferences must be >= 1");
    this.opts = opts;
  }

  /**
   * One segment at a time, driven by the consumer: the next segment is not
   * started until the previous chunk has been taken.
   */
  async *lazy(plan: SynthesisPlan, signal?: AbortSignal): AsyncGenerator<SegmentAudio, void, undefined> {
    const iterator = plan.segments[Symbol.iterator]();
    let next = iterator.next();
    while (!next.done) {
      throwIfCancelled(signal);
      const audio = await this.invoke(plan, next.value, signal);
      next = iterator.next();
      throwIfCancelled(signal);
      yield { ...audio, final: Boolean(next.done) };
    }
  }

  /**
   * Fans every segment out to a bounded worker pool and releases finished
   * audio strictly in segment order through a bounded channel.
   */
  parallel(plan: SynthesisPlan, signal?: AbortSignal): AsyncIterable<SegmentAudio> {
    return {
      [Symbol.asyncIterator]: () => this.runParallel(plan, signal)
    };
  }

  /**
   * A single engine call covering every segment, or a sequential pass when the
   * voice cannot batch. Once the call has started it runs to completion.
   */
  async batched(plan: SynthesisPlan, signal?: AbortSignal): Promise<BatchAudio> {
    throwIfCancelled(signal);
    const segments = Array.from(plan.segments);
    const { entry } = plan;
    const batch = entry.engine.synthesizeBatch?.bind(entry.engine);
    if (entry.runtime.supportsBatching && batch) {
      const output = await this.exclusive(plan, () =>
        this.timed(plan, () =>
          batch({
            voiceId: entry.voice.id,
            segments: segments.map((segment) => segment.text),
            options: plan.options,
            prosody: plan.prosody
          })
        )
      );
      return { samples: output.samples, elapsedMs: output.elapsedMs, segmentCount: segments.length };
    }
    const parts: Buffer[] = [];
    let elapsedMs = 0;
    for (const segment of segments) {
      const audio = await this.invoke(plan, segment);
      parts.push(audio.samples);
      elapsedMs += audio.elapsedMs;
    }
    return { samples: Buffer.concat(parts), elapsedMs, segmentCount: segments.length };
  }

  private async *runParallel(plan: SynthesisPlan, signal?: AbortSignal): AsyncGenerator<SegmentAudio, void, undefined> {
    throwIfCancelled(signal);
    const segments = Array.from(plan.segments);
    const controller = new AbortController();
    const channel = new BoundedChannel<SegmentAudio>(this.opts.streamBufferChunks);
    const onAbort = () => {
      controller.abort();
      channel.fail(new CancelledError(), { discard: true });
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    void this.pump(plan, segments, channel, controller);

    let completed = false;
    try {
      for await (const audio of channel) {
        throwIfCancelled(signal);
        yield audio;
      }
      completed = true;
    } finally {
      signal?.removeEventListener("abort", onAbort);
      if (!completed) {
        controller.abort();
        channel.fail(new CancelledError(), { discard: true });
      }
    }
  }

  private async pump(
    plan: SynthesisPlan,
    segments: TextSegment[],
    channel: BoundedChannel<SegmentAudio>,
    controller: AbortController
  ): Promise<void> {
    const signal = controller.signal;
    const slots = segments.map(() => createSlot());
    let cursor = 0;

    const worker = async () => {
      while (cursor < segments.length) {
        const index = cursor++;
        const slot = slots[index];
        const segment = segments[index];
        if (!slot || !segment) continue;
        if (signal.aborted) {
          slot.resolve({ ok: false, error: new CancelledError() });
          continue;
        }
        try {
          slot.resolve({ ok: true, audio: await this.invoke(plan, segment, signal) });
        } catch (err) {
          slot.resolve({ ok: false, error: toSynthesisError(err, signal) });
        }
      }
    };

    const poolSize = Math.min(this.opts.maxConcurrentInferences, segments.length);
    const workers = Array.from({ length: poolSize }, () => worker());

    try {
      for (const [index, slot] of slots.entries()) {
        const result = await slot.promise;
        if (!result.ok) throw result.error;
        const delivered = await channel.send({ ...result.audio, final: index === slots.length - 1 });
        if (!delivered) break;
      }
      channel.close();
    } catch (err) {
      controller.abort();
      channel.fail(toSynthesisError(err));
    }
    await Promise.allSettled(workers);
  }

  private async invoke(
    plan: SynthesisPlan,
    segment: TextSegment,
    signal?: AbortSignal
  ): Promise<Omit<SegmentAudio, "final">> {
    const { entry } = plan;
    let output: ModelOutput;
    try {
      output = await this.exclusive(plan, () => {
        throwIfCancelled(signal);
        return this.timed(plan, () =>
          entry.engine.synthesize(
            {
              voiceId: entry.voice.id,
              text: segment.text,
              options: plan.options,
              prosody: plan.prosody
            },
            signal
          )
        );
      });
    } catch (err) {
      throw toSynthesisError(err, signal);
    }
    return { index: segment.index, samples: output.samples, elapsedMs: output.elapsedMs };
  }

  private exclusive<T>(plan: SynthesisPlan, fn: () => Promise<T>): Promise<T> {
    if (plan.entry.runtime.concurrencySafe) return fn();
    return plan.entry.mutex.runExclusive(fn);
  }

  /** Validates the output format and falls back to our own clock when the engine reports no duration. */
  private async timed(plan: SynthesisPlan, call: () => Promise<ModelOutput>): Promise<ModelOutput> {
    const startedAt = performance.now();
    const output = await call();
    const measured = performance.now() - startedAt;
    assertVoiceFormat(plan.entry, output);
    return { ...output, elapsedMs: output.elapsedMs > 0 ? output.elapsedMs : measured };
  }
}

export function assertVoiceFormat(entry: VoiceEntry, output: ModelOutput) {
  if (!sameAudioInfo(entry.voice.audio, output.audio)) {
    const got = output.audio;
    throw new ModelFailureError(
      `Engine returned ${got.sampleRate}Hz/${got.numChannels}ch/${got.sampleWidth}B audio for voice ${entry.voice.id}`
    );
  }
  if (output.samples.length % entry.voice.audio.sampleWidth !== 0) {
    throw new ModelFailureError(`Engine returned a partial sample for voice ${entry.voice.id}`);
  }
}
