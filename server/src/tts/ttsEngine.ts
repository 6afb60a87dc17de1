import type { AudioInfo, ResolvedSynthesisOptions } from "./types.js";

export type Prosody = {
  rate: number;
  pitch: number;
};

export type SegmentRequest = {
  voiceId: string;
  text: string;
  options: ResolvedSynthesisOptions;
  prosody: Prosody;
};

export type BatchRequest = Omit<SegmentRequest, "text"> & {
  segments: string[];
};

export type ModelOutput = {
  samples: Buffer;
  audio: AudioInfo;
  /** Wall-clock time the inference took, as measured by the engine. */
  elapsedMs: number;
};

/**
 * Inference capability behind one or more voices. `synthesizeBatch` is only
 * called for voices whose runtime config reports batching support.
 */
export interface TtsEngine {
  readonly name: string;
  synthesize(req: SegmentRequest, signal?: AbortSignal): Promise<ModelOutput>;
  synthesizeBatch?(req: BatchRequest, signal?: AbortSignal): Promise<ModelOutput>;
}
