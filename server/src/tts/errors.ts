export type SynthesisErrorCode =
  | "VoiceNotFound"
  | "InvalidOptions"
  | "StreamingUnsupported"
  | "SegmentTooLarge"
  | "ModelFailure"
  | "ZeroDurationAudio"
  | "Cancelled";

export class SynthesisError extends Error {
  readonly code: SynthesisErrorCode;

  constructor(code: SynthesisErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = `${code}Error`;
    this.code = code;
  }
}

export class VoiceNotFoundError extends SynthesisError {
  constructor(voiceId: string, available: readonly string[] = []) {
    const suffix = available.length ? ` Available: ${available.join(", ")}` : "";
    super("VoiceNotFound", `Unknown voice: ${voiceId}.${suffix}`);
  }
}

export class InvalidOptionsError extends SynthesisError {
  constructor(message: string) {
    super("InvalidOptions", message);
  }
}

export class StreamingUnsupportedError extends SynthesisError {
  constructor(message: string) {
    super("StreamingUnsupported", message);
  }
}

export class SegmentTooLargeError extends SynthesisError {
  constructor(chars: number, limit: number) {
    super("SegmentTooLarge", `Segment of ${chars} chars exceeds the model limit of ${limit}`);
  }
}

export class ModelFailureError extends SynthesisError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ModelFailure", message, options);
  }
}

export class ZeroDurationAudioError extends SynthesisError {
  constructor() {
    super("ZeroDurationAudio", "Synthesis produced no audio");
  }
}

export class CancelledError extends SynthesisError {
  constructor() {
    super("Cancelled", "Synthesis cancelled");
  }
}

export function isSynthesisError(err: unknown): err is SynthesisError {
  return err instanceof SynthesisError;
}

export function throwIfCancelled(signal?: AbortSignal) {
  if (signal?.aborted) throw new CancelledError();
}

/**
 * Normalizes anything thrown below the scheduler. An error raised while the
 * request's signal is aborted is reported as a cancellation, whatever the model threw.
 */
export function toSynthesisError(err: unknown, signal?: AbortSignal): SynthesisError {
  if (err instanceof CancelledError) return err;
  if (signal?.aborted) return new CancelledError();
  if (err instanceof SynthesisError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new ModelFailureError(message || "model failed", { cause: err });
}
