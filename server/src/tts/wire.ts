import { z } from "zod";
import { InvalidOptionsError, type SynthesisErrorCode } from "./errors.js";
import {
  DEFAULT_SPEECH_ARGS,
  SYNTHESIS_MODES,
  type Quality,
  type SynthesisMode,
  type SynthesisOptions,
  type SynthesisOptionsOverride,
  type Utterance,
  type Voice
} from "./types.js";

// Wire enums keep the protocol's numbering; 0 is UNSPECIFIED and never accepted.
const MODE_WIRE_NAMES: Record<SynthesisMode, { name: string; value: number }> = {
  lazy: { name: "MODE_LAZY", value: 1 },
  parallel: { name: "MODE_PARALLEL", value: 2 },
  batched: { name: "MODE_BATCHED", value: 3 }
};

const QUALITY_WIRE_NAMES: Record<Quality, string> = {
  "x-low": "QUALITY_X_LOW",
  low: "QUALITY_LOW",
  medium: "QUALITY_MEDIUM",
  high: "QUALITY_HIGH"
};

export function parseSynthesisMode(raw: unknown): SynthesisMode {
  for (const mode of SYNTHESIS_MODES) {
    const wire = MODE_WIRE_NAMES[mode];
    if (raw === mode || raw === wire.name || raw === wire.value) return mode;
  }
  throw new InvalidOptionsError(
    `synthesis_mode must be one of ${SYNTHESIS_MODES.map((mode) => MODE_WIRE_NAMES[mode].name).join(", ")}`
  );
}

export function qualityToWire(quality: Quality) {
  return QUALITY_WIRE_NAMES[quality];
}

export const SynthesisOptionsWireSchema = z
  .object({
    speaker: z.union([z.string().trim().max(120), z.number().int()]).optional(),
    length_scale: z.number().optional(),
    noise_scale: z.number().optional(),
    noise_w: z.number().optional()
  })
  .strict();

export const SpeechArgsWireSchema = z
  .object({
    rate: z.number().optional(),
    volume: z.number().optional(),
    pitch: z.number().optional(),
    appended_silence_ms: z.number().optional()
  })
  .strict();

export const UtteranceWireSchema = z
  .object({
    voice_id: z.string().trim().min(1).max(200),
    text: z.string(),
    speech_args: SpeechArgsWireSchema.optional(),
    synthesis_mode: z.union([z.string(), z.number()]).optional(),
    synthesis_options: SynthesisOptionsWireSchema.optional()
  })
  .strict();

export const VoicePathWireSchema = z.object({ config_path: z.string().trim().min(1) }).strict();

export type UtteranceWire = z.infer<typeof UtteranceWireSchema>;
export type SynthesisOptionsWire = z.infer<typeof SynthesisOptionsWireSchema>;

export function parseWire<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? `${issue.path.join(".")}: ` : "";
    throw new InvalidOptionsError(`Invalid request: ${where}${issue?.message ?? "malformed body"}`);
  }
  return parsed.data;
}

export function optionsFromWire(wire: SynthesisOptionsWire | undefined): SynthesisOptionsOverride {
  const out: SynthesisOptionsOverride = {};
  if (!wire) return out;
  if (wire.speaker !== undefined && wire.speaker !== "") out.speaker = wire.speaker;
  if (wire.length_scale !== undefined) out.lengthScale = wire.length_scale;
  if (wire.noise_scale !== undefined) out.noiseScale = wire.noise_scale;
  if (wire.noise_w !== undefined) out.noiseW = wire.noise_w;
  return out;
}

export function utteranceFromWire(wire: UtteranceWire): Utterance {
  const args = wire.speech_args ?? {};
  return {
    voiceId: wire.voice_id,
    text: wire.text,
    mode: parseSynthesisMode(wire.synthesis_mode),
    speechArgs: {
      rate: args.rate ?? DEFAULT_SPEECH_ARGS.rate,
      volume: args.volume ?? DEFAULT_SPEECH_ARGS.volume,
      pitch: args.pitch ?? DEFAULT_SPEECH_ARGS.pitch,
      appendedSilenceMs: args.appended_silence_ms ?? DEFAULT_SPEECH_ARGS.appendedSilenceMs
    },
    synthesisOptions: optionsFromWire(wire.synthesis_options)
  };
}

export function optionsToWire(options: SynthesisOptions) {
  return {
    speaker: options.speaker === undefined ? "" : String(options.speaker),
    length_scale: options.lengthScale,
    noise_scale: options.noiseScale,
    noise_w: options.noiseW
  };
}

export function voiceToWire(voice: Voice) {
  return {
    voice_id: voice.id,
    synth_options: optionsToWire(voice.defaultOptions),
    speakers: Object.fromEntries(voice.speakers),
    audio: {
      sample_rate: voice.audio.sampleRate,
      num_channels: voice.audio.numChannels,
      sample_width: voice.audio.sampleWidth
    },
    language: voice.language,
    quality: qualityToWire(voice.quality),
    supports_streaming_output: voice.supportsStreamingOutput
  };
}

export function httpStatusFor(code: SynthesisErrorCode): number {
  switch (code) {
    case "VoiceNotFound":
      return 404;
    case "InvalidOptions":
    case "StreamingUnsupported":
      return 400;
    case "SegmentTooLarge":
      return 413;
    case "ZeroDurationAudio":
      return 422;
    case "Cancelled":
      return 499;
    case "ModelFailure":
      return 502;
  }
}
