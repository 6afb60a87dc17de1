import os from "node:os";
import path from "node:path";
import { z } from "zod";

const BoolEnv = z.preprocess(
  (v) => {
    if (typeof v !== "string") return v;
    const normalized = v.trim().toLowerCase();
    if (normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on")
      return true;
    if (normalized === "0" || normalized === "false" || normalized === "no" || normalized === "off")
      return false;
    return v;
  },
  z.boolean()
);

/** Half the hardware threads, but never fewer than two workers. */
export const defaultInferenceConcurrency = () => Math.max(Math.floor(os.availableParallelism() / 2), 2);

const ConfigSchema = z.object({
  host: z.string().default("127.0.0.1"),
  port: z.coerce.number().int().min(1).max(65535).default(50051),

  voicesDir: z.string().default(path.resolve(process.cwd(), "voices")),
  piperBin: z.string().default(path.resolve(process.cwd(), "bin/piper")),

  maxConcurrentInferences: z.coerce.number().int().min(1).max(64).default(defaultInferenceConcurrency),
  streamBufferChunks: z.coerce.number().int().min(1).max(256).default(4),
  maxSegmentChars: z.coerce.number().int().min(40).max(10_000).default(500),
  maxTextChars: z.coerce.number().int().min(1).max(200_000).default(20_000),
  maxAppendedSilenceMs: z.coerce.number().int().min(0).max(60_000).default(10_000),

  maxWsMessageBytes: z.coerce.number().int().min(1_024).default(1024 * 1024),
  debugWs: BoolEnv.default(false),

  auditLogPath: z.string().default("logs/synth-audit.jsonl")
});

export type SynthConfig = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SynthConfig {
  const parsed = ConfigSchema.parse({
    host: env.SYNTH_HOST,
    port: env.SYNTH_PORT,

    voicesDir: env.SYNTH_VOICES_DIR,
    piperBin: env.SYNTH_PIPER_BIN,

    maxConcurrentInferences: env.SYNTH_MAX_CONCURRENT_INFERENCES,
    streamBufferChunks: env.SYNTH_STREAM_BUFFER_CHUNKS,
    maxSegmentChars: env.SYNTH_MAX_SEGMENT_CHARS,
    maxTextChars: env.SYNTH_MAX_TEXT_CHARS,
    maxAppendedSilenceMs: env.SYNTH_MAX_APPENDED_SILENCE_MS,

    maxWsMessageBytes: env.SYNTH_MAX_WS_MESSAGE_BYTES,
    debugWs: env.SYNTH_DEBUG_WS,

    auditLogPath: env.SYNTH_AUDIT_LOG_PATH
  });

  if (parsed.host !== "127.0.0.1" && parsed.host !== "localhost") {
    throw new Error(`Refusing to bind to non-loopback host (${parsed.host}). Set SYNTH_HOST=127.0.0.1`);
  }

  return parsed;
}
