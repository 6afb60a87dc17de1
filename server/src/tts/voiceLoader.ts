import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { TtsEngine } from "./ttsEngine.js";
import { QUALITIES, type Quality, type Voice, type VoiceRuntimeConfig } from "./types.js";

export type LoadedVoice = {
  voice: Voice;
  runtime: VoiceRuntimeConfig;
  engine: TtsEngine;
};

export type VoiceLoader = (configPath: string) => Promise<LoadedVoice>;

/** A parsed voice config plus the model file it describes. */
export type VoiceDefinition = {
  voice: Voice;
  modelPath: string;
  configPath: string;
};

const FAST_VARIANT_MARKER = "+RT";

const VoiceConfigSchema = z.object({
  audio: z.object({
    sample_rate: z.number().int().positive(),
    quality: z.string().optional()
  }),
  num_speakers: z.number().int().min(1).default(1),
  speaker_id_map: z.record(z.string(), z.number().int().min(0)).default({}),
  inference: z
    .object({
      noise_scale: z.number().min(0).default(0.667),
      length_scale: z.number().positive().default(1),
      noise_w: z.number().min(0).default(0.8)
    })
    .default({}),
  language: z.object({ code: z.string().min(1) }).optional(),
  streaming: z.boolean().optional()
});

export type VoiceKey = {
  key: string;
  language: string;
  name: string;
  quality: Quality;
};

function normalizeQuality(raw: string): Quality | undefined {
  const candidate = raw.trim().toLowerCase().replace(/_/g, "-");
  return QUALITIES.find((quality) => quality === candidate);
}

/** Parses `<lang>-<name>-<quality>`, e.g. `en_US-lessac+RT-medium`. */
export function parseVoiceKey(key: string): VoiceKey {
  const parts = key.split("-");
  const [language, name, rawQuality] = parts;
  if (parts.length !== 3 || !language || !name || !rawQuality) {
    throw new Error(`Invalid voice key: ${key}`);
  }
  const quality = normalizeQuality(rawQuality);
  if (!quality) throw new Error(`Invalid voice quality in ${key}: ${rawQuality}`);
  return { key, language, name, quality };
}

export function voiceKeyFromConfigPath(configPath: string) {
  return path.basename(configPath).replace(/\.onnx\.json$/i, "").replace(/\.json$/i, "");
}

export const resolveModelPath = (configPath: string) => configPath.replace(/\.json$/i, "");

function invertSpeakerMap(key: string, map: Record<string, number>): Map<number, string> {
  const speakers = new Map<number, string>();
  for (const [name, id] of Object.entries(map)) {
    const existing = speakers.get(id);
    if (existing !== undefined) {
      throw new Error(`Voice ${key} maps speaker #${id} to both '${existing}' and '${name}'`);
    }
    speakers.set(id, name);
  }
  return speakers;
}

export function buildVoiceDefinition(configPath: string, raw: unknown): VoiceDefinition {
  const parsed = VoiceConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid voice config ${configPath}: ${parsed.error.issues[0]?.message ?? "unknown error"}`);
  }
  const cfg = parsed.data;
  const key = parseVoiceKey(voiceKeyFromConfigPath(configPath));
  const speakers = invertSpeakerMap(key.key, cfg.speaker_id_map);
  const quality = (cfg.audio.quality && normalizeQuality(cfg.audio.quality)) || key.quality;

  return {
    configPath,
    modelPath: resolveModelPath(configPath),
    voice: {
      id: key.key,
      language: cfg.language?.code ?? key.language,
      quality,
      speakers,
      audio: { sampleRate: cfg.audio.sample_rate, numChannels: 1, sampleWidth: 2 },
      defaultOptions: {
        lengthScale: cfg.inference.length_scale,
        noiseScale: cfg.inference.noise_scale,
        noiseW: cfg.inference.noise_w
      },
      supportsStreamingOutput: cfg.streaming ?? key.name.includes(FAST_VARIANT_MARKER)
    }
  };
}

export async function readVoiceDefinition(configPath: string): Promise<VoiceDefinition> {
  const text = await fsp.readFile(configPath, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new Error(`Voice config ${configPath} is not valid JSON`, { cause: err });
  }
  return buildVoiceDefinition(configPath, raw);
}

/**
 * Finds voice configs under `<dir>/<lang>-<name>-<quality>/*.onnx.json`.
 * Directories whose names are not voice keys are skipped. Sorted by key.
 */
export function findVoiceConfigs(voicesDir: string): string[] {
  if (!fs.existsSync(voicesDir)) return [];
  const out: Array<{ key: string; configPath: string }> = [];
  for (const dirent of fs.readdirSync(voicesDir, { withFileTypes: true })) {
    if (!dirent.isDirectory()) continue;
    try {
      parseVoiceKey(dirent.name);
    } catch {
      continue;
    }
    const dir = path.join(voicesDir, dirent.name);
    const config = fs.readdirSync(dir).find((file) => file.toLowerCase().endsWith(".onnx.json"));
    if (config) out.push({ key: dirent.name, configPath: path.join(dir, config) });
  }
  return out.sort((a, b) => a.key.localeCompare(b.key)).map((entry) => entry.configPath);
}
