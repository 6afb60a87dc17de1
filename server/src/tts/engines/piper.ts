import { spawn } from "node:child_process";
import fs from "node:fs";
import { SegmentTooLargeError } from "../errors.js";
import type { BatchRequest, ModelOutput, Prosody, SegmentRequest, TtsEngine } from "../ttsEngine.js";
import type { AudioInfo, ResolvedSynthesisOptions } from "../types.js";
import { readVoiceDefinition, type VoiceLoader } from "../voiceLoader.js";

export type PiperEngineOptions = {
  binPath: string;
  modelPath: string;
  configPath?: string;
  audio: AudioInfo;
  maxSegmentChars: number;
};

/** Speech rate 50 is the voice's natural pace; 0 halves it and 100 doubles it. */
export function rateToLengthScale(lengthScale: number, rate: number) {
  return lengthScale / 2 ** ((rate - 50) / 50);
}

export function buildPiperArgs(
  opts: Pick<PiperEngineOptions, "modelPath" | "configPath">,
  options: ResolvedSynthesisOptions,
  prosody: Prosody
): string[] {
  const args = ["--model", opts.modelPath];
  if (opts.configPath) args.push("--config", opts.configPath);
  args.push(
    "--output-raw",
    "--length_scale",
    rateToLengthScale(options.lengthScale, prosody.rate).toFixed(4),
    "--noise_scale",
    String(options.noiseScale),
    "--noise_w",
    String(options.noiseW)
  );
  if (options.speakerId !== undefined) args.push("--speaker", String(options.speakerId));
  return args;
}

/**
 * Runs the piper CLI once per call, one input line per segment. Each call owns
 * its process, so concurrent calls are safe; pitch is not supported by piper
 * and is ignored.
 */
export class PiperEngine implements TtsEngine {
  readonly name = "piper";
  readonly concurrencySafe = true;
  private readonly opts: PiperEngineOptions;

  constructor(opts: PiperEngineOptions) {
    this.opts = opts;
  }

  synthesize(req: SegmentRequest, signal?: AbortSignal): Promise<ModelOutput> {
    return this.run([req.text], req.options, req.prosody, signal);
  }

  synthesizeBatch(req: BatchRequest, signal?: AbortSignal): Promise<ModelOutput> {
    return this.run(req.segments, req.options, req.prosody, signal);
  }

  private async run(
    lines: string[],
    options: ResolvedSynthesisOptions,
    prosody: Prosody,
    signal?: AbortSignal
  ): Promise<ModelOutput> {
    for (const line of lines) {
      if (line.length > this.opts.maxSegmentChars) {
        throw new SegmentTooLargeError(line.length, this.opts.maxSegmentChars);
      }
    }
    if (!fs.existsSync(this.opts.binPath)) {
      throw new Error(`piper binary not found at ${this.opts.binPath}`);
    }
    if (!fs.existsSync(this.opts.modelPath)) {
      throw new Error(`piper model not found at ${this.opts.modelPath}`);
    }

    const startedAt = performance.now();
    const child = spawn(this.opts.binPath, buildPiperArgs(this.opts, options, prosody), {
      stdio: ["pipe", "pipe", "pipe"]
    });

    const killChild = () => {
      if (child.exitCode === null) child.kill("SIGTERM");
    };

    if (signal) {
      if (signal.aborted) killChild();
      signal.addEventListener("abort", killChild, { once: true });
    }

    const chunks: Buffer[] = [];
    let stderr = "";
    child.stderr?.on("data", (chunk) => {
      stderr += chunk.toString();
    });
    child.stdout?.on("data", (chunk: Buffer) => {
      chunks.push(chunk);
    });

    // EPIPE means piper exited before reading its input; the exit status reports that.
    let stdinError: NodeJS.ErrnoException | undefined;
    child.stdin?.on("error", (err: NodeJS.ErrnoException) => {
      if (err.code !== "EPIPE") stdinError = err;
    });
    child.stdin?.write(lines.map((line) => line.trim()).join("\n") + "\n");
    child.stdin?.end();

    try {
      await new Promise<void>((resolve, reject) => {
        child.on("error", (err) => reject(err));
        child.on("close", (code, exitSignal) => {
          if (signal?.aborted) return reject(new Error("piper aborted"));
          if (code !== 0) {
            const status = code ?? exitSignal ?? "unknown";
            return reject(new Error(`piper failed (${status}): ${stderr.trim() || "unknown error"}`));
          }
          if (stdinError) return reject(new Error(`piper input failed: ${stdinError.message}`));
          resolve();
        });
      });
    } finally {
      signal?.removeEventListener("abort", killChild);
    }

    return {
      samples: Buffer.concat(chunks),
      audio: this.opts.audio,
      elapsedMs: performance.now() - startedAt
    };
  }
}

export function createPiperVoiceLoader(opts: { binPath: string; maxSegmentChars: number }): VoiceLoader {
  return async (configPath) => {
    const definition = await readVoiceDefinition(configPath);
    const engine = new PiperEngine({
      binPath: opts.binPath,
      modelPath: definition.modelPath,
      configPath: definition.configPath,
      audio: definition.voice.audio,
      maxSegmentChars: opts.maxSegmentChars
    });
    return {
      voice: definition.voice,
      engine,
      runtime: { concurrencySafe: engine.concurrencySafe, supportsBatching: true }
    };
  };
}
