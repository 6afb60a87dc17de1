import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { SegmentTooLargeError, toSynthesisError } from "../../errors.js";
import type { ResolvedSynthesisOptions } from "../../types.js";
import { buildPiperArgs, createPiperVoiceLoader, PiperEngine, rateToLengthScale } from "../piper.js";

const OPTIONS: ResolvedSynthesisOptions = {
  speaker: "bob",
  speakerId: 1,
  lengthScale: 1,
  noiseScale: 0.667,
  noiseW: 0.8
};

const AUDIO = { sampleRate: 22_050, numChannels: 1, sampleWidth: 2 } as const;

describe("rateToLengthScale", () => {
  it("keeps the voice pace at rate 50 and doubles or halves it at the ends", () => {
    expect(rateToLengthScale(1, 50)).toBe(1);
    expect(rateToLengthScale(1, 100)).toBe(0.5);
    expect(rateToLengthScale(1, 0)).toBe(2);
    expect(rateToLengthScale(1.2, 50)).toBe(1.2);
  });
});

describe("buildPiperArgs", () => {
  it("passes scales, speaker and raw output", () => {
    expect(
      buildPiperArgs({ modelPath: "m.onnx", configPath: "m.onnx.json" }, OPTIONS, { rate: 50, pitch: 50 })
    ).toEqual([
      "--model",
      "m.onnx",
      "--config",
      "m.onnx.json",
      "--output-raw",
      "--length_scale",
      "1.0000",
      "--noise_scale",
      "0.667",
      "--noise_w",
      "0.8",
      "--speaker",
      "1"
    ]);
  });

  it("folds the speech rate into length_scale and omits the speaker for single-speaker voices", () => {
    const args = buildPiperArgs(
      { modelPath: "m.onnx" },
      { ...OPTIONS, speaker: "default", speakerId: undefined },
      { rate: 100, pitch: 0 }
    );
    expect(args).toEqual(["--model", "m.onnx", "--output-raw", "--length_scale", "0.5000", "--noise_scale", "0.667", "--noise_w", "0.8"]);
  });
});

describe("PiperEngine", () => {
  it("rejects oversized segments before starting a process", async () => {
    const engine = new PiperEngine({
      binPath: "/nonexistent/piper",
      modelPath: "/nonexistent/model.onnx",
      audio: AUDIO,
      maxSegmentChars: 5
    });
    await expect(
      engine.synthesize({ voiceId: "v", text: "too long", options: OPTIONS, prosody: { rate: 50, pitch: 50 } })
    ).rejects.toThrow(new SegmentTooLargeError(8, 5));
  });

  it("fails when the binary is missing", async () => {
    const engine = new PiperEngine({
      binPath: "/nonexistent/piper",
      modelPath: "/nonexistent/model.onnx",
      audio: AUDIO,
      maxSegmentChars: 500
    });
    await expect(
      engine.synthesize({ voiceId: "v", text: "Hi.", options: OPTIONS, prosody: { rate: 50, pitch: 50 } })
    ).rejects.toThrow("piper binary not found at /nonexistent/piper");
  });
});

describe("PiperEngine process", () => {
  let root: string;
  let modelPath: string;

  const script = (name: string, body: string) => {
    const binPath = path.join(root, name);
    fs.writeFileSync(binPath, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
    return binPath;
  };
  const engineFor = (binPath: string) => new PiperEngine({ binPath, modelPath, audio: AUDIO, maxSegmentChars: 500 });
  const prosody = { rate: 50, pitch: 50 };

  beforeAll(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "synth-piper-run-"));
    modelPath = path.join(root, "model.onnx");
    fs.writeFileSync(modelPath, "");
  });

  afterAll(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("returns everything piper writes to stdout", async () => {
    const engine = engineFor(script("echo-piper", "exec cat"));
    const output = await engine.synthesizeBatch({
      voiceId: "v",
      segments: ["  Hello. ", "World."],
      options: OPTIONS,
      prosody
    });
    expect(output.samples.toString("utf8")).toBe("Hello.\nWorld.\n");
    expect(output.audio).toEqual(AUDIO);
    expect(output.elapsedMs).toBeGreaterThan(0);
  });

  it("reports the exit code and stderr of a failed run", async () => {
    const engine = engineFor(script("failing-piper", "echo bad model >&2\nexit 3"));
    await expect(engine.synthesize({ voiceId: "v", text: "Hi.", options: OPTIONS, prosody })).rejects.toThrow(
      "piper failed (3): bad model"
    );
  });

  it("reports the exit status when piper quits before reading a large input", async () => {
    const engine = engineFor(script("early-exit-piper", "echo bad model >&2\nexit 3"));
    const segments = Array.from({ length: 3000 }, () => "a".repeat(400));
    await expect(engine.synthesizeBatch({ voiceId: "v", segments, options: OPTIONS, prosody })).rejects.toThrow(
      "piper failed (3): bad model"
    );
  });

  it("stops the process on abort and surfaces a cancellation", async () => {
    const engine = engineFor(script("slow-piper", "exec sleep 30"));
    const controller = new AbortController();
    const startedAt = Date.now();
    const run = engine.synthesize({ voiceId: "v", text: "Hi.", options: OPTIONS, prosody }, controller.signal);
    setTimeout(() => controller.abort(), 50);

    const err = await run.then(
      () => undefined,
      (reason: unknown) => reason
    );
    expect(err).toEqual(new Error("piper aborted"));
    expect(toSynthesisError(err, controller.signal).code).toBe("Cancelled");
    expect(Date.now() - startedAt).toBeLessThan(10_000);
  });
});

describe("createPiperVoiceLoader", () => {
  it("builds a concurrency-safe, batching voice from its config", async () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), "synth-piper-"));
    try {
      const dir = path.join(root, "en_US-test-low");
      fs.mkdirSync(dir);
      const configPath = path.join(dir, "en_US-test-low.onnx.json");
      fs.writeFileSync(configPath, JSON.stringify({ audio: { sample_rate: 16_000 } }));

      const loaded = await createPiperVoiceLoader({ binPath: "/nonexistent/piper", maxSegmentChars: 500 })(configPath);

      expect(loaded.voice.id).toBe("en_US-test-low");
      expect(loaded.voice.audio).toEqual({ sampleRate: 16_000, numChannels: 1, sampleWidth: 2 });
      expect(loaded.engine.name).toBe("piper");
      expect(loaded.runtime).toEqual({ concurrencySafe: true, supportsBatching: true });
    } finally {
      fs.rmSync(root, { recursive: true, force: true });
    }
  });
});
