import path from "node:path";
import { defaultInferenceConcurrency, loadConfig } from "../config.js";

describe("loadConfig", () => {
  it("fills defaults from an empty environment", () => {
    const config = loadConfig({});
    expect(config).toMatchObject({
      host: "127.0.0.1",
      port: 50051,
      voicesDir: path.resolve(process.cwd(), "voices"),
      streamBufferChunks: 4,
      maxSegmentChars: 500,
      maxTextChars: 20_000,
      maxAppendedSilenceMs: 10_000,
      debugWs: false,
      auditLogPath: "logs/synth-audit.jsonl"
    });
    expect(config.maxConcurrentInferences).toBe(defaultInferenceConcurrency());
    expect(config.maxConcurrentInferences).toBeGreaterThanOrEqual(2);
  });

  it("reads SYNTH_ variables", () => {
    const config = loadConfig({
      SYNTH_PORT: "6000",
      SYNTH_VOICES_DIR: "/srv/voices",
      SYNTH_MAX_CONCURRENT_INFERENCES: "3",
      SYNTH_DEBUG_WS: "yes"
    });
    expect(config).toMatchObject({ port: 6000, voicesDir: "/srv/voices", maxConcurrentInferences: 3, debugWs: true });
  });

  it("refuses a non-loopback host", () => {
    expect(() => loadConfig({ SYNTH_HOST: "0.0.0.0" })).toThrow(
      "Refusing to bind to non-loopback host (0.0.0.0). Set SYNTH_HOST=127.0.0.1"
    );
  });

  it("rejects out-of-range values", () => {
    expect(() => loadConfig({ SYNTH_MAX_CONCURRENT_INFERENCES: "0" })).toThrow();
    expect(() => loadConfig({ SYNTH_DEBUG_WS: "maybe" })).toThrow();
  });
});
