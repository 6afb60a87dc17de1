import { InvalidOptionsError } from "../errors.js";
import {
  UtteranceWireSchema,
  httpStatusFor,
  optionsFromWire,
  optionsToWire,
  parseSynthesisMode,
  parseWire,
  utteranceFromWire,
  voiceToWire
} from "../wire.js";
import { makeVoice } from "./fakeEngine.js";

describe("parseSynthesisMode", () => {
  it.each([
    ["lazy", "lazy"],
    ["MODE_PARALLEL", "parallel"],
    [3, "batched"]
  ] as const)("maps %j to %s", (raw, mode) => {
    expect(parseSynthesisMode(raw)).toBe(mode);
  });

  it.each([undefined, 0, "MODE_UNSPECIFIED", "fast"])("rejects %j", (raw) => {
    expect(() => parseSynthesisMode(raw)).toThrow(
      new InvalidOptionsError("synthesis_mode must be one of MODE_LAZY, MODE_PARALLEL, MODE_BATCHED")
    );
  });
});

describe("parseWire", () => {
  it("reports the first issue with its path", () => {
    expect(() => parseWire(UtteranceWireSchema, { text: "Hi." })).toThrow(
      new InvalidOptionsError("Invalid request: voice_id: Required")
    );
  });

  it("rejects unknown fields", () => {
    expect(() => parseWire(UtteranceWireSchema, { voice_id: "v", text: "Hi.", extra: 1 })).toThrow(
      "Invalid request: Unrecognized key(s) in object: 'extra'"
    );
  });
});

describe("utteranceFromWire", () => {
  it("fills default speech args", () => {
    const wire = parseWire(UtteranceWireSchema, {
      voice_id: "en_US-test-medium",
      text: "Hi.",
      synthesis_mode: "MODE_LAZY",
      speech_args: { volume: 80 }
    });
    expect(utteranceFromWire(wire)).toEqual({
      voiceId: "en_US-test-medium",
      text: "Hi.",
      mode: "lazy",
      speechArgs: { rate: 50, volume: 80, pitch: 50, appendedSilenceMs: 0 },
      synthesisOptions: {}
    });
  });

  it("requires a synthesis mode", () => {
    const wire = parseWire(UtteranceWireSchema, { voice_id: "v", text: "Hi." });
    expect(() => utteranceFromWire(wire)).toThrow(InvalidOptionsError);
  });
});

describe("synthesis options", () => {
  it("treats an empty speaker as unset", () => {
    expect(optionsFromWire({ speaker: "", length_scale: 1.2 })).toEqual({ lengthScale: 1.2 });
    expect(optionsFromWire(undefined)).toEqual({});
  });

  it("renders options in snake case", () => {
    expect(optionsToWire({ speaker: 2, lengthScale: 1, noiseScale: 0.5, noiseW: 0.6 })).toEqual({
      speaker: "2",
      length_scale: 1,
      noise_scale: 0.5,
      noise_w: 0.6
    });
  });
});

describe("voiceToWire", () => {
  it("describes a voice", () => {
    const voice = makeVoice({ speakers: new Map([[0, "alice"]]) });
    expect(voiceToWire(voice)).toEqual({
      voice_id: "en_US-test-medium",
      synth_options: { speaker: "", length_scale: 1, noise_scale: 0.667, noise_w: 0.8 },
      speakers: { "0": "alice" },
      audio: { sample_rate: 22_050, num_channels: 1, sample_width: 2 },
      language: "en_US",
      quality: "QUALITY_MEDIUM",
      supports_streaming_output: true
    });
  });
});

describe("httpStatusFor", () => {
  it("maps every error code", () => {
    expect(httpStatusFor("VoiceNotFound")).toBe(404);
    expect(httpStatusFor("InvalidOptions")).toBe(400);
    expect(httpStatusFor("StreamingUnsupported")).toBe(400);
    expect(httpStatusFor("SegmentTooLarge")).toBe(413);
    expect(httpStatusFor("ZeroDurationAudio")).toBe(422);
    expect(httpStatusFor("Cancelled")).toBe(499);
    expect(httpStatusFor("ModelFailure")).toBe(502);
  });
});
