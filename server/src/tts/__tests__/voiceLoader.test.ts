import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  buildVoiceDefinition,
  findVoiceConfigs,
  parseVoiceKey,
  readVoiceDefinition,
  voiceKeyFromConfigPath
} from "../voiceLoader.js";

const CONFIG = {
  audio: { sample_rate: 22_050, quality: "medium" },
  num_speakers: 2,
  speaker_id_map: { alice: 0, bob: 1 },
  inference: { noise_scale: 0.5, length_scale: 1.1, noise_w: 0.6 },
  language: { code: "en_US" }
};

describe("parseVoiceKey", () => {
  it("splits language, name and quality", () => {
    expect(parseVoiceKey("en_US-lessac+RT-medium")).toEqual({
      key: "en_US-lessac+RT-medium",
      language: "en_US",
      name: "lessac+RT",
      quality: "medium"
    });
  });

  it("normalizes underscored qualities", () => {
    expect(parseVoiceKey("en_US-amy-x_low").quality).toBe("x-low");
  });

  it("rejects malformed keys", () => {
    expect(() => parseVoiceKey("amy")).toThrow("Invalid voice key: amy");
    expect(() => parseVoiceKey("en_US-amy-ultra")).toThrow("Invalid voice quality in en_US-amy-ultra: ultra");
  });
});

describe("voiceKeyFromConfigPath", () => {
  it("strips the model config suffix", () => {
    expect(voiceKeyFromConfigPath("/voices/en_US-amy-low/en_US-amy-low.onnx.json")).toBe("en_US-amy-low");
  });
});

describe("buildVoiceDefinition", () => {
  const configPath = "/voices/en_US-test+RT-medium/en_US-test+RT-medium.onnx.json";

  it("maps a model config onto a voice", () => {
    const definition = buildVoiceDefinition(configPath, CONFIG);
    expect(definition.modelPath).toBe("/voices/en_US-test+RT-medium/en_US-test+RT-medium.onnx");
    expect(definition.voice).toEqual({
      id: "en_US-test+RT-medium",
      language: "en_US",
      quality: "medium",
      speakers: new Map([
        [0, "alice"],
        [1, "bob"]
      ]),
      audio: { sampleRate: 22_050, numChannels: 1, sampleWidth: 2 },
      defaultOptions: { lengthScale: 1.1, noiseScale: 0.5, noiseW: 0.6 },
      supportsStreamingOutput: true
    });
  });

  it("lets the config override streaming support", () => {
    expect(buildVoiceDefinition(configPath, { ...CONFIG, streaming: false }).voice.supportsStreamingOutput).toBe(false);
    const plain = "/voices/en_US-test-medium/en_US-test-medium.onnx.json";
    expect(buildVoiceDefinition(plain, CONFIG).voice.supportsStreamingOutput).toBe(false);
    expect(buildVoiceDefinition(plain, { ...CONFIG, streaming: true }).voice.supportsStreamingOutput).toBe(true);
  });

  it("fills inference defaults", () => {
    const definition = buildVoiceDefinition(configPath, { audio: { sample_rate: 16_000 } });
    expect(definition.voice.defaultOptions).toEqual({ lengthScale: 1, noiseScale: 0.667, noiseW: 0.8 });
    expect(definition.voice.speakers.size).toBe(0);
    expect(definition.voice.language).toBe("en_US");
  });

  it("rejects speaker maps that reuse an id", () => {
    expect(() => buildVoiceDefinition(configPath, { ...CONFIG, speaker_id_map: { alice: 0, bob: 0 } })).toThrow(
      "Voice en_US-test+RT-medium maps speaker #0 to both 'alice' and 'bob'"
    );
  });

  it("rejects configs without an audio section", () => {
    expect(() => buildVoiceDefinition(configPath, {})).toThrow(/^Invalid voice config/);
  });
});

describe("voice directories", () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "synth-voices-"));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  function writeVoice(key: string, body: string = JSON.stringify(CONFIG)) {
    const dir = path.join(root, key);
    fs.mkdirSync(dir, { recursive: true });
    const configPath = path.join(dir, `${key}.onnx.json`);
    fs.writeFileSync(configPath, body);
    return configPath;
  }

  it("finds voice configs sorted by key and skips other directories", () => {
    const en = writeVoice("en_US-b-low");
    const de = writeVoice("de_DE-a-medium");
    fs.mkdirSync(path.join(root, "notes"));
    fs.mkdirSync(path.join(root, "fr_FR-empty-low"));

    expect(findVoiceConfigs(root)).toEqual([de, en]);
  });

  it("returns nothing for a missing directory", () => {
    expect(findVoiceConfigs(path.join(root, "missing"))).toEqual([]);
  });

  it("reads a definition from disk", async () => {
    const configPath = writeVoice("en_US-b-low");
    const definition = await readVoiceDefinition(configPath);
    expect(definition.voice.id).toBe("en_US-b-low");
    expect(definition.configPath).toBe(configPath);
  });

  it("reports invalid JSON", async () => {
    const configPath = writeVoice("en_US-b-low", "{not json");
    await expect(readVoiceDefinition(configPath)).rejects.toThrow(`Voice config ${configPath} is not valid JSON`);
  });
});
