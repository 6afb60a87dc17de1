import { frameBytes } from "./audio.js";
import type { AudioInfo } from "./types.js";

const RIFF_HEADER_BYTES = 44;
const WAVE_FORMAT_PCM = 1;

/** Wraps raw little-endian PCM in a canonical 44-byte RIFF/WAVE header. */
export function encodeWav(pcm: Buffer, audio: AudioInfo): Buffer {
  const blockAlign = frameBytes(audio);
  if (!Number.isInteger(audio.sampleRate) || audio.sampleRate <= 0 || blockAlign <= 0) {
    throw new Error(`Cannot encode WAV for format ${JSON.stringify(audio)}`);
  }

  const header = Buffer.alloc(RIFF_HEADER_BYTES);
  let offset = 0;
  const tag = (value: string) => {
    offset = header.write(value, offset, "ascii") + offset;
  };
  const u16 = (value: number) => {
    offset = header.writeUInt16LE(value, offset);
  };
  const u32 = (value: number) => {
    offset = header.writeUInt32LE(value, offset);
  };

  tag("RIFF");
  u32(RIFF_HEADER_BYTES - 8 + pcm.length);
  tag("WAVE");
  tag("fmt ");
  u32(16);
  u16(WAVE_FORMAT_PCM);
  u16(audio.numChannels);
  u32(audio.sampleRate);
  u32(audio.sampleRate * blockAlign);
  u16(blockAlign);
  u16(audio.sampleWidth * 8);
  tag("data");
  u32(pcm.length);

  return Buffer.concat([header, pcm]);
}
