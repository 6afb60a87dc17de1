import fs from "node:fs";
import path from "node:path";
import type { SynthesisErrorCode } from "../tts/errors.js";
import type { SynthesisMode } from "../tts/types.js";

export type AuditEvent =
  | {
      type: "voice_load" | "voice_unload" | "voice_options";
      at: string;
      voiceId: string;
      language?: string;
      quality?: string;
      source?: string;
    }
  | {
      type: "voice_load_error";
      at: string;
      source: string;
      message: string;
    }
  | {
      type: "synth_start";
      at: string;
      requestId: string;
      voiceId: string;
      mode: SynthesisMode;
      streaming: boolean;
      textChars: number;
    }
  | {
      type: "synth_done";
      at: string;
      requestId: string;
      voiceId: string;
      mode: SynthesisMode;
      streaming: boolean;
      chunks: number;
      audioBytes: number;
      rtf: number;
    }
  | {
      type: "synth_cancel" | "synth_error";
      at: string;
      requestId: string;
      voiceId: string;
      mode: SynthesisMode;
      streaming: boolean;
      chunks: number;
      code: SynthesisErrorCode;
      message?: string;
    };

export type AuditSink = (event: AuditEvent) => void;

export function createAuditLogger(filePath: string) {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });
  const stream = fs.createWriteStream(filePath, { flags: "a" });

  return {
    log(event: AuditEvent) {
      stream.write(`${JSON.stringify(event)}\n`);
    },
    close() {
      stream.end();
    }
  };
}
