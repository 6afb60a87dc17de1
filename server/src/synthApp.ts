import crypto from "node:crypto";
import type { IncomingMessage } from "node:http";
import type { Duplex } from "node:stream";
import express from "express";
import { WebSocketServer, type RawData, type WebSocket } from "ws";
import { z } from "zod";
import { loadConfig, type SynthConfig } from "./config.js";
import { createAuditLogger, type AuditSink } from "./logging/audit.js";
import { createPiperVoiceLoader } from "./tts/engines/piper.js";
import { InvalidOptionsError, isSynthesisError, toSynthesisError, type SynthesisError } from "./tts/errors.js";
import { SynthesisScheduler } from "./tts/scheduler.js";
import { SynthesisService } from "./tts/synthesisService.js";
import { findVoiceConfigs, type VoiceLoader } from "./tts/voiceLoader.js";
import { VoiceRegistry } from "./tts/voiceRegistry.js";
import { encodeWav } from "./tts/wav.js";
import {
  SynthesisOptionsWireSchema,
  UtteranceWireSchema,
  VoicePathWireSchema,
  httpStatusFor,
  optionsFromWire,
  optionsToWire,
  parseWire,
  utteranceFromWire,
  voiceToWire
} from "./tts/wire.js";

export const SERVICE_VERSION = "0.4.0";

export type SynthAppOptions = {
  env?: NodeJS.ProcessEnv;
  loader?: VoiceLoader;
  audit?: AuditSink;
};

export type SynthApp = {
  router: express.Router;
  handleUpgrade: (req: IncomingMessage, socket: Duplex, head: Buffer) => boolean;
  loadVoices: () => Promise<number>;
  shutdown: () => void;
  config: SynthConfig;
  service: SynthesisService;
};

const StreamClientMessageSchema = z.discriminatedUnion("type", [
  UtteranceWireSchema.extend({ type: z.literal("utterance") }),
  z.object({ type: z.literal("cancel") })
]);

function errorBody(error: SynthesisError, requestId?: string) {
  return { error: error.code, message: error.message, ...(requestId ? { requestId } : {}) };
}

type BodyParserError = Error & { type: string; status: number };

function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    err instanceof Error &&
    "type" in err &&
    typeof err.type === "string" &&
    err.type.startsWith("entity.") &&
    "status" in err &&
    typeof err.status === "number"
  );
}

export function createSynthApp(opts: SynthAppOptions = {}): SynthApp {
  const env = opts.env ?? process.env;
  const config = loadConfig(env);
  const auditLogger = opts.audit ? undefined : createAuditLogger(config.auditLogPath);
  const audit: AuditSink = opts.audit ?? ((event) => auditLogger?.log(event));
  const loader = opts.loader ?? createPiperVoiceLoader({ binPath: config.piperBin, maxSegmentChars: config.maxSegmentChars });

  const registry = new VoiceRegistry();
  const scheduler = new SynthesisScheduler({
    maxConcurrentInferences: config.maxConcurrentInferences,
    streamBufferChunks: config.streamBufferChunks
  });
  const service = new SynthesisService(registry, scheduler, {
    version: SERVICE_VERSION,
    maxTextChars: config.maxTextChars,
    maxAppendedSilenceMs: config.maxAppendedSilenceMs,
    loader,
    audit
  });

  // A broken voice directory is reported and skipped; the rest still load.
  const loadVoices = async () => {
    let count = 0;
    for (const configPath of findVoiceConfigs(config.voicesDir)) {
      try {
        await service.loadVoice(configPath);
        count += 1;
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.warn("[voices] failed to load", { configPath, error: message });
        audit({ type: "voice_load_error", at: new Date().toISOString(), source: configPath, message });
      }
    }
    console.log("[voices] loaded", { count, voicesDir: config.voicesDir });
    return count;
  };

  const sendError = (res: express.Response, err: unknown, requestId?: string) => {
    const error = toSynthesisError(err);
    const status = httpStatusFor(error.code);
    if (status >= 500) {
      console.warn("[api] request failed", { requestId, code: error.code, error: error.message });
    }
    res.status(status).json(errorBody(error, requestId));
  };

  const router = express.Router();
  router.use(express.json({ limit: "2mb" }));

  router.get("/healthz", (_req, res) => res.json({ ok: true }));

  router.get("/api/version", (_req, res) => {
    res.json(service.getVersion());
  });

  router.get("/api/voices", (req, res) => {
    const language = req.query.language;
    if (typeof language !== "string" || !language) {
      res.json({ voices: service.listVoices().map(voiceToWire) });
      return;
    }
    try {
      res.json({ voices: [voiceToWire(service.findVoiceByLanguage(language))] });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post("/api/voices/load", async (req, res) => {
    try {
      const body = parseWire(VoicePathWireSchema, req.body ?? {});
      const voice = await service.loadVoice(body.config_path);
      console.log("[voices] loaded voice", { voiceId: voice.id, configPath: body.config_path });
      res.json(voiceToWire(voice));
    } catch (err) {
      // Loader errors (missing file, bad JSON) are configuration problems, not model faults.
      if (!isSynthesisError(err)) {
        const message = err instanceof Error ? err.message : String(err);
        console.warn("[voices] load failed", { error: message });
        res.status(400).json({ error: "InvalidOptions", message });
        return;
      }
      sendError(res, err);
    }
  });

  router.delete("/api/voices/:voiceId", (req, res) => {
    try {
      service.unloadVoice(req.params.voiceId);
      console.log("[voices] unloaded voice", { voiceId: req.params.voiceId });
      res.status(204).end();
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get("/api/voices/:voiceId/options", (req, res) => {
    try {
      res.json(optionsToWire(service.getSynthesisOptions(req.params.voiceId)));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.put("/api/voices/:voiceId/options", (req, res) => {
    try {
      const body = parseWire(SynthesisOptionsWireSchema, req.body ?? {});
      const options = service.setSynthesisOptions(req.params.voiceId, optionsFromWire(body));
      res.json(optionsToWire(options));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post("/api/synthesize", async (req, res) => {
    const requestId = crypto.randomUUID();
    const startedAt = Date.now();
    res.setHeader("X-Synth-Request-Id", requestId);

    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      const utterance = utteranceFromWire(parseWire(UtteranceWireSchema, req.body ?? {}));
      console.log("[synth] synthesize start", {
        requestId,
        voiceId: utterance.voiceId,
        mode: utterance.mode,
        textChars: utterance.text.length
      });
      const result = await service.synthesize(utterance, controller.signal);
      console.log("[synth] synthesize done", {
        requestId,
        pcmBytes: result.wavSamples.length,
        rtf: Number(result.rtf.toFixed(4)),
        tookMs: Date.now() - startedAt
      });
      res.setHeader("X-Synth-RTF", String(result.rtf));
      if (req.query.format === "wav") {
        const audio = service.getVoice(utterance.voiceId).audio;
        res.setHeader("Content-Type", "audio/wav");
        res.send(encodeWav(result.wavSamples, audio));
        return;
      }
      res.json({ wav_samples: result.wavSamples.toString("base64"), rtf: result.rtf });
    } catch (err) {
      sendError(res, toSynthesisError(err, controller.signal), requestId);
    }
  });

  // Body parser failures (malformed JSON, oversized body) keep the JSON error shape.
  const bodyErrorHandler: express.ErrorRequestHandler = (err: unknown, _req, res, next) => {
    if (!isBodyParserError(err)) return next(err);
    res.status(err.status).json(errorBody(new InvalidOptionsError(`Invalid request body: ${err.message}`)));
  };
  router.use(bodyErrorHandler);

  const streamWss = new WebSocketServer({ noServer: true, maxPayload: config.maxWsMessageBytes });
  const streamPath = "/ws/synthesize";

  const sendJson = (ws: WebSocket, payload: unknown) => {
    if (ws.readyState !== ws.OPEN) return;
    try {
      ws.send(JSON.stringify(payload));
    } catch (err) {
      console.warn("[ws] send failed", { error: err instanceof Error ? err.message : String(err) });
    }
  };

  const sendBinary = (ws: WebSocket, chunk: Buffer) =>
    new Promise<void>((resolve, reject) => {
      if (ws.readyState !== ws.OPEN) return reject(new Error("socket closed"));
      ws.send(chunk, { binary: true }, (err) => (err ? reject(err) : resolve()));
    });

  const runStream = async (ws: WebSocket, raw: z.infer<typeof UtteranceWireSchema>, controller: AbortController) => {
    const requestId = crypto.randomUUID();
    try {
      const utterance = utteranceFromWire(raw);
      const stream = service.synthesizeStreaming(utterance, controller.signal);
      sendJson(ws, {
        type: "format",
        requestId,
        sample_rate: stream.audio.sampleRate,
        num_channels: stream.audio.numChannels,
        sample_width: stream.audio.sampleWidth
      });
      for await (const chunk of stream) {
        await sendBinary(ws, chunk.wavSamples);
      }
      sendJson(ws, { type: "done", requestId, rtf: stream.rtf, chunks: stream.chunks });
    } catch (err) {
      const error = toSynthesisError(err, controller.signal);
      if (error.code !== "Cancelled") {
        console.warn("[ws] stream failed", { requestId, code: error.code, error: error.message });
      }
      sendJson(ws, { type: "error", ...errorBody(error, requestId) });
    }
  };

  streamWss.on("connection", (ws: WebSocket) => {
    let active: AbortController | undefined;

    ws.on("message", (data: RawData, isBinary: boolean) => {
      if (isBinary) return;
      let raw: unknown;
      try {
        raw = JSON.parse(data.toString());
      } catch {
        sendJson(ws, { type: "error", error: "InvalidOptions", message: "Message is not valid JSON" });
        return;
      }
      let msg: z.infer<typeof StreamClientMessageSchema>;
      try {
        msg = parseWire(StreamClientMessageSchema, raw);
      } catch (err) {
        sendJson(ws, { type: "error", ...errorBody(toSynthesisError(err)) });
        return;
      }
      if (msg.type === "cancel") {
        active?.abort();
        return;
      }
      if (active) {
        sendJson(ws, { type: "error", error: "InvalidOptions", message: "A synthesis is already running on this socket." });
        return;
      }
      const { type: _type, ...utterance } = msg;
      const controller = new AbortController();
      active = controller;
      void runStream(ws, utterance, controller).finally(() => {
        if (active === controller) active = undefined;
      });
    });

    ws.on("close", () => {
      active?.abort();
    });
  });

  const handleUpgrade = (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const url = req.url;
    if (!url) return false;
    const pathname = new URL(url, "http://localhost").pathname;
    if (config.debugWs) console.log("[ws] upgrade request", { url, pathname, origin: req.headers.origin });
    if (pathname !== streamPath) return false;
    streamWss.handleUpgrade(req, socket, head, (ws) => {
      streamWss.emit("connection", ws, req);
    });
    return true;
  };

  const shutdown = () => {
    for (const client of streamWss.clients) {
      try {
        client.close(1001, "server shutting down");
      } catch (err) {
        console.warn("[ws] close failed", { error: err instanceof Error ? err.message : String(err) });
      }
    }
    streamWss.close();
    auditLogger?.close();
  };

  return { router, handleUpgrade, loadVoices, shutdown, config, service };
}
