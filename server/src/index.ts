import http from "node:http";
import express from "express";
import { createSynthApp } from "./synthApp.js";

const rawLog = console.log.bind(console);
const rawWarn = console.warn.bind(console);
const rawError = console.error.bind(console);

const stamp = () => `[${new Date().toISOString()} pid=${process.pid}]`;

// Prefix all server logs with timestamp + pid.
console.log = (...args: unknown[]) => rawLog(stamp(), ...args);
console.warn = (...args: unknown[]) => rawWarn(stamp(), ...args);
console.error = (...args: unknown[]) => rawError(stamp(), ...args);

function describe(reason: unknown) {
  return reason instanceof Error ? { message: reason.message, stack: reason.stack } : String(reason);
}

function logExit(event: string, detail?: unknown) {
  const payload = {
    ts: new Date().toISOString(),
    event,
    pid: process.pid,
    uptimeSec: Math.round(process.uptime()),
    detail
  };
  console.error("[server-exit]", JSON.stringify(payload));
}

process.on("uncaughtException", (err) => {
  logExit("uncaughtException", describe(err));
});

process.on("unhandledRejection", (reason: unknown) => {
  logExit("unhandledRejection", { reason: describe(reason) });
});

const app = express();
app.disable("x-powered-by");

const { router, handleUpgrade, loadVoices, shutdown, config } = createSynthApp();
app.use(router);

const server = http.createServer(app);
server.on("upgrade", (req, socket, head) => {
  if (!handleUpgrade(req, socket, head)) socket.destroy();
});

let shuttingDown = false;
const handleSignal = (signal: "SIGTERM" | "SIGINT") => {
  if (shuttingDown) return;
  shuttingDown = true;
  logExit(signal);
  try {
    shutdown();
  } catch (err) {
    logExit("shutdownError", describe(err));
  }
  server.close(() => process.exit(0));
  // Open WS clients can keep the server alive; force-exit.
  setTimeout(() => process.exit(0), 1500).unref();
};
process.on("SIGTERM", () => handleSignal("SIGTERM"));
process.on("SIGINT", () => handleSignal("SIGINT"));
process.on("exit", (code) => logExit("exit", { code }));

async function main() {
  await loadVoices();
  server.listen(config.port, config.host, () => {
    console.log("synth-dispatch listening", {
      pid: process.pid,
      host: config.host,
      port: config.port,
      maxConcurrentInferences: config.maxConcurrentInferences
    });
  });
}

main().catch((err: unknown) => {
  logExit("startupError", describe(err));
  process.exit(1);
});
