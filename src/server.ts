// Voice Command Relay - WebSocket Handler and Express Server
// Clients stream PCM audio and control messages in; the relay's state, detector
// events and text-sink edits are broadcast back to every connected client.
//
// Privacy: audio chunks are in-memory only, never written to disk.

import express, { type Express } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import type { VoiceRelay } from "./voice-relay.js";
import type { BroadcastTextSink, SinkOperation } from "./text-sink.js";
import type { TriggerConfigProvider } from "./trigger-config.js";
import type { ClientMessage, ResetOutcome, ServerMessage } from "./types.js";
import type { RelayEvent } from "./event-bus.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";
import { toErrorMessage } from "./errors.js";

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  relay: VoiceRelay;
  /** The sink the relay writes to; its operations are broadcast to clients. */
  sink: BroadcastTextSink;
  /** Used to put owner names on trigger notifications. */
  triggers?: TriggerConfigProvider;
  /** Directory to serve static files from. Nothing is served when omitted. */
  staticDir?: string;
  /** Custom logger. Defaults to console-based logger. */
  logger?: Logger;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  relay: VoiceRelay;
  /** Start listening on the given port (0 picks a free one). Resolves with the bound port. */
  listen(port: number): Promise<number>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const { relay, sink, triggers, staticDir, logger = createConsoleLogger("Server") } = options;

  const app = express();
  const httpServer = createServer(app);

  if (staticDir) {
    app.use(express.static(staticDir));
  }

  // Health check endpoint
  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/status", (_req, res) => {
    res.json(relay.getStatus(sink.text));
  });

  // WebSocket server attached to the HTTP server
  const wss = new WebSocketServer({ server: httpServer });

  const broadcast = (message: ServerMessage) => {
    const payload = JSON.stringify(message);
    for (const client of wss.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    }
  };

  const unsubscribeBus = relay.bus.onAny((event) => {
    const message = toServerMessage(event, relay, triggers);
    if (message) broadcast(message);
  });
  const unsubscribeSink = sink.subscribe((operation) => {
    broadcast(sinkOperationToMessage(operation));
  });

  wss.on("connection", (ws: WebSocket) => {
    handleConnection(ws, relay, sink, logger);
  });

  return {
    app,
    httpServer,
    wss,
    relay,
    listen(port: number): Promise<number> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          const address = httpServer.address();
          const bound = typeof address === "object" && address !== null ? address.port : port;
          logger.info(`Server listening on port ${bound}`);
          resolve(bound);
        });
      });
    },
    close(): Promise<void> {
      unsubscribeBus();
      unsubscribeSink();
      return new Promise((resolve, reject) => {
        // Close all WebSocket connections
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          if (!httpServer.listening) {
            resolve();
            return;
          }
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

// ─── Event translation ──────────────────────────────────────────────────────────

function toServerMessage(
  event: RelayEvent,
  relay: VoiceRelay,
  triggers: TriggerConfigProvider | undefined,
): ServerMessage | null {
  switch (event.type) {
    case "listening":
      return { type: "state_change", state: relay.controller.state, listening: event.listening };
    case "deadline_warning":
      return { type: "deadline_warning", remainingMs: event.remainingMs };
    case "error":
      return { type: "error", message: event.error.message, recoverable: event.recoverable };
    case "detector": {
      const detectorEvent = event.event;
      switch (detectorEvent.type) {
        case "trigger_fired":
          return {
            type: "trigger_fired",
            owner: detectorEvent.owner,
            ownerName: triggers?.getOwner(detectorEvent.owner)?.name ?? detectorEvent.owner,
            score: detectorEvent.match.score,
          };
        case "buffer_updated":
          return { type: "buffer_updated", owner: detectorEvent.owner, text: detectorEvent.text };
        case "command_committed":
          return { type: "command_committed", owner: detectorEvent.owner, command: detectorEvent.command };
      }
    }
    default:
      return null;
  }
}

function sinkOperationToMessage(operation: SinkOperation): ServerMessage {
  switch (operation.type) {
    case "edit":
      return { type: "edit", deleteCount: operation.edit.deleteCount, appendText: operation.edit.appendText };
    case "clear":
      return { type: "clear" };
    case "commit":
      return { type: "commit", text: operation.text };
  }
}

// ─── Client message parsing ─────────────────────────────────────────────────────

const CLIENT_MESSAGE_TYPES: ReadonlySet<string> = new Set<ClientMessage["type"]>([
  "start_listening",
  "stop_listening",
  "commit",
  "toggle",
  "refresh",
  "get_status",
]);

function isClientMessageType(value: unknown): value is ClientMessage["type"] {
  return typeof value === "string" && CLIENT_MESSAGE_TYPES.has(value);
}

/**
 * Parses a text frame into a client message.
 * @throws Error for invalid JSON or an unknown message type.
 */
export function parseClientMessage(text: string): ClientMessage {
  const data: unknown = JSON.parse(text);
  if (typeof data !== "object" || data === null || !("type" in data)) {
    throw new Error("Client messages must be JSON objects with a \"type\" field.");
  }
  if (!isClientMessageType(data.type)) {
    throw new Error(`Unknown message type: ${String(data.type)}`);
  }
  return { type: data.type };
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

function handleConnection(ws: WebSocket, relay: VoiceRelay, sink: BroadcastTextSink, logger: Logger): void {
  logger.info(`New WebSocket connection (${relay.controller.state})`);

  // Send initial state
  sendMessage(ws, { type: "state_change", state: relay.controller.state, listening: relay.controller.listening });
  sendMessage(ws, { type: "snapshot", text: sink.text });

  ws.on("message", (data: RawData, isBinary: boolean) => {
    try {
      const buffer = toBuffer(data);
      if (isBinary) {
        handleBinaryMessage(ws, buffer, relay, logger);
      } else {
        handleClientMessage(ws, parseClientMessage(buffer.toString("utf-8")), relay, sink, logger);
      }
    } catch (err) {
      const errorMessage = toErrorMessage(err);
      logger.error(`Error handling message: ${errorMessage}`);
      sendMessage(ws, {
        type: "error",
        message: errorMessage,
        recoverable: true,
      });
    }
  });

  ws.on("close", () => {
    logger.info("WebSocket closed");
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error: ${err.message}`);
  });
}

// ─── Binary Message Handler (Audio Chunks) ──────────────────────────────────────

function handleBinaryMessage(ws: WebSocket, data: Buffer, relay: VoiceRelay, logger: Logger): void {
  // Validate chunk byte alignment (16-bit PCM = 2 bytes per sample)
  if (data.length % 2 !== 0) {
    sendMessage(ws, {
      type: "error",
      message: `Audio chunk byte length (${data.length}) is not a multiple of 2. Expected 16-bit aligned PCM data.`,
      recoverable: true,
    });
    return;
  }

  // Chunks arriving between sessions (during a reset) are dropped
  if (!relay.feedAudio(data)) {
    logger.debug(`Dropped ${data.length} audio bytes: no active session`);
  }
}

// ─── JSON Client Message Handler ────────────────────────────────────────────────

function handleClientMessage(
  ws: WebSocket,
  message: ClientMessage,
  relay: VoiceRelay,
  sink: BroadcastTextSink,
  logger: Logger,
): void {
  // Helper to catch errors from async handlers and send them to the client
  const catchAsync = (promise: Promise<void>) => {
    promise.catch((err: unknown) => {
      const errorMessage = toErrorMessage(err);
      logger.error(`Async error handling "${message.type}": ${errorMessage}`);
      sendMessage(ws, {
        type: "error",
        message: errorMessage,
        recoverable: true,
      });
    });
  };

  const reportIgnored = (outcome: ResetOutcome) => {
    if (outcome.status === "ignored") {
      sendMessage(ws, {
        type: "error",
        message: `"${message.type}" ignored: relay is ${outcome.state}.`,
        recoverable: true,
      });
    }
  };

  switch (message.type) {
    case "start_listening":
      catchAsync(relay.start());
      break;

    case "stop_listening":
      catchAsync(relay.stop());
      break;

    case "toggle":
      catchAsync(relay.toggle());
      break;

    case "commit":
      catchAsync(relay.commit().then(reportIgnored));
      break;

    case "refresh":
      catchAsync(relay.refresh().then(reportIgnored));
      break;

    case "get_status":
      sendMessage(ws, { type: "status", status: relay.getStatus(sink.text) });
      break;

    default: {
      const exhaustiveCheck: never = message;
      sendMessage(ws, {
        type: "error",
        message: `Unknown message type: ${JSON.stringify(exhaustiveCheck)}`,
        recoverable: true,
      });
    }
  }
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}
