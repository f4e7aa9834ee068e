import WebSocket from "ws";
import { config } from "../config.js";
import { createChildLogger } from "../logger.js";

const logger = createChildLogger("transport");

export interface TransportHandlers {
  onOpen: () => void;
  onMessage: (text: string) => void;
  onError: (error: Error) => void;
  onClose: (code: number, reason: string) => void;
}

/**
 * Text-frame connection used by a subscription session.
 * `onClose` fires exactly once per transport.
 */
export interface LogsTransport {
  send(text: string): void;
  close(): void;
}

export type TransportFactory = (url: string, handlers: TransportHandlers) => LogsTransport;

export interface WsTransportOptions {
  pingIntervalMs?: number;
  pingTimeoutMs?: number;
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf-8");
  return data.toString("utf-8");
}

/**
 * Open a websocket with a ping/pong heartbeat.
 * A missing pong terminates the socket, which surfaces as a close.
 */
export function createWsTransport(
  url: string,
  handlers: TransportHandlers,
  options: WsTransportOptions = {}
): LogsTransport {
  const pingIntervalMs = options.pingIntervalMs ?? config.wsPingIntervalMs;
  const pingTimeoutMs = options.pingTimeoutMs ?? config.wsPingTimeoutMs;

  const socket = new WebSocket(url);
  let heartbeatTimer: NodeJS.Timeout | null = null;
  let pongTimer: NodeJS.Timeout | null = null;

  const stopHeartbeat = (): void => {
    if (heartbeatTimer) {
      clearInterval(heartbeatTimer);
      heartbeatTimer = null;
    }
    if (pongTimer) {
      clearTimeout(pongTimer);
      pongTimer = null;
    }
  };

  socket.on("open", () => {
    heartbeatTimer = setInterval(() => {
      if (socket.readyState !== WebSocket.OPEN || pongTimer) return;
      socket.ping();
      pongTimer = setTimeout(() => {
        logger.warn({ pingTimeoutMs }, "No pong received, terminating socket");
        socket.terminate();
      }, pingTimeoutMs);
    }, pingIntervalMs);
    handlers.onOpen();
  });

  socket.on("pong", () => {
    if (pongTimer) {
      clearTimeout(pongTimer);
      pongTimer = null;
    }
  });

  socket.on("message", (data) => {
    handlers.onMessage(rawDataToString(data));
  });

  socket.on("error", (error) => {
    handlers.onError(error);
  });

  socket.on("close", (code, reason) => {
    stopHeartbeat();
    handlers.onClose(code, reason.toString("utf-8"));
  });

  return {
    send(text: string): void {
      socket.send(text);
    },
    close(): void {
      stopHeartbeat();
      if (socket.readyState === WebSocket.CONNECTING) {
        socket.terminate();
        return;
      }
      socket.close();
    },
  };
}
