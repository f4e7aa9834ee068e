import PQueue from "p-queue";
import { config, type CommitmentLevel } from "../config.js";
import { TransportError, errorMessage } from "../errors.js";
import { createChildLogger } from "../logger.js";
import type { LogsNotification } from "../parser/types.js";
import { createWsTransport, type LogsTransport, type TransportFactory } from "./transport.js";

const logger = createChildLogger("websocket");

export const SUBSCRIBE_REQUEST_ID = 1;

export type SessionState = "connecting" | "subscribed" | "receiving" | "closed";

/**
 * closed: remote end or heartbeat closed the socket
 * error: socket error (connect failure, protocol error)
 * rejected: RPC node answered the subscribe request with an error
 * stopped: close() was called
 */
export type SessionCloseReason = "closed" | "error" | "rejected" | "stopped";

export interface SessionResult {
  reason: SessionCloseReason;
  subscribed: boolean;
  notifications: number;
  error?: TransportError;
}

export interface LogsSubscriptionOptions {
  onNotification: (notification: LogsNotification) => Promise<void>;
  onSubscribed?: (subscriptionId: number) => void;
  wsUrl?: string;
  programId?: string;
  commitment?: CommitmentLevel;
  transportFactory?: TransportFactory;
}

export function buildSubscribeRequest(programId: string, commitment: CommitmentLevel) {
  return {
    jsonrpc: "2.0",
    id: SUBSCRIBE_REQUEST_ID,
    method: "logsSubscribe",
    params: [{ mentions: [programId] }, { commitment }],
  } as const;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate a logsNotification envelope. Returns null for any other message.
 */
export function toLogsNotification(message: Record<string, unknown>): LogsNotification | null {
  if (message.method !== "logsNotification") return null;

  const params = message.params;
  if (!isRecord(params) || !isRecord(params.result)) return null;

  const { context, value } = params.result;
  if (!isRecord(value)) return null;

  const logs = value.logs;
  if (!Array.isArray(logs) || !logs.every((line): line is string => typeof line === "string")) {
    return null;
  }

  return {
    jsonrpc: "2.0",
    method: "logsNotification",
    params: {
      subscription: typeof params.subscription === "number" ? params.subscription : -1,
      result: {
        context: { slot: isRecord(context) && typeof context.slot === "number" ? context.slot : 0 },
        value: {
          signature: typeof value.signature === "string" ? value.signature : "",
          err: value.err ?? null,
          logs,
        },
      },
    },
  };
}

// Provider API keys live in the query string
export function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return `${parsed.protocol}//${parsed.host}${parsed.pathname}`;
  } catch {
    return "<invalid url>";
  }
}

/**
 * One websocket connection carrying one logsSubscribe subscription.
 *
 * Notifications are dispatched one at a time, in arrival order. A dispatch
 * failure is logged and never ends the session; only the transport does.
 * The session does not reconnect: run() resolves once the socket is gone
 * and the dispatch queue has drained.
 */
export class LogsSubscriptionSession {
  private readonly wsUrl: string;
  private readonly programId: string;
  private readonly commitment: CommitmentLevel;
  private readonly transportFactory: TransportFactory;
  private readonly onNotification: LogsSubscriptionOptions["onNotification"];
  private readonly onSubscribed?: LogsSubscriptionOptions["onSubscribed"];
  // Sequential dispatch keeps arrival order and a single sink writer
  private readonly queue = new PQueue({ concurrency: 1 });

  private state: SessionState = "connecting";
  private transport: LogsTransport | null = null;
  private started = false;
  private finished = false;
  private subscriptionId: number | null = null;
  private notifications = 0;
  private dispatchErrors = 0;
  private resolveRun: ((result: SessionResult) => void) | null = null;

  constructor(options: LogsSubscriptionOptions) {
    this.wsUrl = options.wsUrl || config.wsUrl;
    this.programId = options.programId || config.programId;
    this.commitment = options.commitment || config.commitment;
    this.transportFactory = options.transportFactory || createWsTransport;
    this.onNotification = options.onNotification;
    this.onSubscribed = options.onSubscribed;
  }

  run(): Promise<SessionResult> {
    if (this.started) {
      return Promise.reject(new Error("Session already started"));
    }
    this.started = true;

    if (this.finished) {
      return Promise.resolve({ reason: "stopped", subscribed: false, notifications: 0 });
    }

    return new Promise<SessionResult>((resolve) => {
      this.resolveRun = resolve;
      logger.info({ wsUrl: redactUrl(this.wsUrl) }, "Connecting to websocket");

      try {
        this.transport = this.transportFactory(this.wsUrl, {
          onOpen: () => this.handleOpen(),
          onMessage: (text) => this.handleMessage(text),
          onError: (error) => this.finish("error", new TransportError(error.message, { cause: error })),
          onClose: (code, reason) =>
            this.finish("closed", new TransportError(`Websocket closed (code ${code}${reason ? `: ${reason}` : ""})`)),
        });
      } catch (error) {
        this.finish("error", new TransportError(errorMessage(error), { cause: error }));
      }
    });
  }

  /**
   * End the session on request. Already-received notifications still drain.
   */
  close(): void {
    this.finish("stopped");
  }

  getState(): SessionState {
    return this.state;
  }

  getStats(): {
    state: SessionState;
    subscriptionId: number | null;
    notifications: number;
    dispatchErrors: number;
    queueSize: number;
  } {
    return {
      state: this.state,
      subscriptionId: this.subscriptionId,
      notifications: this.notifications,
      dispatchErrors: this.dispatchErrors,
      queueSize: this.queue.size,
    };
  }

  private handleOpen(): void {
    if (this.finished || !this.transport) return;

    try {
      this.transport.send(JSON.stringify(buildSubscribeRequest(this.programId, this.commitment)));
    } catch (error) {
      this.finish("error", new TransportError(`Failed to send subscribe request: ${errorMessage(error)}`, { cause: error }));
      return;
    }

    this.state = "subscribed";
    logger.info({ programId: this.programId, commitment: this.commitment }, "Subscribed to program logs");
  }

  private handleMessage(text: string): void {
    if (this.finished) return;

    let message: unknown;
    try {
      message = JSON.parse(text);
    } catch {
      logger.warn({ length: text.length }, "Received non-JSON message, skipping");
      return;
    }

    if (!isRecord(message)) {
      logger.warn("Received non-object message, skipping");
      return;
    }

    if (message.id === SUBSCRIBE_REQUEST_ID) {
      this.handleSubscribeReply(message);
      return;
    }

    const notification = toLogsNotification(message);
    if (!notification) {
      logger.debug({ method: message.method }, "Ignoring message");
      return;
    }

    this.notifications++;
    this.queue
      .add(() => this.dispatch(notification))
      .catch((error: unknown) => {
        logger.error({ error: errorMessage(error) }, "Dispatch queue failure");
      });
  }

  private handleSubscribeReply(message: Record<string, unknown>): void {
    if (typeof message.result === "number") {
      this.subscriptionId = message.result;
      this.state = "receiving";
      logger.info({ subscriptionId: this.subscriptionId }, "Websocket subscription active");
      this.onSubscribed?.(this.subscriptionId);
      return;
    }

    const detail = message.error === undefined ? "missing subscription id" : JSON.stringify(message.error);
    this.finish("rejected", new TransportError(`Subscription rejected: ${detail}`));
  }

  private async dispatch(notification: LogsNotification): Promise<void> {
    try {
      await this.onNotification(notification);
    } catch (error) {
      this.dispatchErrors++;
      logger.error(
        {
          error: errorMessage(error),
          signature: notification.params.result.value.signature,
          dispatchErrors: this.dispatchErrors,
        },
        "Error processing logs notification"
      );
    }
  }

  private finish(reason: SessionCloseReason, error?: TransportError): void {
    if (this.finished) return;
    this.finished = true;

    const subscribed = this.subscriptionId !== null;
    this.state = "closed";

    if (reason !== "closed" && this.transport) {
      try {
        this.transport.close();
      } catch (closeError) {
        logger.debug({ error: errorMessage(closeError) }, "Error closing transport");
      }
    }

    const result: SessionResult = { reason, subscribed, notifications: this.notifications };
    if (error) {
      result.error = error;
    }

    logger.info(
      { reason, error: error?.message, notifications: this.notifications, queueSize: this.queue.size },
      "Websocket session ended"
    );

    this.drainAndResolve(result).catch((drainError: unknown) => {
      logger.error({ error: errorMessage(drainError) }, "Failed to drain dispatch queue");
    });
  }

  private async drainAndResolve(result: SessionResult): Promise<void> {
    await this.queue.onIdle();
    this.resolveRun?.(result);
    this.resolveRun = null;
  }
}
