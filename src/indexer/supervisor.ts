import { config } from "../config.js";
import { RetryExhaustedError, errorMessage } from "../errors.js";
import { createChildLogger } from "../logger.js";
import type { SessionResult } from "./websocket.js";

const logger = createChildLogger("supervisor");

export type SupervisorState = "idle" | "connected" | "retrying" | "gave_up" | "stopped";

export interface SupervisedSession {
  run(): Promise<SessionResult>;
  close(): void;
}

export interface SessionHooks {
  /** Called once the session's subscription is confirmed */
  onSubscribed: () => void;
}

export type SessionFactory = (hooks: SessionHooks) => SupervisedSession;

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface ReconnectSupervisorOptions {
  createSession: SessionFactory;
  maxRetries?: number;
  backoffBase?: number;
  maxDelaySeconds?: number;
  sleep?: Sleep;
}

/**
 * Seconds to wait before reconnect attempt `attempt` (1-based)
 */
export function computeBackoffDelay(attempt: number, base: number, maxDelaySeconds: number): number {
  return Math.min(maxDelaySeconds, base ** attempt + (attempt % 2));
}

function interruptibleSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener("abort", done, { once: true });
  });
}

/**
 * Keeps one subscription session alive at a time.
 *
 * Every session end counts as a retry; a confirmed subscription resets the
 * count. Past `maxRetries` the supervisor gives up and run() rejects with
 * RetryExhaustedError so the caller can restart the whole process.
 */
export class ReconnectSupervisor {
  private readonly createSession: SessionFactory;
  private readonly maxRetries: number;
  private readonly backoffBase: number;
  private readonly maxDelaySeconds: number;
  private readonly sleep: Sleep;

  private state: SupervisorState = "idle";
  private retryCount = 0;
  private sessionsOpened = 0;
  private isRunning = false;
  private stopRequested = false;
  private activeSession: SupervisedSession | null = null;
  private readonly stopController = new AbortController();

  constructor(options: ReconnectSupervisorOptions) {
    this.createSession = options.createSession;
    this.maxRetries = options.maxRetries ?? config.maxRetries;
    this.backoffBase = options.backoffBase ?? config.backoffBase;
    this.maxDelaySeconds = options.maxDelaySeconds ?? config.backoffMaxDelaySeconds;
    this.sleep = options.sleep ?? interruptibleSleep;
  }

  async run(): Promise<void> {
    if (this.isRunning) {
      throw new Error("Supervisor already running");
    }
    this.isRunning = true;

    try {
      while (!this.stopRequested) {
        const result = await this.runSession();
        if (this.stopRequested) break;

        this.retryCount++;
        if (this.retryCount > this.maxRetries) {
          this.state = "gave_up";
          logger.error({ retryCount: this.retryCount, maxRetries: this.maxRetries }, "Maximum retries reached, giving up");
          throw new RetryExhaustedError(this.maxRetries);
        }

        const delaySeconds = computeBackoffDelay(this.retryCount, this.backoffBase, this.maxDelaySeconds);
        this.state = "retrying";
        logger.warn(
          {
            reason: result?.reason ?? "error",
            error: result?.error?.message,
            retryCount: this.retryCount,
            maxRetries: this.maxRetries,
            delaySeconds,
          },
          "Websocket session ended, reconnecting"
        );

        await this.sleep(delaySeconds * 1000, this.stopController.signal);
      }

      this.state = "stopped";
    } finally {
      this.isRunning = false;
    }
  }

  /**
   * Close the active session and make run() resolve
   */
  stop(): void {
    if (this.stopRequested) return;
    this.stopRequested = true;
    logger.info({ state: this.state }, "Stopping supervisor");
    this.stopController.abort();
    this.activeSession?.close();
  }

  getState(): SupervisorState {
    return this.state;
  }

  getRetryCount(): number {
    return this.retryCount;
  }

  getStats(): { state: SupervisorState; retryCount: number; sessionsOpened: number } {
    return { state: this.state, retryCount: this.retryCount, sessionsOpened: this.sessionsOpened };
  }

  private async runSession(): Promise<SessionResult | null> {
    try {
      this.activeSession = this.createSession({ onSubscribed: () => this.markConnected() });
      this.sessionsOpened++;
      return await this.activeSession.run();
    } catch (error) {
      logger.error({ error: errorMessage(error) }, "Websocket session failed");
      return null;
    } finally {
      this.activeSession = null;
    }
  }

  private markConnected(): void {
    if (this.retryCount > 0) {
      logger.info({ previousRetryCount: this.retryCount }, "Reconnected, retry counter reset");
    }
    this.retryCount = 0;
    this.state = "connected";
  }
}
