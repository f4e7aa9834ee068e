import {
  INITIALIZE_MINT_MARKER,
  PROGRAM_DATA_PREFIX,
  EXCLUDED_DATA_PREFIX,
} from "../constants.js";
import { errorMessage } from "../errors.js";
import { createChildLogger } from "../logger.js";
import { decodeCreateEvent } from "./decoder.js";
import type { CreateEventData } from "./types.js";

const logger = createChildLogger("log-filter");

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * True when the transaction logs contain the mint initialization of a new token
 */
export function isTokenCreationLogs(logs: readonly string[]): boolean {
  return logs.join("").includes(INITIALIZE_MINT_MARKER);
}

/**
 * Pull the base64 payload out of a `Program data:` line.
 * Returns null for other lines and for the excluded co-emitted event.
 */
export function extractProgramData(line: string): string | null {
  const index = line.indexOf(PROGRAM_DATA_PREFIX);
  if (index === -1) return null;

  const payload = line.slice(index + PROGRAM_DATA_PREFIX.length).trim();
  if (payload.startsWith(EXCLUDED_DATA_PREFIX)) return null;
  return payload;
}

export function decodeBase64Strict(payload: string): Buffer | null {
  if (payload.length === 0 || !BASE64_PATTERN.test(payload)) return null;
  return Buffer.from(payload, "base64");
}

/**
 * Decode every create event carried by one logs notification.
 * Bad lines are logged and skipped; the remaining lines still run.
 */
export function extractCreateEvents(logs: readonly string[]): CreateEventData[] {
  if (!isTokenCreationLogs(logs)) return [];

  const events: CreateEventData[] = [];

  logs.forEach((line, lineIndex) => {
    const payload = extractProgramData(line);
    if (payload === null) return;

    const bytes = decodeBase64Strict(payload);
    if (!bytes) {
      logger.warn({ lineIndex, payload: payload.slice(0, 64) }, "Program data is not valid base64, skipping line");
      return;
    }

    try {
      events.push(decodeCreateEvent(bytes));
    } catch (error) {
      logger.warn({ lineIndex, bytes: bytes.length, error: errorMessage(error) }, "Failed to decode create event, skipping line");
    }
  });

  return events;
}
