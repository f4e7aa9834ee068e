import type { PublicKey } from "@solana/web3.js";
import { PERSISTED_COLUMNS } from "../constants.js";

// Wire fields of the pump.fun create event, in wire order
export interface CreateEventData {
  name: string;
  symbol: string;
  uri: string;
  mint: PublicKey;
  bondingCurve: PublicKey;
  user: PublicKey;
}

export interface TokenCreationEvent extends Readonly<CreateEventData> {
  /** UTC, `YYYY-MM-DD HH:MM:SS`, stamped once the payload decoded */
  readonly mintTime: string;
}

/**
 * Off-chain metadata links. Each value is an absolute URL or "NA".
 */
export interface TokenMetadata {
  image: string;
  twitter: string;
  telegram: string;
  website: string;
}

export type PersistedColumn = (typeof PERSISTED_COLUMNS)[number];

export type PersistedRecord = Record<PersistedColumn, string>;

// logsSubscribe notification envelope
export interface LogsNotificationValue {
  signature: string;
  err: unknown;
  logs: string[];
}

export interface LogsNotification {
  jsonrpc: "2.0";
  method: "logsNotification";
  params: {
    subscription: number;
    result: {
      context: { slot: number };
      value: LogsNotificationValue;
    };
  };
}

export function toPersistedRecord(event: TokenCreationEvent, metadata: TokenMetadata): PersistedRecord {
  return {
    name: event.name,
    symbol: event.symbol,
    uri: event.uri,
    mint: event.mint.toBase58(),
    bonding_curve: event.bondingCurve.toBase58(),
    user: event.user.toBase58(),
    mint_time: event.mintTime,
    image: metadata.image,
    twitter: metadata.twitter,
    telegram: metadata.telegram,
    website: metadata.website,
  };
}
