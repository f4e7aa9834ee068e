import type { CsvSink } from "../db/csv-sink.js";
import { errorMessage } from "../errors.js";
import { createChildLogger } from "../logger.js";
import { extractCreateEvents } from "../parser/log-filter.js";
import {
  toPersistedRecord,
  type LogsNotification,
  type PersistedRecord,
  type TokenCreationEvent,
  type TokenMetadata,
} from "../parser/types.js";
import { emptyMetadata, fetchTokenMetadata } from "./metadata.js";

const logger = createChildLogger("pipeline");

export type MetadataFetcher = (uri: string) => Promise<TokenMetadata>;

export interface TokenPipelineOptions {
  sink: CsvSink<PersistedRecord>;
  fetchMetadata?: MetadataFetcher;
  now?: () => Date;
}

export interface PipelineStats {
  notifications: number;
  skippedFailedTx: number;
  tokensLogged: number;
  writeFailures: number;
}

/**
 * UTC timestamp with second precision: `YYYY-MM-DD HH:MM:SS`
 */
export function formatMintTime(date: Date): string {
  return date.toISOString().slice(0, 19).replace("T", " ");
}

/**
 * Filter → decode → enrich → write for one logs notification.
 * Record-level failures are logged and never thrown.
 */
export class TokenPipeline {
  private readonly sink: CsvSink<PersistedRecord>;
  private readonly fetchMetadata: MetadataFetcher;
  private readonly now: () => Date;
  private stats: PipelineStats = {
    notifications: 0,
    skippedFailedTx: 0,
    tokensLogged: 0,
    writeFailures: 0,
  };

  constructor(options: TokenPipelineOptions) {
    this.sink = options.sink;
    this.fetchMetadata = options.fetchMetadata || ((uri) => fetchTokenMetadata(uri));
    this.now = options.now || (() => new Date());
  }

  async handleNotification(notification: LogsNotification): Promise<void> {
    const { context, value } = notification.params.result;
    this.stats.notifications++;

    if (value.err) {
      this.stats.skippedFailedTx++;
      logger.debug({ signature: value.signature }, "Transaction failed, skipping");
      return;
    }

    const events = extractCreateEvents(value.logs);
    if (events.length === 0) return;

    logger.debug({ signature: value.signature, slot: context.slot, eventCount: events.length }, "Token creation detected");

    for (const data of events) {
      const event: TokenCreationEvent = { ...data, mintTime: formatMintTime(this.now()) };
      await this.processEvent(event, value.signature);
    }
  }

  getStats(): PipelineStats {
    return { ...this.stats };
  }

  private async processEvent(event: TokenCreationEvent, signature: string): Promise<void> {
    logger.info({ name: event.name, mint: event.mint.toBase58() }, "Fetching metadata");

    let metadata: TokenMetadata;
    try {
      metadata = await this.fetchMetadata(event.uri);
    } catch (error) {
      logger.warn({ uri: event.uri, error: errorMessage(error) }, "Metadata fetcher failed, using NA");
      metadata = emptyMetadata();
    }

    const record = toPersistedRecord(event, metadata);

    try {
      await this.sink.append(record);
    } catch (error) {
      this.stats.writeFailures++;
      logger.error(
        { error: errorMessage(error), signature, mint: record.mint, writeFailures: this.stats.writeFailures },
        "Failed to write token record, dropping it"
      );
      return;
    }

    this.stats.tokensLogged++;
    logger.info({ name: record.name, symbol: record.symbol, mint: record.mint }, "Logged token");
  }
}
