import { PublicKey } from "@solana/web3.js";
import { MalformedPayloadError } from "../errors.js";
import type { CreateEventData } from "./types.js";

// Anchor event discriminator, not interpreted here
export const EVENT_DISCRIMINATOR_LENGTH = 8;
export const PUBKEY_LENGTH = 32;
const LENGTH_PREFIX_BYTES = 4;

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Forward-only reader over a borsh-style buffer.
 * Every read checks bounds before moving the offset.
 */
class ByteCursor {
  private offset: number;
  private readonly view: DataView;

  constructor(private readonly data: Uint8Array, start: number) {
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.offset = start;
  }

  get remaining(): number {
    return this.data.length - this.offset;
  }

  private take(length: number, field: string): Uint8Array {
    if (length > this.remaining) {
      throw new MalformedPayloadError(
        `Field '${field}' needs ${length} bytes at offset ${this.offset}, only ${this.remaining} left`,
        field,
        this.offset
      );
    }
    const bytes = this.data.subarray(this.offset, this.offset + length);
    this.offset += length;
    return bytes;
  }

  readString(field: string): string {
    const prefixOffset = this.offset;
    this.take(LENGTH_PREFIX_BYTES, field);
    const length = this.view.getUint32(prefixOffset, true);
    const bytes = this.take(length, field);

    let text: string;
    try {
      text = utf8.decode(bytes);
    } catch {
      throw new MalformedPayloadError(
        `Field '${field}' at offset ${prefixOffset} is not valid UTF-8`,
        field,
        prefixOffset
      );
    }
    return text.replace(/\0+$/, "");
  }

  readPubkey(field: string): PublicKey {
    return new PublicKey(this.take(PUBKEY_LENGTH, field));
  }
}

/**
 * Decode a create event: 8-byte discriminator, then name, symbol and uri
 * (u32 LE length + UTF-8), then mint, bonding curve and user keys.
 * Trailing bytes (fields added by newer program versions) are ignored.
 */
export function decodeCreateEvent(data: Uint8Array): CreateEventData {
  if (data.length < EVENT_DISCRIMINATOR_LENGTH) {
    throw new MalformedPayloadError(
      `Payload of ${data.length} bytes is shorter than the ${EVENT_DISCRIMINATOR_LENGTH}-byte discriminator`,
      "discriminator",
      0
    );
  }

  const cursor = new ByteCursor(data, EVENT_DISCRIMINATOR_LENGTH);

  const name = cursor.readString("name");
  const symbol = cursor.readString("symbol");
  const uri = cursor.readString("uri");
  const mint = cursor.readPubkey("mint");
  const bondingCurve = cursor.readPubkey("bondingCurve");
  const user = cursor.readPubkey("user");

  return { name, symbol, uri, mint, bondingCurve, user };
}
