import { describe, it, expect } from "vitest";
import {
  isTokenCreationLogs,
  extractProgramData,
  decodeBase64Strict,
  extractCreateEvents,
} from "../../../src/parser/log-filter.js";
import {
  TEST_EVENT,
  TEST_MINT,
  TRADE_EVENT_DISCRIMINATOR,
  createCreateLogs,
  createTestPubkey,
  encodeCreateEvent,
  encodeCreateEventBody,
} from "../../mocks/solana.js";

const MARKER_LINE = "Program log: Instruction: InitializeMint2";

function dataLine(bytes: Buffer): string {
  return `Program data: ${bytes.toString("base64")}`;
}

describe("Log Filter", () => {
  describe("isTokenCreationLogs", () => {
    it("should detect the mint initialization marker", () => {
      expect(isTokenCreationLogs(["Program log: Instruction: Create", MARKER_LINE])).toBe(true);
    });

    it("should return false without the marker", () => {
      expect(isTokenCreationLogs(["Program log: Instruction: Buy", "Program log: Instruction: Transfer"])).toBe(false);
    });

    it("should return false for empty logs", () => {
      expect(isTokenCreationLogs([])).toBe(false);
    });
  });

  describe("extractProgramData", () => {
    it("should return the payload after the data prefix", () => {
      expect(extractProgramData("Program data: YWJj")).toBe("YWJj");
    });

    it("should return null for lines without the prefix", () => {
      expect(extractProgramData("Program log: Instruction: Create")).toBeNull();
    });

    it("should exclude payloads starting with vdt/", () => {
      expect(extractProgramData("Program data: vdt/007mYe4AAAA")).toBeNull();
    });

    it("should trim surrounding whitespace from the payload", () => {
      expect(extractProgramData("Program data: YWJj  ")).toBe("YWJj");
    });
  });

  describe("decodeBase64Strict", () => {
    it("should decode padded base64", () => {
      expect(decodeBase64Strict("YWJjZA==")).toEqual(Buffer.from("abcd"));
    });

    it("should reject characters outside the alphabet", () => {
      expect(decodeBase64Strict("YW*j")).toBeNull();
    });

    it("should reject unpadded partial groups", () => {
      expect(decodeBase64Strict("YWJjZ")).toBeNull();
    });

    it("should reject empty payloads", () => {
      expect(decodeBase64Strict("")).toBeNull();
    });
  });

  describe("extractCreateEvents", () => {
    it("should produce one event from the valid line and skip the vdt/ line", () => {
      const logs = createCreateLogs();
      expect(logs.filter((line) => line.startsWith("Program data: vdt/"))).toHaveLength(1);

      const events = extractCreateEvents(logs);

      expect(events).toHaveLength(1);
      expect(events[0].name).toBe("Test Token");
      expect(events[0].mint.toBase58()).toBe(TEST_MINT.toBase58());
    });

    it("should ignore data lines when the marker is missing", () => {
      const logs = ["Program log: Instruction: Buy", dataLine(encodeCreateEvent())];

      expect(extractCreateEvents(logs)).toEqual([]);
    });

    it("should skip a line that is not valid base64 and keep going", () => {
      const logs = [MARKER_LINE, "Program data: not*base64!", dataLine(encodeCreateEvent())];

      const events = extractCreateEvents(logs);

      expect(events).toHaveLength(1);
      expect(events[0].symbol).toBe("TEST");
    });

    it("should skip a line that fails to decode and keep going", () => {
      const truncated = encodeCreateEvent().subarray(0, 20);
      const logs = [MARKER_LINE, dataLine(Buffer.from(truncated)), dataLine(encodeCreateEvent())];

      const events = extractCreateEvents(logs);

      expect(events).toHaveLength(1);
      expect(events[0].uri).toBe(TEST_EVENT.uri);
    });

    it("should return several events in log order", () => {
      const second = { ...TEST_EVENT, name: "Second", symbol: "TWO", mint: createTestPubkey(9) };
      const logs = [MARKER_LINE, dataLine(encodeCreateEvent()), dataLine(encodeCreateEvent(second))];

      const events = extractCreateEvents(logs);

      expect(events.map((event) => event.symbol)).toEqual(["TEST", "TWO"]);
      expect(events[1].mint.toBase58()).toBe(createTestPubkey(9).toBase58());
    });

    it("should not decode an otherwise valid body behind the excluded prefix", () => {
      const excluded = Buffer.concat([TRADE_EVENT_DISCRIMINATOR, encodeCreateEventBody(TEST_EVENT)]);
      const logs = [MARKER_LINE, dataLine(excluded)];

      expect(dataLine(excluded).startsWith("Program data: vdt/")).toBe(true);
      expect(extractCreateEvents(logs)).toEqual([]);
    });
  });
});
