import { describe, it, expect } from "vitest";
import {
  LINE_TRUNCATED_MARKER,
  processAsRingBuffer,
} from "../ring-buffer.js";
import { LogReadError } from "../errors.js";

async function* chunks(...parts: Array<string | Uint8Array>): AsyncGenerator<string | Uint8Array> {
  for (const part of parts) {
    yield part;
  }
}

describe("processAsRingBuffer", () => {
  it("should keep the last N lines and count all of them", async () => {
    const result = await processAsRingBuffer(chunks("L1\nL2\nL3\nL4\nL5\n"), 3);
    expect(result).toEqual({ content: "L3\nL4\nL5", totalLines: 5 });
  });

  it("should keep every line when under the limit", async () => {
    const result = await processAsRingBuffer(chunks("a\nb"), 10);
    expect(result).toEqual({ content: "a\nb", totalLines: 2 });
  });

  it("should join lines split across chunks", async () => {
    const result = await processAsRingBuffer(chunks("fir", "st\nsec", "ond\n"), 5);
    expect(result).toEqual({ content: "first\nsecond", totalLines: 2 });
  });

  it("should decode multi-byte characters split across chunks", async () => {
    const bytes = new TextEncoder().encode("café\nok\n");
    const result = await processAsRingBuffer(chunks(bytes.slice(0, 4), bytes.slice(4)), 5);
    expect(result).toEqual({ content: "café\nok", totalLines: 2 });
  });

  it("should strip carriage returns", async () => {
    const result = await processAsRingBuffer(chunks("one\r\ntwo\r\n"), 5);
    expect(result.content).toBe("one\ntwo");
  });

  it("should keep empty lines", async () => {
    const result = await processAsRingBuffer(chunks("a\n\nb\n"), 5);
    expect(result).toEqual({ content: "a\n\nb", totalLines: 3 });
  });

  it("should handle an empty stream", async () => {
    const result = await processAsRingBuffer(chunks(), 5);
    expect(result).toEqual({ content: "", totalLines: 0 });
  });

  it("should keep at least one line for a non-positive limit", async () => {
    const result = await processAsRingBuffer(chunks("a\nb\n"), 0);
    expect(result).toEqual({ content: "b", totalLines: 2 });
  });

  describe("over-long lines", () => {
    it("should replace the first over-long line with a marker", async () => {
      const long = "x".repeat(20);
      const result = await processAsRingBuffer(chunks(`short\n${long}\nafter\n`), 10, {
        maxLineLength: 10,
      });
      expect(result).toEqual({
        content: `short\n${LINE_TRUNCATED_MARKER}\nafter`,
        totalLines: 3,
      });
    });

    it("should measure the ceiling in UTF-8 bytes", async () => {
      // four 3-byte characters: 4 code units, 12 bytes
      const result = await processAsRingBuffer(chunks(`${"x".repeat(10)}\n€€€€\nafter\n`), 10, {
        maxLineLength: 10,
      });
      expect(result).toEqual({
        content: `${"x".repeat(10)}\n${LINE_TRUNCATED_MARKER}\nafter`,
        totalLines: 3,
      });
    });

    it("should measure later lines in UTF-8 bytes too", async () => {
      const result = await processAsRingBuffer(
        chunks(`${"y".repeat(15)}\n€€€€\n${"x".repeat(10)}\n`),
        10,
        { maxLineLength: 10 },
      );
      expect(result).toEqual({
        content: `${LINE_TRUNCATED_MARKER}\n€€€€... [TRUNCATED]\n${"x".repeat(10)}`,
        totalLines: 3,
      });
    });

    it("should truncate later over-long lines to a prefix", async () => {
      const first = "y".repeat(15);
      const second = "z".repeat(1200);
      const result = await processAsRingBuffer(chunks(`${first}\n${second}\nend`), 10, {
        maxLineLength: 10,
      });
      expect(result.content).toBe(
        `${LINE_TRUNCATED_MARKER}\n${"z".repeat(1000)}... [TRUNCATED]\nend`,
      );
      expect(result.totalLines).toBe(3);
    });

    it("should skip the rest of a line that overflows without a newline", async () => {
      const result = await processAsRingBuffer(
        chunks("q".repeat(12), "q".repeat(12), "\ntail\n"),
        10,
        { maxLineLength: 10 },
      );
      expect(result).toEqual({ content: `${LINE_TRUNCATED_MARKER}\ntail`, totalLines: 2 });
    });
  });

  it("should wrap stream failures in LogReadError", async () => {
    async function* failing(): AsyncGenerator<string> {
      yield "partial\n";
      throw new Error("connection reset");
    }

    await expect(processAsRingBuffer(failing(), 5)).rejects.toThrow(LogReadError);
    await expect(processAsRingBuffer(failing(), 5)).rejects.toThrow(
      "failed to read log content: connection reset",
    );
  });
});
