import { describe, expect, it } from "vitest";
import { createStderrLogger, parseLogLevel } from "./logger.js";

const captureSink = (): { chunks: string[]; write: (chunk: string) => boolean } => {
  const chunks: string[] = [];
  return {
    chunks,
    write: (chunk) => {
      chunks.push(chunk);
      return true;
    },
  };
};

describe("createStderrLogger", () => {
  it("drops messages above the configured level", () => {
    const sink = captureSink();
    const logger = createStderrLogger("warn", sink);

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");
    logger.error("also shown");

    expect(sink.chunks).toEqual(["[churnlog] WARN shown\n", "[churnlog] ERROR also shown\n"]);
  });

  it("prefixes every line of a multi-line message", () => {
    const sink = captureSink();
    createStderrLogger("info", sink).error("first\nsecond");

    expect(sink.chunks).toEqual(["[churnlog] ERROR first\n[churnlog] ERROR second\n"]);
  });

  it("writes nothing when silent", () => {
    const sink = captureSink();
    createStderrLogger("silent", sink).error("nope");

    expect(sink.chunks).toEqual([]);
  });
});

describe("parseLogLevel", () => {
  it("accepts known levels and falls back otherwise", () => {
    expect(parseLogLevel("debug")).toBe("debug");
    expect(parseLogLevel("loud")).toBe("info");
    expect(parseLogLevel(undefined, "warn")).toBe("warn");
  });
});
