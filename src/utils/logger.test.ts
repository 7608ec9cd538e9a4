import { describe, it, expect } from "vitest";
import { Chalk } from "chalk";
import { Logger } from "./logger";

function collect(level: "debug" | "info" | "warn" | "error") {
  const lines: string[] = [];
  const logger = new Logger({
    level,
    write: (line) => lines.push(line),
    chalk: new Chalk({ level: 0 }),
  });
  return { logger, lines };
}

describe("Logger", () => {
  it("prefixes each level", () => {
    const { logger, lines } = collect("debug");
    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");
    expect(lines).toEqual(["[DEBUG] d", "[INFO] i", "[WARN] w", "[ERROR] e"]);
  });

  it("drops messages below the level", () => {
    const { logger, lines } = collect("warn");
    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    expect(lines).toEqual(["[WARN] w"]);
  });

  it("always prints errors", () => {
    const { logger, lines } = collect("error");
    logger.warn("w");
    logger.error("e", new Error("boom"));
    expect(lines).toEqual(["[ERROR] e"]);
  });
});
