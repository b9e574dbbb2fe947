import { describe, expect, it } from "vitest";
import { createLogger, createPinoOptions } from "./logger.js";

describe("createPinoOptions", () => {
  it("tags records with env and service", () => {
    const options = createPinoOptions({ env: "test", level: "debug", service: "cli" });

    expect(options.level).toBe("debug");
    expect(options.base).toEqual({ env: "test", service: "cli" });
  });
});

describe("createLogger", () => {
  it("honours the configured level", () => {
    const logger = createLogger({
      env: "test",
      level: "warn",
      service: "cli",
      destination: "stderr",
    });

    expect(logger.level).toBe("warn");
    expect(logger.isLevelEnabled("debug")).toBe(false);
    expect(logger.isLevelEnabled("error")).toBe(true);
  });
});

describe("createLogger with a stream", () => {
  it("writes JSON records to the given stream", () => {
    const lines: string[] = [];
    const logger = createLogger({
      env: "test",
      level: "debug",
      service: "rocketapi",
      destination: { write: (line: string) => void lines.push(line) },
    });

    logger.debug({ method: "instagram/search" }, "hello");

    expect(lines).toHaveLength(1);
    const record: unknown = JSON.parse(lines[0] ?? "");
    expect(record).toMatchObject({
      level: 20,
      env: "test",
      service: "rocketapi",
      method: "instagram/search",
      msg: "hello",
    });
  });
});
