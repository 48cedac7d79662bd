import { describe, it, expect } from "vitest";
import { createLogger, normalizeLogLevel } from "../../../src/utils/logger.js";

describe("normalizeLogLevel", () => {
  it("maps common level names onto pino levels", () => {
    expect(normalizeLogLevel("DEBUG")).toBe("debug");
    expect(normalizeLogLevel("WARNING")).toBe("warn");
    expect(normalizeLogLevel("CRITICAL")).toBe("fatal");
    expect(normalizeLogLevel(" error ")).toBe("error");
  });

  it("defaults to info", () => {
    expect(normalizeLogLevel(undefined)).toBe("info");
    expect(normalizeLogLevel("")).toBe("info");
    expect(normalizeLogLevel("verbose")).toBe("info");
  });
});

describe("createLogger", () => {
  it("builds a plain stderr logger without the pretty transport", () => {
    const logger = createLogger({ name: "bootstrap", level: "WARNING", destination: "stderr", pretty: false });

    expect(logger.level).toBe("warn");
    expect(logger.isLevelEnabled("info")).toBe(false);
    expect(logger.isLevelEnabled("error")).toBe(true);
  });
});
