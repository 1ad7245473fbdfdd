/**
 * Unit Tests: Logger level filtering
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { getLogLevel, logInfo, logWarn, setLogLevel, writeLog, type LogLevel } from "../utils/logger";

describe("setLogLevel", () => {
  let initial: LogLevel;

  beforeEach(() => {
    initial = getLogLevel();
  });

  afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
  });

  it("drops messages below the configured level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    setLogLevel("warn");
    logInfo("[Test] hidden");
    logWarn("[Test] shown", { chatId: "120363000000000001@g.us" });

    expect(getLogLevel()).toBe("warn");
    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[WARN] [Test] shown {"chatId":"120363000000000001@g.us"}');
  });

  it("lets debug through once lowered", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    setLogLevel("debug");
    writeLog("debug", "[Test] detail", { correlationId: "abcd1234" });

    expect(log).toHaveBeenCalledWith('[DEBUG] [abcd1234] [Test] detail {"correlationId":"abcd1234"}');
  });
});
