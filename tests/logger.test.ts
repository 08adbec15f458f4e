import { describe, it, expect, vi, afterEach } from "vitest";
import { createRelayLogger, rolePrefix } from "../src/logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

/**
 * Spy on console output. Must run BEFORE creating the logger, since
 * Winston binds console methods in the Console transport constructor.
 */
function captureConsole(): () => string[] {
  const spies = (["log", "warn", "error", "debug", "info"] as const).map((method) =>
    vi.spyOn(console, method).mockImplementation(() => {}),
  );
  return () => spies.flatMap((spy) => spy.mock.calls.map((args) => args.map(String).join(" ")));
}

describe("createRelayLogger", () => {
  it("returns a RelayLogger-compatible object", () => {
    const logger = createRelayLogger();
    expect(typeof logger.info).toBe("function");
    expect(typeof logger.warn).toBe("function");
    expect(typeof logger.error).toBe("function");
    expect(typeof logger.debug).toBe("function");
  });

  it("writes one prefixed, timestamped line per message", () => {
    const lines = captureConsole();
    const logger = createRelayLogger({ prefix: "worker:cam-1" });
    logger.info("Registration acknowledged");

    expect(lines()).toHaveLength(1);
    expect(lines()[0]).toMatch(
      /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}\S* \[worker:cam-1:info\] Registration acknowledged$/,
    );
  });

  it("uses default prefix 'camrelay'", () => {
    const lines = captureConsole();
    createRelayLogger().warn("msg");
    expect(lines().some((line) => line.includes("[camrelay:warn] msg"))).toBe(true);
  });

  it("warn level suppresses debug and info", () => {
    const lines = captureConsole();
    const logger = createRelayLogger({ level: "warn", prefix: "test" });
    logger.debug("dbg-suppressed");
    logger.info("info-suppressed");
    logger.warn("warn-visible");
    logger.error("error-visible");

    const output = lines().join("\n");
    expect(output).not.toContain("dbg-suppressed");
    expect(output).not.toContain("info-suppressed");
    expect(output).toContain("warn-visible");
    expect(output).toContain("error-visible");
  });

  it("debug level shows everything", () => {
    const lines = captureConsole();
    const logger = createRelayLogger({ level: "debug", prefix: "test" });
    logger.debug("dbg-msg");
    logger.info("inf-msg");

    const output = lines().join("\n");
    expect(output).toContain("[test:debug] dbg-msg");
    expect(output).toContain("[test:info] inf-msg");
  });

  it("tags lines with the process role", () => {
    const lines = captureConsole();
    createRelayLogger({ role: "worker", deviceId: "cam-2" }).info("up");
    createRelayLogger({ role: "relay" }).info("up");

    expect(lines().map((line) => line.slice(line.indexOf(" ") + 1))).toEqual([
      "[worker:cam-2:info] up",
      "[relay:info] up",
    ]);
  });

  it("an explicit prefix wins over the role", () => {
    const lines = captureConsole();
    createRelayLogger({ role: "controller", prefix: "ops" }).warn("hi");
    expect(lines()[0]?.endsWith(" [ops:warn] hi")).toBe(true);
  });

  it("silent discards everything", () => {
    const lines = captureConsole();
    const logger = createRelayLogger({ silent: true, level: "debug" });
    logger.error("nothing");
    logger.debug("nothing");
    expect(lines()).toEqual([]);
  });
});

describe("rolePrefix", () => {
  it("adds the device id for workers only", () => {
    expect(rolePrefix("worker", "cam-1")).toBe("worker:cam-1");
    expect(rolePrefix("worker")).toBe("worker");
    expect(rolePrefix("controller", "cam-1")).toBe("controller");
  });
});
