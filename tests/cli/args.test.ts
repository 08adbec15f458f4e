import { describe, it, expect } from "vitest";
import { parseCliArgs, parseControllerInput } from "../../src/cli/args.js";

describe("parseCliArgs", () => {
  it("parses relay with and without a port", () => {
    expect(parseCliArgs(["relay"])).toEqual({ ok: true, value: { command: "relay", port: undefined } });
    expect(parseCliArgs(["relay", "9000"])).toEqual({ ok: true, value: { command: "relay", port: 9000 } });
  });

  it("parses worker arguments", () => {
    expect(parseCliArgs(["worker", "PiZero-01", "192.168.1.100", "8080"])).toEqual({
      ok: true,
      value: { command: "worker", deviceId: "PiZero-01", host: "192.168.1.100", port: 8080 },
    });
  });

  it("parses controller arguments", () => {
    expect(parseCliArgs(["controller", "relay.local"])).toEqual({
      ok: true,
      value: { command: "controller", host: "relay.local", port: undefined },
    });
  });

  it("rejects bad ports", () => {
    expect(parseCliArgs(["relay", "0"])).toEqual({ ok: false, error: "Invalid port: 0" });
    expect(parseCliArgs(["relay", "65536"])).toEqual({ ok: false, error: "Invalid port: 65536" });
    expect(parseCliArgs(["controller", "h", "80a"])).toEqual({ ok: false, error: "Invalid port: 80a" });
  });

  it("rejects missing or invalid worker arguments", () => {
    expect(parseCliArgs(["worker", "cam-1"])).toEqual({
      ok: false,
      error: "worker needs <device-id> and <relay-host>",
    });
    expect(parseCliArgs(["worker", "cam:1", "h"])).toEqual({
      ok: false,
      error: 'Invalid device id "cam:1" (max 31 bytes, no ":")',
    });
  });

  it("treats no command as help", () => {
    expect(parseCliArgs([])).toEqual({ ok: true, value: { command: "help" } });
    expect(parseCliArgs(["--help"])).toEqual({ ok: true, value: { command: "help" } });
  });

  it("rejects unknown commands", () => {
    expect(parseCliArgs(["serve"])).toEqual({ ok: false, error: "Unknown command: serve" });
  });
});

describe("parseControllerInput", () => {
  it("maps broadcast commands to kinds", () => {
    expect(parseControllerInput("time")).toEqual({ action: "broadcast", kind: "time" });
    expect(parseControllerInput("  ls ")).toEqual({ action: "broadcast", kind: "listing" });
    expect(parseControllerInput("list")).toEqual({ action: "broadcast", kind: "listing" });
    expect(parseControllerInput("capture")).toEqual({ action: "broadcast", kind: "capture" });
    expect(parseControllerInput("upload")).toEqual({ action: "broadcast", kind: "upload" });
  });

  it("recognizes local commands", () => {
    expect(parseControllerInput("status")).toEqual({ action: "status" });
    expect(parseControllerInput("help")).toEqual({ action: "help" });
    expect(parseControllerInput("exit")).toEqual({ action: "quit" });
    expect(parseControllerInput("")).toEqual({ action: "none" });
  });

  it("reports anything else as unknown", () => {
    expect(parseControllerInput("constructor")).toEqual({ action: "unknown", input: "constructor" });
  });
});
