import { describe, it, expect } from "vitest";
import {
  decodeDatagram,
  encodeMessage,
  formatOutcome,
  parseMessage,
  parseOutcome,
  truncateUtf8,
} from "../../src/protocol/codec.js";

describe("parseMessage", () => {
  it("parses device lifecycle messages", () => {
    expect(parseMessage("REGISTER:cam-1\n")).toEqual({
      ok: true,
      message: { type: "REGISTER", deviceId: "cam-1" },
    });
    expect(parseMessage("HEARTBEAT:cam-1\n")).toEqual({
      ok: true,
      message: { type: "HEARTBEAT", deviceId: "cam-1" },
    });
    expect(parseMessage("UNREGISTER:cam-1")).toEqual({
      ok: true,
      message: { type: "UNREGISTER", deviceId: "cam-1" },
    });
  });

  it("parses field-less broadcast requests", () => {
    expect(parseMessage("TIME_REQUEST\n")).toEqual({ ok: true, message: { type: "TIME_REQUEST" } });
    expect(parseMessage("S3_UPLOAD_REQUEST")).toEqual({ ok: true, message: { type: "S3_UPLOAD_REQUEST" } });
  });

  it("gives the reply payload the remainder of the datagram", () => {
    expect(parseMessage("TIME_RESPONSE:cam-1:2025-01-15 09:05:07\n")).toEqual({
      ok: true,
      message: { type: "TIME_RESPONSE", deviceId: "cam-1", payload: "2025-01-15 09:05:07" },
    });
    expect(parseMessage("LS_RESPONSE:cam-1:total 0\nphoto:1.png\n\n")).toEqual({
      ok: true,
      message: { type: "LS_RESPONSE", deviceId: "cam-1", payload: "total 0\nphoto:1.png\n" },
    });
  });

  it("parses registration acks and relay errors", () => {
    expect(parseMessage("REGISTERED:OK\n")).toEqual({
      ok: true,
      message: { type: "REGISTERED", status: "OK" },
    });
    expect(parseMessage("ERROR:BUSY:time request in progress\n")).toEqual({
      ok: true,
      message: { type: "ERROR", code: "BUSY", detail: "time request in progress" },
    });
  });

  it("reports unknown type tags", () => {
    expect(parseMessage("HELLO:cam-1\n")).toEqual({ ok: false, reason: "unknown-type", tag: "HELLO" });
    expect(parseMessage("")).toEqual({ ok: false, reason: "unknown-type", tag: "" });
  });

  it("reports known types with missing fields as malformed", () => {
    expect(parseMessage("REGISTER\n")).toEqual({ ok: false, reason: "malformed", tag: "REGISTER" });
    expect(parseMessage("REGISTER:\n")).toEqual({ ok: false, reason: "malformed", tag: "REGISTER" });
    expect(parseMessage("TIME_RESPONSE:cam-1\n")).toEqual({ ok: false, reason: "malformed", tag: "TIME_RESPONSE" });
    expect(parseMessage("LS_RESPONSE::total 0\n")).toEqual({ ok: false, reason: "malformed", tag: "LS_RESPONSE" });
    expect(parseMessage("ERROR:\n")).toEqual({ ok: false, reason: "malformed", tag: "ERROR" });
  });

  it("allows an empty payload on non-time replies", () => {
    expect(parseMessage("LS_RESPONSE:cam-1:\n")).toEqual({
      ok: true,
      message: { type: "LS_RESPONSE", deviceId: "cam-1", payload: "" },
    });
  });
});

describe("encodeMessage", () => {
  it("terminates every datagram with a newline", () => {
    expect(encodeMessage({ type: "REGISTERED", status: "OK" }).toString()).toBe("REGISTERED:OK\n");
    expect(encodeMessage({ type: "CAMERA_REQUEST" }).toString()).toBe("CAMERA_REQUEST\n");
    expect(
      encodeMessage({ type: "ERROR", code: "NO_DEVICES", detail: "No active devices registered" }).toString(),
    ).toBe("ERROR:NO_DEVICES:No active devices registered\n");
  });

  it("truncates oversized bodies to fit the receive buffer", () => {
    const data = encodeMessage(
      { type: "LS_RESPONSE", deviceId: "cam-1", payload: "x".repeat(5000) },
      1024,
    );
    expect(data.length).toBe(1023);
    expect(data[1022]).toBe(0x0a);
    expect(data.subarray(0, 18).toString()).toBe("LS_RESPONSE:cam-1:");
  });

  it("survives a parse after truncation", () => {
    const data = encodeMessage(
      { type: "LS_RESPONSE", deviceId: "cam-1", payload: "y".repeat(300) },
      128,
    );
    const parsed = parseMessage(decodeDatagram(data, 128));
    expect(parsed).toEqual({
      ok: true,
      message: { type: "LS_RESPONSE", deviceId: "cam-1", payload: "y".repeat(108) },
    });
  });
});

describe("truncateUtf8", () => {
  it("leaves short text alone", () => {
    expect(truncateUtf8("abc", 5)).toBe("abc");
  });

  it("never splits a multi-byte character", () => {
    expect(truncateUtf8("aé", 2)).toBe("a");
    expect(truncateUtf8("aé", 3)).toBe("aé");
  });
});

describe("decodeDatagram", () => {
  it("stops at the first NUL", () => {
    expect(decodeDatagram(Buffer.from("HEARTBEAT:cam-1\0garbage"))).toBe("HEARTBEAT:cam-1");
  });

  it("reads at most maxBytes - 1 bytes", () => {
    expect(decodeDatagram(Buffer.alloc(2000, "a"), 1024)).toHaveLength(1023);
  });
});

describe("outcomes", () => {
  it("formats success with output on the following lines", () => {
    expect(formatOutcome({ ok: true, detail: "Image saved as 20250115_090507.png", output: "done\n" }))
      .toBe("SUCCESS:Image saved as 20250115_090507.png\ndone\n");
  });

  it("omits the newline when there is no output", () => {
    expect(formatOutcome({ ok: false, detail: "Camera capture failed (exit code 1)" }))
      .toBe("ERROR:Camera capture failed (exit code 1)");
  });

  it("parses what it formats", () => {
    expect(parseOutcome("SUCCESS:Uploaded 2 files to s3://b/x/\nupload: a\nupload: b\n")).toEqual({
      ok: true,
      detail: "Uploaded 2 files to s3://b/x/",
      output: "upload: a\nupload: b\n",
    });
    expect(parseOutcome("ERROR:S3 upload failed (exit code 1)")).toEqual({
      ok: false,
      detail: "S3 upload failed (exit code 1)",
      output: "",
    });
  });

  it("returns null for payloads without an outcome", () => {
    expect(parseOutcome("total 0\n")).toBeNull();
  });
});
