/**
 * Worker collaborators.
 *
 * The listing, capture and upload commands are opaque: the worker runs
 * them, captures combined output and exit status, and turns the result
 * into a reply payload.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { CommandSpec } from "../config.js";
import { formatOutcome } from "../protocol/codec.js";
import { errorMessage } from "../errors.js";
import { formatCompactTime } from "../utils/time.js";

const execFileAsync = promisify(execFile);

/** Output beyond this stops the child; what was read so far is kept. */
const MAX_OUTPUT_BYTES = 1024 * 1024;

export interface CollaboratorResult {
  /** Process exit code; null when it never ran or was killed. */
  exitCode: number | null;
  /** stdout followed by stderr. */
  output: string;
  /** Why the command could not run to completion. */
  error?: string;
  /** Output hit the capture limit; `output` holds what was read before it. */
  truncated?: boolean;
}

export interface CollaboratorRunner {
  /** Run a command. Never rejects: failures are reported in the result. */
  run(spec: CommandSpec): Promise<CollaboratorResult>;
}

/** Shape of the error execFile rejects with. */
interface ExecFailure extends Error {
  code?: number | string;
  killed?: boolean;
  stdout?: string;
  stderr?: string;
}

function isExecFailure(err: unknown): err is ExecFailure {
  return err instanceof Error && ("code" in err || "stdout" in err);
}

/** Runs collaborators as child processes with a timeout. */
export class ProcessCollaboratorRunner implements CollaboratorRunner {
  private readonly timeoutMs: number;

  constructor(opts: { timeoutMs: number }) {
    this.timeoutMs = opts.timeoutMs;
  }

  async run(spec: CommandSpec): Promise<CollaboratorResult> {
    try {
      const { stdout, stderr } = await execFileAsync(spec.command, spec.args, {
        cwd: spec.cwd,
        timeout: this.timeoutMs,
        maxBuffer: MAX_OUTPUT_BYTES,
        encoding: "utf8",
      });
      return { exitCode: 0, output: `${stdout}${stderr}` };
    } catch (err) {
      if (!isExecFailure(err)) {
        return { exitCode: null, output: "", error: errorMessage(err) };
      }
      const output = `${err.stdout ?? ""}${err.stderr ?? ""}`;
      if (typeof err.code === "number") {
        return { exitCode: err.code, output };
      }
      if (err.code === "ERR_CHILD_PROCESS_STDIO_MAXBUFFER") {
        return {
          exitCode: null,
          output,
          error: `output exceeded ${MAX_OUTPUT_BYTES} bytes`,
          truncated: true,
        };
      }
      const error = err.killed ? `timed out after ${this.timeoutMs}ms` : err.message;
      return { exitCode: null, output, error };
    }
  }
}

/** Substitute `{name}` placeholders in a command's arguments. */
export function expandCommand(spec: CommandSpec, vars: Record<string, string>): CommandSpec {
  return {
    ...spec,
    args: spec.args.map((arg) =>
      arg.replace(/\{(\w+)\}/g, (match, name: string) => vars[name] ?? match),
    ),
  };
}

// --- Naming ---

/** Capture file name for a capture started at `date`, e.g. "20250822_143000.png". */
export function captureFileName(date: Date): string {
  return `${formatCompactTime(date)}.png`;
}

/**
 * Upload destination for an upload started at `date`:
 * s3://<bucket>/<YYYY-MMDD>-scan/<YYYY-MMDD-HHmm>/
 */
export function uploadDestination(bucket: string, date: Date): string {
  const [day, time] = formatCompactTime(date).split("_");
  const dayPath = `${day.slice(0, 4)}-${day.slice(4)}`;
  return `s3://${bucket}/${dayPath}-scan/${dayPath}-${time.slice(0, 4)}/`;
}

// --- Payloads ---

/**
 * Raw listing output; an ERROR outcome when the command could not run.
 * Output cut at the capture limit is still a listing.
 */
export function listingPayload(result: CollaboratorResult): string {
  if (result.error !== undefined && !result.truncated) {
    return formatOutcome({ ok: false, detail: `Failed to execute listing command: ${result.error}` });
  }
  return result.output;
}

export function capturePayload(result: CollaboratorResult, file: string): string {
  if (result.error !== undefined) {
    return formatOutcome({
      ok: false,
      detail: `Failed to execute camera command: ${result.error}`,
      output: result.output,
    });
  }
  if (result.exitCode === 0) {
    return formatOutcome({ ok: true, detail: `Image saved as ${file}`, output: result.output });
  }
  return formatOutcome({
    ok: false,
    detail: `Camera capture failed (exit code ${result.exitCode})`,
    output: result.output,
  });
}

/** Count the "upload:" lines the upload command prints per file. */
export function countUploads(output: string): number {
  return output.split("\n").filter((line) => line.includes("upload:")).length;
}

export function uploadPayload(result: CollaboratorResult, destination: string): string {
  if (result.error !== undefined) {
    return formatOutcome({
      ok: false,
      detail: `Failed to execute S3 upload command: ${result.error}`,
      output: result.output,
    });
  }
  if (result.exitCode === 0) {
    return formatOutcome({
      ok: true,
      detail: `Uploaded ${countUploads(result.output)} files to ${destination}`,
      output: result.output,
    });
  }
  return formatOutcome({
    ok: false,
    detail: `S3 upload failed (exit code ${result.exitCode})`,
    output: result.output,
  });
}
