/**
 * Startup failures. These are the only errors that end a camrelay process;
 * everything after startup is logged and dropped.
 */

export type StartupStage = "resolve" | "socket" | "bind";

export class StartupError extends Error {
  readonly stage: StartupStage;

  constructor(stage: StartupStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StartupError";
    this.stage = stage;
  }
}

/** Render an unknown thrown value as a message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
