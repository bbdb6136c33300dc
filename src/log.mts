import { randomUUID } from "crypto";

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Collects every line logged during one invocation while echoing it to the
 * console with the request id prefix. The transcript is handed to the mail
 * transport once, at the end of the run.
 */
export class DeployLog {
  private readonly lines: string[] = [];
  private drained = false;

  constructor(
    public readonly reqId: string = randomUUID(),
    private readonly now: () => Date = () => new Date()
  ) {}

  debug(message: string) {
    this.write("debug", message);
  }

  info(message: string) {
    this.write("info", message);
  }

  warn(message: string) {
    this.write("warn", message);
  }

  error(message: string) {
    this.write("error", message);
  }

  /** Lines collected so far, without consuming them. */
  get transcript(): readonly string[] {
    return this.lines;
  }

  /**
   * Returns the transcript and closes the collector. A second call throws so
   * the run cannot produce more than one notification.
   */
  drain(): string[] {
    if (this.drained) {
      throw new Error(`Log ${this.reqId} has already been drained.`);
    }
    this.drained = true;
    return [...this.lines];
  }

  private write(level: LogLevel, message: string) {
    const prefixed = `[${this.reqId}] ${message}`;
    switch (level) {
      case "debug":
        console.debug(prefixed);
        break;
      case "info":
        console.info(prefixed);
        break;
      case "warn":
        console.warn(prefixed);
        break;
      default:
        console.error(prefixed);
    }
    this.lines.push(
      `${this.now().toISOString()} ${level.toUpperCase().padEnd(5)} ${message}`
    );
  }
}

/**
 * Formats an unknown thrown value for a log line.
 * @param err The caught value.
 * @returns The error message, or its string form.
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
