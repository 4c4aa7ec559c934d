import { StructuredLogger, type LogLevel } from "../../src/logger.js";

/**
 * Logger capturing entries in memory instead of writing them, so tests can
 * assert on structured payloads without polluting the reporter output.
 */
export class RecordingLogger extends StructuredLogger {
  public readonly entries: Array<{ level: LogLevel; message: string; payload?: unknown }> = [];

  constructor() {
    super({ logFile: null });
  }

  private record(level: LogLevel, message: string, payload?: unknown): void {
    this.entries.push(payload === undefined ? { level, message } : { level, message, payload });
  }

  override debug(message: string, payload?: unknown): void {
    this.record("debug", message, payload);
  }

  override info(message: string, payload?: unknown): void {
    this.record("info", message, payload);
  }

  override warn(message: string, payload?: unknown): void {
    this.record("warn", message, payload);
  }

  override error(message: string, payload?: unknown): void {
    this.record("error", message, payload);
  }

  messages(): string[] {
    return this.entries.map((entry) => entry.message);
  }
}
