import { readBool, readEnum, readInt, readOptionalString } from "./env.js";

export const OUTPUT_FORMATS = ["text", "json"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/** Runtime settings shared by the service and the CLI. */
export interface RuntimeSettings {
  /**
   * Longest accepted input, in characters. The engine is quadratic in time and
   * memory, so the service rejects longer strings before building the grid.
   */
  maxInputLength: number;
  /** Optional file mirroring the structured logs. */
  logFile: string | null;
  /** Emits one debug entry per computed distance. */
  traceComputations: boolean;
  outputFormat: OutputFormat;
}

export const DEFAULT_MAX_INPUT_LENGTH = 10_000;

/** Reads the `EDIT_DISTANCE_*` variables, falling back to defaults. */
export function loadRuntimeSettings(
  env: Readonly<Record<string, string | undefined>> = process.env,
): RuntimeSettings {
  return {
    maxInputLength: readInt("EDIT_DISTANCE_MAX_INPUT_LENGTH", DEFAULT_MAX_INPUT_LENGTH, { min: 1 }, env),
    logFile: readOptionalString("EDIT_DISTANCE_LOG_FILE", env) ?? null,
    traceComputations: readBool("EDIT_DISTANCE_TRACE", false, env),
    outputFormat: readEnum("EDIT_DISTANCE_OUTPUT_FORMAT", OUTPUT_FORMATS, "text", env),
  };
}
