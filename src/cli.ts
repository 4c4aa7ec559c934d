#!/usr/bin/env node
import process from "node:process";
import { realpathSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.
import { loadRuntimeSettings, OUTPUT_FORMATS, type OutputFormat, type RuntimeSettings } from "./config/settings.js";
import { usage } from "./editDistance/usage.js";
import { StructuredLogger } from "./logger.js";
import {
  EditDistanceService,
  REQUEST_METRICS,
  type BatchReport,
  type DistanceOutcome,
  type DistanceRequest,
  type RequestMetric,
} from "./service/editDistanceService.js";

/** Error raised for malformed command lines or batch files. */
export class CliUsageError extends Error {
  public readonly code = "E-CLI-USAGE";

  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

type CliCommand =
  | { readonly kind: "usage"; readonly topic?: string }
  | { readonly kind: "single"; readonly request: DistanceRequest; readonly format: OutputFormat }
  | { readonly kind: "batch"; readonly file: string; readonly format: OutputFormat };

/** Streams and collaborators used by {@link runCli}; tests swap them out. */
export interface CliIo {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  readonly readTextFile: (path: string) => Promise<string>;
  readonly logger?: StructuredLogger;
  readonly settings?: RuntimeSettings;
}

function parseArgs(argv: ReadonlyArray<string>, defaultFormat: OutputFormat): CliCommand {
  const positionals: string[] = [];
  let format = defaultFormat;
  let metric: RequestMetric | undefined;
  let costs: string[] | undefined;
  let specSubFrom: string | undefined;
  let specSubTo: string | undefined;
  let unsafe = false;
  let batchFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    switch (token) {
      case "--usage": {
        const topic = argv[i + 1];
        return topic === undefined || topic.startsWith("--") ? { kind: "usage" } : { kind: "usage", topic };
      }
      case "--format": {
        const value = argv[++i];
        const match = OUTPUT_FORMATS.find((candidate) => candidate === value);
        if (!match) {
          throw new CliUsageError("--format must be 'json' or 'text'");
        }
        format = match;
        break;
      }
      case "--metric": {
        const value = argv[++i];
        const match = REQUEST_METRICS.find((candidate) => candidate === value);
        if (!match) {
          throw new CliUsageError(`--metric must be one of ${REQUEST_METRICS.join(", ")}`);
        }
        metric = match;
        break;
      }
      case "--costs": {
        const value = argv[++i];
        if (!value) {
          throw new CliUsageError("--costs expects a comma separated list");
        }
        costs = value.split(",").map((entry) => entry.trim());
        break;
      }
      case "--spec-sub-from":
      case "--spec-sub-to": {
        const value = argv[++i];
        if (value === undefined) {
          throw new CliUsageError(`${token} expects a string of characters`);
        }
        if (token === "--spec-sub-from") {
          specSubFrom = value;
        } else {
          specSubTo = value;
        }
        break;
      }
      case "--unsafe":
        unsafe = true;
        break;
      case "--batch": {
        const value = argv[++i];
        if (!value) {
          throw new CliUsageError("--batch expects the path to a JSON lines file");
        }
        batchFile = value;
        break;
      }
      default:
        if (token.startsWith("--")) {
          throw new CliUsageError(`Unknown argument '${token}'`);
        }
        positionals.push(token);
    }
  }

  if ((specSubFrom === undefined) !== (specSubTo === undefined)) {
    throw new CliUsageError("--spec-sub-from and --spec-sub-to must be given together");
  }
  if (specSubFrom !== undefined && specSubTo !== undefined && !costs) {
    throw new CliUsageError("--spec-sub-from and --spec-sub-to require --costs");
  }
  const costArguments =
    costs && specSubFrom !== undefined && specSubTo !== undefined ? [...costs, specSubFrom, specSubTo] : costs;

  if (batchFile !== undefined) {
    if (positionals.length > 0 || costArguments || metric || unsafe) {
      throw new CliUsageError("--batch reads every request from the file; drop the other arguments");
    }
    return { kind: "batch", file: batchFile, format };
  }

  if (positionals.length !== 2) {
    throw new CliUsageError("expected exactly two strings: <source> <target>");
  }
  const [source, target] = positionals;
  const request: DistanceRequest = {
    source,
    target,
    unsafe,
    ...(metric === undefined ? {} : { metric }),
    ...(costArguments === undefined ? {} : { costs: costArguments }),
  };
  return { kind: "single", request, format };
}

/** Parses a JSON lines document, skipping blank lines. */
function parseJsonLines(contents: string): unknown[] {
  const requests: unknown[] = [];
  contents.split(/\r?\n/).forEach((line, index) => {
    if (line.trim().length === 0) {
      return;
    }
    try {
      requests.push(JSON.parse(line));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new CliUsageError(`line ${index + 1} is not valid JSON: ${reason}`);
    }
  });
  return requests;
}

function formatOutcome(outcome: DistanceOutcome, label: string | null): string {
  const prefix = label === null ? "" : `${label}\t`;
  if (outcome.ok) {
    return `${prefix}${outcome.distance}`;
  }
  const hint = outcome.hint ? ` (${outcome.hint})` : "";
  return `${prefix}error ${outcome.code}: ${outcome.message}${hint}`;
}

function formatBatch(report: BatchReport): string {
  const lines = report.results.map((outcome, index) => formatOutcome(outcome, String(outcome.id ?? index + 1)));
  lines.push(`# ${report.succeeded} succeeded, ${report.failed} failed`);
  return lines.join("\n");
}

/**
 * Runs the command line and returns the process exit code: 0 when every
 * distance was computed, 1 otherwise.
 */
export async function runCli(argv: ReadonlyArray<string>, io: CliIo): Promise<number> {
  const settings = io.settings ?? loadRuntimeSettings();
  const logger = io.logger ?? new StructuredLogger({ logFile: settings.logFile, destination: "stderr" });

  try {
    if (argv.length === 0) {
      io.stderr(`${printUsage()}\n`);
      return 1;
    }

    const command = parseArgs(argv, settings.outputFormat);
    if (command.kind === "usage") {
      io.stdout(`${usage(command.topic)}\n`);
      return 0;
    }

    const service = new EditDistanceService({
      logger,
      maxInputLength: settings.maxInputLength,
      traceComputations: settings.traceComputations,
    });

    if (command.kind === "single") {
      const outcome = service.compute(command.request);
      const rendered = command.format === "json" ? JSON.stringify(outcome, null, 2) : formatOutcome(outcome, null);
      (outcome.ok ? io.stdout : io.stderr)(`${rendered}\n`);
      return outcome.ok ? 0 : 1;
    }

    const requests = parseJsonLines(await io.readTextFile(command.file));
    const report = service.computeBatch(requests);
    const rendered = command.format === "json" ? JSON.stringify(report, null, 2) : formatBatch(report);
    io.stdout(`${rendered}\n`);
    return report.failed === 0 ? 0 : 1;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error("cli_failed", { message });
    io.stderr(`${message}\n`);
    return 1;
  } finally {
    await logger.flush();
  }
}

function printUsage(): string {
  return [
    "Usage: edit-distance <source> <target> [--metric name] [--costs ins,del,sub[,tp[,final_tp][,spec_sub]]]",
    "                     [--spec-sub-from chars --spec-sub-to chars] [--unsafe] [--format json|text]",
    "       edit-distance --batch <requests.jsonl> [--format json|text]",
    "       edit-distance --usage [function]",
    "",
    "Examples:",
    "  edit-distance demerau levenshtein --metric optimal-alignment",
    "  edit-distance demerau levenshtein --costs 1,1,1,1,1,1 --spec-sub-from 01OIIL --spec-sub-to OI01LI",
    "  edit-distance --usage edit_distance",
  ].join("\n");
}

const isCliEntryPoint = (() => {
  const executedFromCli = process.argv[1];
  if (!executedFromCli) {
    return false;
  }

  // Installed bins are symlinks while `import.meta.url` names the resolved file.
  let invokedPath: string;
  try {
    invokedPath = realpathSync(executedFromCli);
  } catch {
    return false;
  }
  const thisModulePath = fileURLToPath(import.meta.url);
  return thisModulePath === invokedPath;
})();

if (isCliEntryPoint) {
  runCli(process.argv.slice(2), {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    readTextFile: (path) => readFile(path, "utf8"),
  })
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = 1;
    });
}

/**
 * Exposes internal helpers to the test suite without making them part of the
 * runtime API surface.
 */
export const __testing = {
  parseArgs,
  parseJsonLines,
  formatOutcome,
};
