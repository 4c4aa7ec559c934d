import { z } from "zod";

import { DEFAULT_MAX_INPUT_LENGTH } from "../config/settings.js";
import {
  CostModelInputSchema,
  costModelFromArguments,
  createCostModel,
  type CostModel,
} from "../editDistance/costModel.js";
import { editDistance, editDistanceUnsafe } from "../editDistance/engine.js";
import { METRIC_NAMES, namedMetricDistance } from "../editDistance/metrics.js";
import { normaliseDistanceError, type ErrorCodes, type NormalisedError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";

export const REQUEST_METRICS = [...METRIC_NAMES, "custom"] as const;

export type RequestMetric = (typeof REQUEST_METRICS)[number];

const RequestIdSchema = z.union([z.string().trim().min(1).max(200), z.number().int()]);

/**
 * Single distance request as accepted by the service and the CLI batch mode.
 * `costs` is either the named cost object or the positional argument list
 * accepted by {@link costModelFromArguments}.
 */
export const DistanceRequestSchema = z
  .object({
    id: RequestIdSchema.optional(),
    source: z.string(),
    target: z.string(),
    metric: z.enum(REQUEST_METRICS).optional(),
    costs: z.union([CostModelInputSchema, z.array(z.union([z.number(), z.string()]))]).optional(),
    unsafe: z.boolean().default(false),
  })
  .strict();

export type DistanceRequest = z.input<typeof DistanceRequestSchema>;

type RequestId = z.infer<typeof RequestIdSchema>;

/** Error raised when a request is well formed but inconsistent. */
export class RequestValidationError extends Error {
  public readonly code = "E-REQUEST-INVALID";

  constructor(message: string, readonly hint?: string) {
    super(message);
    this.name = "RequestValidationError";
  }
}

/** Error raised when an input exceeds the configured length limit. */
export class InputTooLongError extends Error {
  public readonly code = "E-INPUT-TOO-LONG";
  public readonly hint = "shorten the input or raise EDIT_DISTANCE_MAX_INPUT_LENGTH";
  public readonly details: { field: "source" | "target"; length: number; limit: number };

  constructor(field: "source" | "target", length: number, limit: number) {
    super(`${field} has ${length} characters, above the limit of ${limit}`);
    this.name = "InputTooLongError";
    this.details = { field, length, limit };
  }
}

export type DistanceOutcome =
  | { ok: true; id: RequestId | null; metric: RequestMetric; distance: number }
  | ({ ok: false; id: RequestId | null } & NormalisedError);

export interface BatchReport {
  results: DistanceOutcome[];
  succeeded: number;
  failed: number;
}

export interface EditDistanceServiceOptions {
  logger: StructuredLogger;
  maxInputLength?: number;
  /** Emits one debug entry per computed distance. */
  traceComputations?: boolean;
}

const SERVICE_ERROR_CODES: ErrorCodes = {
  defaultCode: "E-DISTANCE-UNEXPECTED",
  invalidInputCode: "E-REQUEST-INVALID",
};

const RequestIdProbeSchema = z.object({ id: RequestIdSchema }).passthrough();

/** Recovers the request identifier even when the rest of the payload is invalid. */
function probeRequestId(raw: unknown): RequestId | null {
  const probe = RequestIdProbeSchema.safeParse(raw);
  return probe.success ? probe.data.id : null;
}

/**
 * Host-side entry point: validates requests, guards input lengths and turns
 * every failure into a structured outcome instead of a thrown error.
 */
export class EditDistanceService {
  private readonly logger: StructuredLogger;
  private readonly maxInputLength: number;
  private readonly traceComputations: boolean;

  constructor(options: EditDistanceServiceOptions) {
    this.logger = options.logger;
    this.maxInputLength = options.maxInputLength ?? DEFAULT_MAX_INPUT_LENGTH;
    this.traceComputations = options.traceComputations ?? false;
  }

  compute(raw: unknown): DistanceOutcome {
    const id = probeRequestId(raw);
    try {
      const request = DistanceRequestSchema.parse(raw);
      const metric = request.metric ?? (request.costs === undefined ? "levenshtein" : "custom");
      const sourceLength = this.assertLength("source", request.source);
      const targetLength = this.assertLength("target", request.target);

      let distance: number;
      if (metric === "custom") {
        if (request.costs === undefined) {
          throw new RequestValidationError("custom requests need costs", "provide costs or pick a named metric");
        }
        const model = resolveRequestCosts(request.costs);
        distance = request.unsafe
          ? editDistanceUnsafe(request.source, request.target, model)
          : editDistance(request.source, request.target, model);
      } else {
        if (request.costs !== undefined) {
          throw new RequestValidationError(
            `metric ${metric} has fixed costs`,
            "drop costs or use the custom metric",
          );
        }
        distance = namedMetricDistance(metric, request.source, request.target);
      }

      if (this.traceComputations) {
        this.logger.debug("edit_distance_computed", {
          id,
          metric,
          distance,
          source_length: sourceLength,
          target_length: targetLength,
        });
      }
      return { ok: true, id, metric, distance };
    } catch (error) {
      const normalised = normaliseDistanceError(error, SERVICE_ERROR_CODES);
      this.logger.warn("edit_distance_rejected", { id, code: normalised.code, message: normalised.message });
      return { ok: false, id, ...normalised };
    }
  }

  /** Computes every request independently; one failure never aborts the batch. */
  computeBatch(requests: ReadonlyArray<unknown>): BatchReport {
    const startedAt = Date.now();
    const results = requests.map((request) => this.compute(request));
    const succeeded = results.filter((result) => result.ok).length;
    const report: BatchReport = { results, succeeded, failed: results.length - succeeded };
    this.logger.info("edit_distance_batch_completed", {
      total: results.length,
      succeeded: report.succeeded,
      failed: report.failed,
      duration_ms: Date.now() - startedAt,
    });
    return report;
  }

  /** Returns the length in characters, throwing when above the limit. */
  private assertLength(field: "source" | "target", value: string): number {
    const length = Array.from(value).length;
    if (length > this.maxInputLength) {
      throw new InputTooLongError(field, length, this.maxInputLength);
    }
    return length;
  }
}

function resolveRequestCosts(costs: NonNullable<z.infer<typeof DistanceRequestSchema>["costs"]>): CostModel {
  return Array.isArray(costs) ? costModelFromArguments(costs) : createCostModel(costs);
}
