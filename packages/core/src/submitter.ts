/**
 * Annotation Submitter
 *
 * Builds one annotation request per resolved SLO and sends it through an
 * AnnotationGateway. Shared parameters (description, time range) are
 * validated once, before any remote call. After that, every item stands
 * alone: a rejected or timed-out item is recorded and the batch moves on.
 *
 * Design:
 * - Sequential by default; bounded concurrency is opt-in
 * - Outcomes are returned in record order, not completion order
 * - Every call has its own timeout and AbortSignal
 * - No retries here; a failed item is reported, not re-sent
 * - Cancelling the batch aborts in-flight items and skips unstarted ones;
 *   items already created stay created
 */

import type {
  AnnotationRequest,
  BatchOutcome,
  SloRecord,
  SubmissionFailureResult,
} from "@slo-annotator/types";
import { InvalidArgumentError, SubmissionFailure, ValidationError } from "./errors.js";
import { generateAnnotationId } from "./identifier.js";
import { normalizeTimestamp } from "./timestamp.js";

// =============================================================================
// Gateway
// =============================================================================

/**
 * Remote side of the submitter: creates one annotation.
 *
 * Resolve on success. Reject (ideally with SubmissionFailure) on any
 * failure. Implementations should stop work when `signal` aborts.
 */
export interface AnnotationGateway {
  createAnnotation(request: AnnotationRequest, signal: AbortSignal): Promise<void>;
}

// =============================================================================
// Configuration
// =============================================================================

export interface AnnotationDetails {
  /** Free text, may embed Markdown */
  readonly description: string;
  /** Raw start time as typed by the operator */
  readonly startTime: string;
  /** Raw end time as typed by the operator */
  readonly endTime: string;
}

export interface SubmitterOptions {
  /** Items in flight at once (default: 1) */
  readonly concurrency?: number | undefined;
  /** Per-call timeout in milliseconds (default: 30000) */
  readonly timeoutMs?: number | undefined;
  /** Identifier source (default: random UUID v4) */
  readonly idFactory?: (() => string) | undefined;
  /** Called as each item settles */
  readonly onOutcome?: ((outcome: BatchOutcome, index: number) => void) | undefined;
  /**
   * Receives anything `onOutcome` throws. The outcome is kept and the
   * batch carries on either way.
   */
  readonly onHookError?: ((error: unknown, outcome: BatchOutcome) => void) | undefined;
}

export interface SubmitBatchOptions {
  /** Cancels the batch; unstarted items are not submitted */
  readonly signal?: AbortSignal | undefined;
}

const DEFAULT_TIMEOUT_MS = 30_000;

// =============================================================================
// Helpers
// =============================================================================

function failure(reason: string, code: string): SubmissionFailureResult {
  return { status: "failure", reason, code };
}

function toFailure(error: unknown): SubmissionFailureResult {
  if (error instanceof SubmissionFailure) {
    return failure(error.reason, error.failureCode);
  }
  if (error instanceof Error) {
    return failure(error.message, "SUBMISSION_FAILURE");
  }
  return failure(String(error), "SUBMISSION_FAILURE");
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts, whichever
 * comes first. Keeps a gateway that ignores its signal from stalling
 * the batch.
 */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new Error("aborted"));
    // Attach first so an abandoned call that rejects later is still observed.
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

// =============================================================================
// Submitter
// =============================================================================

export class AnnotationSubmitter {
  private readonly concurrency: number;
  private readonly timeoutMs: number;
  private readonly idFactory: () => string;
  private readonly onOutcome: ((outcome: BatchOutcome, index: number) => void) | undefined;
  private readonly onHookError: ((error: unknown, outcome: BatchOutcome) => void) | undefined;

  constructor(
    private readonly gateway: AnnotationGateway,
    options: SubmitterOptions = {},
  ) {
    const concurrency = options.concurrency ?? 1;
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new InvalidArgumentError(`concurrency must be a positive integer, got ${concurrency}`);
    }
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new InvalidArgumentError(`timeoutMs must be positive, got ${timeoutMs}`);
    }

    this.concurrency = concurrency;
    this.timeoutMs = timeoutMs;
    this.idFactory = options.idFactory ?? generateAnnotationId;
    this.onOutcome = options.onOutcome;
    this.onHookError = options.onHookError;
  }

  /**
   * Submit one annotation per record.
   *
   * @throws {ValidationError} if the description is empty or a timestamp
   *   cannot be normalized; nothing is submitted in that case
   */
  async submitBatch(
    records: readonly SloRecord[],
    details: AnnotationDetails,
    options: SubmitBatchOptions = {},
  ): Promise<BatchOutcome[]> {
    if (details.description.trim() === "") {
      throw new ValidationError("empty description", details.description);
    }
    const startTime = normalizeTimestamp(details.startTime);
    const endTime = normalizeTimestamp(details.endTime);
    const shared = { description: details.description, startTime, endTime };

    const { signal } = options;
    const results: (BatchOutcome | undefined)[] = new Array<BatchOutcome | undefined>(
      records.length,
    ).fill(undefined);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < records.length && signal?.aborted !== true) {
        const index = next;
        next += 1;
        const record = records[index];
        if (record === undefined) continue;

        const request: AnnotationRequest = {
          id: this.idFactory(),
          sloIdentity: record.identity,
          ...shared,
        };
        const outcome = await this.submitOne(request, signal);
        results[index] = outcome;
        this.notify(outcome, index);
      }
    };

    const workerCount = Math.min(this.concurrency, records.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    return results.filter((outcome): outcome is BatchOutcome => outcome !== undefined);
  }

  private notify(outcome: BatchOutcome, index: number): void {
    try {
      this.onOutcome?.(outcome, index);
    } catch (error) {
      this.onHookError?.(error, outcome);
    }
  }

  private async submitOne(
    request: AnnotationRequest,
    batchSignal: AbortSignal | undefined,
  ): Promise<BatchOutcome> {
    const controller = new AbortController();
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onBatchAbort = (): void => controller.abort();
    batchSignal?.addEventListener("abort", onBatchAbort, { once: true });

    try {
      await untilAborted(
        this.gateway.createAnnotation(request, controller.signal),
        controller.signal,
      );
      return { request, result: { status: "success" } };
    } catch (error) {
      if (timedOut) {
        return { request, result: failure("timeout", "TIMEOUT") };
      }
      if (batchSignal?.aborted === true) {
        return { request, result: failure("cancelled", "CANCELLED") };
      }
      return { request, result: toFailure(error) };
    } finally {
      clearTimeout(timer);
      batchSignal?.removeEventListener("abort", onBatchAbort);
    }
  }
}
