/**
 * Annotation Submitter Tests
 *
 * Verifies:
 * - One request per record with a fresh id and normalized times
 * - Fail-fast validation of shared parameters
 * - Partial failure isolation and ordering
 * - Per-call timeout and batch cancellation
 * - Bounded concurrency with order-preserving results
 */

import { describe, it, expect, vi } from "vitest";
import type { AnnotationRequest, SloRecord } from "@slo-annotator/types";
import { AnnotationSubmitter } from "../src/submitter.js";
import type { AnnotationGateway } from "../src/submitter.js";
import { InvalidArgumentError, SubmissionFailure, ValidationError } from "../src/errors.js";
import { isAnnotationId } from "../src/identifier.js";
import { summarizeOutcomes } from "../src/reporter.js";

// =============================================================================
// Fixtures
// =============================================================================

function record(name: string, project = "payments"): SloRecord {
  return {
    identity: { project, name, service: "checkout-api" },
    displayName: name,
    isComposite: false,
    componentRefs: [],
  };
}

const RECORDS = [record("a"), record("b"), record("c")];

const DETAILS = {
  description: "Planned maintenance",
  startTime: "2025-01-27T10:00:00:11Z",
  endTime: "2025-01-27T12:00:00Z",
};

function recordingGateway(
  impl: (request: AnnotationRequest, signal: AbortSignal) => Promise<void> = async () => {},
): AnnotationGateway & { calls: AnnotationRequest[] } {
  const calls: AnnotationRequest[] = [];
  return {
    calls,
    createAnnotation: vi.fn(async (request: AnnotationRequest, signal: AbortSignal) => {
      calls.push(request);
      await impl(request, signal);
    }),
  };
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Request building
// =============================================================================

describe("AnnotationSubmitter requests", () => {
  it("submits one request per record with normalized times", async () => {
    const gateway = recordingGateway();
    const submitter = new AnnotationSubmitter(gateway);

    const outcomes = await submitter.submitBatch(RECORDS, DETAILS);

    expect(outcomes).toHaveLength(3);
    expect(gateway.calls.map((r) => r.sloIdentity.name)).toEqual(["a", "b", "c"]);
    for (const request of gateway.calls) {
      expect(request.startTime).toBe("2025-01-27T10:00:00Z");
      expect(request.endTime).toBe("2025-01-27T12:00:00Z");
      expect(request.description).toBe("Planned maintenance");
      expect(isAnnotationId(request.id)).toBe(true);
    }
  });

  it("gives every request its own id", async () => {
    const gateway = recordingGateway();
    const submitter = new AnnotationSubmitter(gateway);

    await submitter.submitBatch([record("a"), record("a", "other")], DETAILS);

    const [first, second] = gateway.calls;
    expect(first?.id).not.toBe(second?.id);
  });

  it("uses the configured id factory", async () => {
    const gateway = recordingGateway();
    let n = 0;
    const submitter = new AnnotationSubmitter(gateway, { idFactory: () => `id-${++n}` });

    const outcomes = await submitter.submitBatch(RECORDS, DETAILS);

    expect(outcomes.map((o) => o.request.id)).toEqual(["id-1", "id-2", "id-3"]);
  });

  it("keeps Markdown in the description", async () => {
    const gateway = recordingGateway();
    const submitter = new AnnotationSubmitter(gateway);
    const description = "Deploy\n\n[Runbook](https://runbooks.example.com/deploy)";

    await submitter.submitBatch([record("a")], { ...DETAILS, description });

    expect(gateway.calls[0]?.description).toBe(description);
  });

  it("returns an empty list for an empty batch", async () => {
    const gateway = recordingGateway();
    const submitter = new AnnotationSubmitter(gateway);

    expect(await submitter.submitBatch([], DETAILS)).toEqual([]);
    expect(gateway.createAnnotation).not.toHaveBeenCalled();
  });
});

// =============================================================================
// Shared parameter validation
// =============================================================================

describe("AnnotationSubmitter validation", () => {
  it("rejects a bad start time before any call", async () => {
    const gateway = recordingGateway();
    const submitter = new AnnotationSubmitter(gateway);

    await expect(
      submitter.submitBatch(RECORDS, { ...DETAILS, startTime: "not-a-date" }),
    ).rejects.toBeInstanceOf(ValidationError);
    expect(gateway.createAnnotation).not.toHaveBeenCalled();
  });

  it("rejects a bad end time before any call", async () => {
    const gateway = recordingGateway();
    const submitter = new AnnotationSubmitter(gateway);

    await expect(
      submitter.submitBatch(RECORDS, { ...DETAILS, endTime: "2025-13-01T00:00:00Z" }),
    ).rejects.toThrow('invalid timestamp: "2025-13-01T00:00:00Z"');
    expect(gateway.createAnnotation).not.toHaveBeenCalled();
  });

  it("rejects an empty description", async () => {
    const gateway = recordingGateway();
    const submitter = new AnnotationSubmitter(gateway);

    await expect(
      submitter.submitBatch(RECORDS, { ...DETAILS, description: "   " }),
    ).rejects.toThrow("empty description");
    expect(gateway.createAnnotation).not.toHaveBeenCalled();
  });

  it("does not reject an end time before the start time", async () => {
    const gateway = recordingGateway();
    const submitter = new AnnotationSubmitter(gateway);

    const outcomes = await submitter.submitBatch([record("a")], {
      ...DETAILS,
      startTime: "2025-01-27T12:00:00Z",
      endTime: "2025-01-27T10:00:00Z",
    });

    expect(outcomes[0]?.result.status).toBe("success");
  });

  it("rejects invalid options", () => {
    const gateway = recordingGateway();
    expect(() => new AnnotationSubmitter(gateway, { concurrency: 0 })).toThrow(
      InvalidArgumentError,
    );
    expect(() => new AnnotationSubmitter(gateway, { timeoutMs: 0 })).toThrow(
      InvalidArgumentError,
    );
  });
});

// =============================================================================
// Partial failure
// =============================================================================

describe("AnnotationSubmitter partial failure", () => {
  it("records a failure and continues with the next item", async () => {
    const gateway = recordingGateway(async (request) => {
      if (request.sloIdentity.name === "b") {
        throw new SubmissionFailure(request.sloIdentity, "objective not found", "HTTP_ERROR");
      }
    });
    const submitter = new AnnotationSubmitter(gateway);

    const outcomes = await submitter.submitBatch(RECORDS, DETAILS);

    expect(outcomes.map((o) => o.result)).toEqual([
      { status: "success" },
      { status: "failure", reason: "objective not found", code: "HTTP_ERROR" },
      { status: "success" },
    ]);

    const summary = summarizeOutcomes(outcomes);
    expect(summary.total).toBe(3);
    expect(summary.succeeded).toBe(2);
    expect(summary.failed).toBe(1);
    expect(summary.failures).toEqual([
      {
        identity: { project: "payments", name: "b", service: "checkout-api" },
        reason: "objective not found",
      },
    ]);
  });

  it("records plain errors with a generic code", async () => {
    const gateway = recordingGateway(async () => {
      throw new Error("socket hang up");
    });
    const submitter = new AnnotationSubmitter(gateway);

    const outcomes = await submitter.submitBatch([record("a")], DETAILS);

    expect(outcomes[0]?.result).toEqual({
      status: "failure",
      reason: "socket hang up",
      code: "SUBMISSION_FAILURE",
    });
  });

  it("records non-Error rejections", async () => {
    const gateway: AnnotationGateway = {
      createAnnotation: () => Promise.reject("rejected"),
    };
    const submitter = new AnnotationSubmitter(gateway);

    const outcomes = await submitter.submitBatch([record("a")], DETAILS);

    expect(outcomes[0]?.result).toEqual({
      status: "failure",
      reason: "rejected",
      code: "SUBMISSION_FAILURE",
    });
  });

  it("reports each settled item through onOutcome", async () => {
    const gateway = recordingGateway();
    const onOutcome = vi.fn();
    const submitter = new AnnotationSubmitter(gateway, { onOutcome });

    await submitter.submitBatch(RECORDS, DETAILS);

    expect(onOutcome).toHaveBeenCalledTimes(3);
    expect(onOutcome.mock.calls.map((call) => call[1])).toEqual([0, 1, 2]);
  });

  it("keeps every outcome when onOutcome throws", async () => {
    const gateway = recordingGateway();
    const onHookError = vi.fn();
    const submitter = new AnnotationSubmitter(gateway, {
      onOutcome: (outcome) => {
        if (outcome.request.sloIdentity.name === "a") {
          throw new Error("log sink closed");
        }
      },
      onHookError,
    });

    const outcomes = await submitter.submitBatch(RECORDS, DETAILS);

    expect(gateway.calls).toHaveLength(3);
    expect(outcomes.map((o) => o.result.status)).toEqual(["success", "success", "success"]);
    expect(onHookError).toHaveBeenCalledTimes(1);
    expect(onHookError.mock.calls[0]?.[0]).toEqual(new Error("log sink closed"));
    expect(onHookError.mock.calls[0]?.[1]).toBe(outcomes[0]);
  });

  it("carries on when onOutcome throws and no error hook is set", async () => {
    const submitter = new AnnotationSubmitter(recordingGateway(), {
      onOutcome: () => {
        throw new Error("log sink closed");
      },
    });

    const outcomes = await submitter.submitBatch(RECORDS, DETAILS);

    expect(outcomes).toHaveLength(3);
  });
});

// =============================================================================
// Timeout and cancellation
// =============================================================================

describe("AnnotationSubmitter timeout", () => {
  it("fails a hung call with reason timeout and continues", async () => {
    const gateway = recordingGateway(async (request) => {
      if (request.sloIdentity.name === "a") {
        await new Promise<never>(() => {});
      }
    });
    const submitter = new AnnotationSubmitter(gateway, { timeoutMs: 20 });

    const outcomes = await submitter.submitBatch([record("a"), record("b")], DETAILS);

    expect(outcomes.map((o) => o.result)).toEqual([
      { status: "failure", reason: "timeout", code: "TIMEOUT" },
      { status: "success" },
    ]);
  });

  it("aborts the signal handed to the gateway on timeout", async () => {
    let seen: AbortSignal | undefined;
    const gateway = recordingGateway(async (_request, signal) => {
      seen = signal;
      await delay(200);
    });
    const submitter = new AnnotationSubmitter(gateway, { timeoutMs: 20 });

    await submitter.submitBatch([record("a")], DETAILS);

    expect(seen?.aborted).toBe(true);
  });
});

describe("AnnotationSubmitter cancellation", () => {
  it("submits nothing when already cancelled", async () => {
    const gateway = recordingGateway();
    const submitter = new AnnotationSubmitter(gateway);
    const controller = new AbortController();
    controller.abort();

    const outcomes = await submitter.submitBatch(RECORDS, DETAILS, {
      signal: controller.signal,
    });

    expect(outcomes).toEqual([]);
    expect(gateway.createAnnotation).not.toHaveBeenCalled();
  });

  it("keeps settled items, aborts the in-flight one and skips the rest", async () => {
    const controller = new AbortController();
    const gateway = recordingGateway(async (request) => {
      if (request.sloIdentity.name === "b") {
        controller.abort();
        await delay(200);
      }
    });
    const submitter = new AnnotationSubmitter(gateway);

    const outcomes = await submitter.submitBatch(RECORDS, DETAILS, {
      signal: controller.signal,
    });

    expect(outcomes.map((o) => [o.request.sloIdentity.name, o.result])).toEqual([
      ["a", { status: "success" }],
      ["b", { status: "failure", reason: "cancelled", code: "CANCELLED" }],
    ]);
    expect(gateway.calls.map((r) => r.sloIdentity.name)).toEqual(["a", "b"]);
  });
});

// =============================================================================
// Concurrency
// =============================================================================

describe("AnnotationSubmitter concurrency", () => {
  it("returns outcomes in record order even when items finish out of order", async () => {
    const delays: Record<string, number> = { a: 40, b: 5, c: 20 };
    const gateway = recordingGateway(async (request) => {
      await delay(delays[request.sloIdentity.name] ?? 0);
    });
    const settled: string[] = [];
    const submitter = new AnnotationSubmitter(gateway, {
      concurrency: 3,
      onOutcome: (outcome) => settled.push(outcome.request.sloIdentity.name),
    });

    const outcomes = await submitter.submitBatch(RECORDS, DETAILS);

    expect(outcomes.map((o) => o.request.sloIdentity.name)).toEqual(["a", "b", "c"]);
    expect(settled).toEqual(["b", "c", "a"]);
  });

  it("never exceeds the concurrency limit", async () => {
    let inFlight = 0;
    let peak = 0;
    const gateway = recordingGateway(async () => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await delay(5);
      inFlight -= 1;
    });
    const submitter = new AnnotationSubmitter(gateway, { concurrency: 2 });
    const many = Array.from({ length: 7 }, (_, i) => record(`slo-${i}`));

    const outcomes = await submitter.submitBatch(many, DETAILS);

    expect(outcomes).toHaveLength(7);
    expect(peak).toBe(2);
  });
});
