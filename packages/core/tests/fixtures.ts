/**
 * Test fixtures for @slo-annotator/core.
 *
 * Raw definitions follow the platform's listing shape.
 */

import type { AnnotationRequest } from "@slo-annotator/types";

export interface DefinitionOptions {
  readonly service?: string;
  readonly displayName?: string;
  readonly components?: ReadonlyArray<readonly [project: string, slo: string]>;
}

export function sloDefinition(
  project: string,
  name: string,
  options: DefinitionOptions = {},
): Record<string, unknown> {
  const objectives: Record<string, unknown>[] =
    options.components !== undefined
      ? [
          {
            name: "composite",
            displayName: "Composite objective",
            composite: {
              maxDelay: "45m",
              components: {
                objectives: options.components.map(([p, slo]) => ({
                  project: p,
                  slo,
                  objective: "good",
                  weight: 1,
                  whenDelayed: "CountAsGood",
                })),
              },
            },
          },
        ]
      : [{ name: "good", displayName: "Good", target: 0.99 }];

  return {
    apiVersion: "n9/v1alpha",
    kind: "SLO",
    metadata: {
      name,
      project,
      ...(options.displayName !== undefined ? { displayName: options.displayName } : {}),
    },
    spec: {
      ...(options.service !== undefined ? { service: options.service } : {}),
      objectives,
    },
  };
}

/**
 * A listing with two projects, three services and two composites.
 *
 * - payments/checkout-journey: all three components present
 * - payments/degraded-journey: second component (payments/ghost) missing
 */
export const LISTING: readonly Record<string, unknown>[] = [
  sloDefinition("payments", "checkout-latency", {
    service: "checkout-api",
    displayName: "Checkout latency",
  }),
  sloDefinition("payments", "checkout-availability", { service: "checkout-api" }),
  sloDefinition("payments", "refund-latency", { service: "refunds" }),
  sloDefinition("search", "query-latency", { service: "search-api" }),
  sloDefinition("payments", "checkout-journey", {
    service: "checkout-api",
    components: [
      ["payments", "checkout-latency"],
      ["payments", "checkout-availability"],
      ["search", "query-latency"],
    ],
  }),
  sloDefinition("payments", "degraded-journey", {
    service: "refunds",
    components: [
      ["payments", "checkout-latency"],
      ["payments", "ghost"],
      ["payments", "refund-latency"],
    ],
  }),
];

export function makeRequest(overrides: Partial<AnnotationRequest> = {}): AnnotationRequest {
  return {
    id: "6f1c2a8e-1b7d-4c3e-9a2f-0d4e5b6c7a8f",
    sloIdentity: { project: "payments", name: "checkout-latency" },
    description: "Maintenance window",
    startTime: "2025-01-27T10:00:00Z",
    endTime: "2025-01-27T11:00:00Z",
    ...overrides,
  };
}
