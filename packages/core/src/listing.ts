/**
 * Raw SLO listing parser.
 *
 * Accepts the JSON array the platform returns for an all-projects SLO
 * listing (the same shape `sloctl get slos -A -o json` writes) and turns
 * each definition into an SLO record.
 *
 * Composite SLOs declare their components inside an objective:
 *
 * ```json
 * { "spec": { "objectives": [ { "composite": { "components": {
 *     "objectives": [ { "project": "p", "slo": "a", "objective": "good" } ]
 * } } } ] } }
 * ```
 */

import { z } from "zod";
import type { SloIdentity, SloRecord } from "@slo-annotator/types";
import { ListingError } from "./errors.js";

// =============================================================================
// Schema
// =============================================================================

const ComponentObjectiveSchema = z
  .object({
    project: z.string().min(1),
    slo: z.string().min(1),
    objective: z.string().optional(),
    weight: z.number().optional(),
    whenDelayed: z.string().optional(),
  })
  .passthrough();

const ObjectiveSchema = z
  .object({
    name: z.string().optional(),
    displayName: z.string().optional(),
    composite: z
      .object({
        maxDelay: z.string().optional(),
        components: z
          .object({ objectives: z.array(ComponentObjectiveSchema) })
          .passthrough()
          .optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const SloDefinitionSchema = z
  .object({
    kind: z.string().optional(),
    metadata: z
      .object({
        name: z.string().min(1),
        project: z.string().min(1),
        displayName: z.string().optional(),
      })
      .passthrough(),
    spec: z
      .object({
        service: z.string().optional(),
        objectives: z.array(ObjectiveSchema).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type SloDefinition = z.infer<typeof SloDefinitionSchema>;

// =============================================================================
// Parsing
// =============================================================================

export interface SkippedListingEntry {
  /** Position in the raw listing */
  readonly index: number;
  readonly reason: string;
}

export interface ListingEntry {
  /** Position in the raw listing */
  readonly index: number;
  readonly record: SloRecord;
}

export interface ParsedListing {
  readonly entries: readonly ListingEntry[];
  readonly skipped: readonly SkippedListingEntry[];
}

function componentRefsOf(definition: SloDefinition): SloIdentity[] {
  const refs: SloIdentity[] = [];
  for (const objective of definition.spec?.objectives ?? []) {
    for (const component of objective.composite?.components?.objectives ?? []) {
      refs.push({ project: component.project, name: component.slo });
    }
  }
  return refs;
}

function hasComponentBlock(definition: SloDefinition): boolean {
  return (definition.spec?.objectives ?? []).some(
    (objective) => objective.composite?.components !== undefined,
  );
}

/**
 * Convert a validated definition into a catalog record.
 */
export function toSloRecord(definition: SloDefinition): SloRecord {
  const { name, project, displayName } = definition.metadata;
  const service = definition.spec?.service;
  const componentRefs = componentRefsOf(definition);

  const identity: SloIdentity =
    service !== undefined && service !== "" ? { name, project, service } : { name, project };

  return {
    identity,
    displayName: displayName !== undefined && displayName !== "" ? displayName : name,
    isComposite: hasComponentBlock(definition),
    componentRefs,
  };
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (issue === undefined) return "invalid definition";
  const path = issue.path.join(".");
  return path === "" ? issue.message : `${path}: ${issue.message}`;
}

/**
 * Parse a raw listing. Entries that do not validate are skipped and
 * reported; a listing that is not an array is rejected outright.
 *
 * @throws {ListingError} if the listing is not a JSON array
 */
export function parseSloListing(raw: unknown): ParsedListing {
  if (!Array.isArray(raw)) {
    throw new ListingError("SLO listing must be a JSON array", {
      received: raw === null ? "null" : typeof raw,
    });
  }

  const entries: ListingEntry[] = [];
  const skipped: SkippedListingEntry[] = [];

  raw.forEach((entry: unknown, index) => {
    const parsed = SloDefinitionSchema.safeParse(entry);
    if (parsed.success) {
      entries.push({ index, record: toSloRecord(parsed.data) });
    } else {
      skipped.push({ index, reason: describeIssue(parsed.error) });
    }
  });

  return { entries, skipped };
}
