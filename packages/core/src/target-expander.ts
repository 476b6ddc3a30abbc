/**
 * Target Expander
 *
 * Maps an operator's scope selection onto a concrete, ordered,
 * deduplicated list of SLO records. At most one record per
 * (project, name) survives; the first occurrence wins.
 *
 * Failure policy differs by scope:
 * - project / service: an empty result is a valid empty batch
 * - individual: any unknown SLO fails the whole expansion
 * - composite: unknown components become warnings
 */

import type { SloIdentity, SloKey, SloRecord, TargetScope } from "@slo-annotator/types";
import { sloKey } from "@slo-annotator/types";
import type { SloCatalog } from "./catalog.js";
import { resolveComponents } from "./composite-resolver.js";
import { ExpansionError } from "./errors.js";

export type ExpansionWarning =
  | {
      readonly kind: "unresolved-component";
      readonly composite: SloIdentity;
      readonly ref: SloIdentity;
    }
  | {
      readonly kind: "nested-composite";
      readonly composite: SloIdentity;
      readonly ref: SloIdentity;
    };

export interface Expansion {
  readonly scope: TargetScope;
  readonly records: readonly SloRecord[];
  readonly warnings: readonly ExpansionWarning[];
}

/**
 * Drop repeated SLOs, keeping the first occurrence and the original order.
 */
export function dedupeRecords(records: readonly SloRecord[]): SloRecord[] {
  const seen = new Set<SloKey>();
  const result: SloRecord[] = [];
  for (const record of records) {
    const key = sloKey(record.identity);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(record);
  }
  return result;
}

function expandIndividual(
  identities: readonly SloIdentity[],
  catalog: SloCatalog,
): SloRecord[] {
  const found: SloRecord[] = [];
  const missing: SloIdentity[] = [];
  const missingKeys = new Set<SloKey>();

  for (const identity of identities) {
    const record = catalog.lookupByIdentity(identity);
    if (record !== undefined) {
      found.push(record);
      continue;
    }
    const key = sloKey(identity);
    if (!missingKeys.has(key)) {
      missingKeys.add(key);
      missing.push({ project: identity.project, name: identity.name });
    }
  }

  if (missing.length > 0) {
    throw new ExpansionError(
      `Unknown SLO${missing.length === 1 ? "" : "s"}: ${missing.map(sloKey).join(", ")}`,
      missing,
    );
  }

  return found;
}

function expandComposite(
  identity: SloIdentity,
  catalog: SloCatalog,
): { records: SloRecord[]; warnings: ExpansionWarning[] } {
  const record = catalog.lookupByIdentity(identity);
  if (record === undefined) {
    throw new ExpansionError(`Unknown composite SLO: ${sloKey(identity)}`, [
      { project: identity.project, name: identity.name },
    ]);
  }
  if (!record.isComposite) {
    throw new ExpansionError(`SLO ${sloKey(identity)} is not a composite SLO`);
  }

  const resolution = resolveComponents(record, catalog);
  const warnings: ExpansionWarning[] = [
    ...resolution.unresolved.map(
      (ref): ExpansionWarning => ({
        kind: "unresolved-component",
        composite: record.identity,
        ref,
      }),
    ),
    ...resolution.nestedComposites.map(
      (nested): ExpansionWarning => ({
        kind: "nested-composite",
        composite: record.identity,
        ref: nested.identity,
      }),
    ),
  ];

  return { records: [record, ...resolution.resolved], warnings };
}

/**
 * Expand a target scope against the catalog.
 *
 * @throws {ExpansionError} when the scope cannot be resolved
 */
export function expandScope(scope: TargetScope, catalog: SloCatalog): Expansion {
  switch (scope.kind) {
    case "project":
      return {
        scope,
        records: dedupeRecords(catalog.lookupByProject(scope.project)),
        warnings: [],
      };
    case "service":
      return {
        scope,
        records: dedupeRecords(catalog.lookupByService(scope.project, scope.service)),
        warnings: [],
      };
    case "individual":
      return {
        scope,
        records: dedupeRecords(expandIndividual(scope.identities, catalog)),
        warnings: [],
      };
    case "composite": {
      const { records, warnings } = expandComposite(scope.identity, catalog);
      return { scope, records: dedupeRecords(records), warnings };
    }
  }
}

/**
 * Render a warning for logs and terminal output.
 */
export function describeWarning(warning: ExpansionWarning): string {
  switch (warning.kind) {
    case "unresolved-component":
      return `Component ${sloKey(warning.ref)} of composite ${sloKey(warning.composite)} was not found; skipped`;
    case "nested-composite":
      return `Component ${sloKey(warning.ref)} of composite ${sloKey(warning.composite)} is itself composite; its components are not annotated`;
  }
}
