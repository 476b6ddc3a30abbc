/**
 * Composite Resolver
 *
 * Resolves the component references of one composite SLO against the
 * catalog. This is a plain lookup over a fixed list (depth exactly one):
 * a component that is itself composite is returned as-is and flagged,
 * never expanded further.
 *
 * Order and multiplicity are kept as declared. A reference the catalog
 * does not know is reported as unresolved instead of failing the whole
 * resolution.
 */

import type { SloIdentity, SloRecord } from "@slo-annotator/types";
import { sloKey } from "@slo-annotator/types";
import type { SloCatalog } from "./catalog.js";
import { InvalidArgumentError } from "./errors.js";

export type ComponentResolution =
  | { readonly status: "resolved"; readonly record: SloRecord }
  | { readonly status: "unresolved"; readonly ref: SloIdentity };

export interface CompositeResolution {
  /** Every declared component, in declared order */
  readonly entries: readonly ComponentResolution[];
  /** Resolved component records, in declared order */
  readonly resolved: readonly SloRecord[];
  /** References the catalog does not contain */
  readonly unresolved: readonly SloIdentity[];
  /** Resolved components that are composites themselves (not expanded) */
  readonly nestedComposites: readonly SloRecord[];
}

/**
 * Resolve a composite record's components.
 *
 * @throws {InvalidArgumentError} if the record is not composite
 */
export function resolveComponents(
  record: SloRecord,
  catalog: SloCatalog,
): CompositeResolution {
  if (!record.isComposite) {
    throw new InvalidArgumentError(
      `Cannot resolve components of non-composite SLO ${sloKey(record.identity)}`,
      { slo: sloKey(record.identity) },
    );
  }

  const entries: ComponentResolution[] = [];
  const resolved: SloRecord[] = [];
  const unresolved: SloIdentity[] = [];
  const nestedComposites: SloRecord[] = [];

  for (const ref of record.componentRefs) {
    const component = catalog.lookupByIdentity(ref);
    if (component === undefined) {
      entries.push({ status: "unresolved", ref });
      unresolved.push(ref);
      continue;
    }

    entries.push({ status: "resolved", record: component });
    resolved.push(component);
    if (component.isComposite) {
      nestedComposites.push(component);
    }
  }

  return { entries, resolved, unresolved, nestedComposites };
}
