/**
 * SLO Types
 *
 * An SLO is addressed by its project and name. The service is carried
 * along for display and service-scoped selection but does not take part
 * in identity.
 */

/**
 * Immutable identity of an SLO.
 */
export interface SloIdentity {
  /** SLO name, unique within its project */
  readonly name: string;

  /** Project the SLO belongs to */
  readonly project: string;

  /** Service the SLO is attached to (absent for component references) */
  readonly service?: string | undefined;
}

/**
 * Catalog entry for one SLO.
 *
 * Records are created in bulk when the catalog is built and never
 * mutated afterwards.
 */
export interface SloRecord {
  readonly identity: SloIdentity;

  /** Human-readable name; falls back to the SLO name */
  readonly displayName: string;

  /** True when an objective aggregates other SLOs */
  readonly isComposite: boolean;

  /** Component references in declared order (empty unless composite) */
  readonly componentRefs: readonly SloIdentity[];
}

/**
 * Uniqueness key of an SLO identity: `project/name`.
 */
export type SloKey = `${string}/${string}`;

export function sloKey(identity: Pick<SloIdentity, "project" | "name">): SloKey {
  return `${identity.project}/${identity.name}`;
}

/**
 * Parse a `project/name` reference as typed on a command line.
 *
 * Returns undefined when either side is empty or the separator is missing.
 */
export function parseSloKey(value: string): SloIdentity | undefined {
  const idx = value.indexOf("/");
  if (idx <= 0 || idx === value.length - 1) return undefined;
  const project = value.slice(0, idx).trim();
  const name = value.slice(idx + 1).trim();
  if (project === "" || name === "") return undefined;
  return { project, name };
}
