/**
 * Target Scope Types
 *
 * The operator's choice of which SLOs a batch of annotations applies to.
 * Constructed from user input and consumed once by the target expander.
 */

import type { SloIdentity } from "./slo.js";

export interface ProjectScope {
  readonly kind: "project";
  readonly project: string;
}

export interface ServiceScope {
  readonly kind: "service";
  readonly project: string;
  readonly service: string;
}

export interface IndividualScope {
  readonly kind: "individual";
  /** Hand-picked SLOs, in selection order */
  readonly identities: readonly SloIdentity[];
}

export interface CompositeScope {
  readonly kind: "composite";
  /** The composite SLO; its components are annotated along with it */
  readonly identity: SloIdentity;
}

export type TargetScope =
  | ProjectScope
  | ServiceScope
  | IndividualScope
  | CompositeScope;

export type TargetScopeKind = TargetScope["kind"];
