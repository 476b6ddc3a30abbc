/**
 * SLO Catalog: in-memory index of every SLO visible to the session.
 *
 * Built once from a raw listing and read-only afterwards. Listing order
 * is preserved by every lookup so batch numbering shown to the operator
 * is reproducible.
 *
 * Usage:
 *   const catalog = SloCatalog.build(await client.slos.list());
 *   const records = catalog.lookupByService("payments", "checkout-api");
 */

import type { SloIdentity, SloKey, SloRecord } from "@slo-annotator/types";
import { sloKey } from "@slo-annotator/types";
import { parseSloListing } from "./listing.js";
import type { ListingEntry, SkippedListingEntry } from "./listing.js";

export interface ProjectSummary {
  readonly project: string;
  readonly count: number;
}

export interface ServiceSummary {
  readonly project: string;
  readonly service: string;
  readonly count: number;
}

function serviceKey(project: string, service: string): string {
  return `${project}\u0000${service}`;
}

function freezeRecord(record: SloRecord): SloRecord {
  return Object.freeze({
    identity: Object.freeze({ ...record.identity }),
    displayName: record.displayName,
    isComposite: record.isComposite,
    componentRefs: Object.freeze(record.componentRefs.map((ref) => Object.freeze({ ...ref }))),
  });
}

const EMPTY: readonly SloRecord[] = Object.freeze([]);

export class SloCatalog {
  /** Entries dropped while building (invalid or duplicate definitions). */
  readonly skipped: readonly SkippedListingEntry[];

  private readonly records: readonly SloRecord[];
  private readonly byKey = new Map<SloKey, SloRecord>();
  private readonly byProject = new Map<string, SloRecord[]>();
  private readonly byService = new Map<string, SloRecord[]>();

  private constructor(
    entries: readonly ListingEntry[],
    skipped: readonly SkippedListingEntry[],
  ) {
    const kept: SloRecord[] = [];
    const dropped: SkippedListingEntry[] = [...skipped];

    for (const { index, record: input } of entries) {
      const key = sloKey(input.identity);
      if (this.byKey.has(key)) {
        dropped.push({ index, reason: `duplicate SLO ${key}` });
        continue;
      }

      const record = freezeRecord(input);
      kept.push(record);
      this.byKey.set(key, record);

      const projectList = this.byProject.get(record.identity.project);
      if (projectList) {
        projectList.push(record);
      } else {
        this.byProject.set(record.identity.project, [record]);
      }

      const service = record.identity.service;
      if (service !== undefined) {
        const sKey = serviceKey(record.identity.project, service);
        const serviceList = this.byService.get(sKey);
        if (serviceList) {
          serviceList.push(record);
        } else {
          this.byService.set(sKey, [record]);
        }
      }
    }

    this.records = Object.freeze(kept);
    this.skipped = Object.freeze(dropped.sort((a, b) => a.index - b.index));
  }

  /**
   * Build a catalog from a raw platform listing.
   *
   * @throws {ListingError} if the listing is not an array
   */
  static build(rawListing: unknown): SloCatalog {
    const { entries, skipped } = parseSloListing(rawListing);
    return new SloCatalog(entries, skipped);
  }

  /**
   * Build a catalog from already-constructed records.
   */
  static fromRecords(records: readonly SloRecord[]): SloCatalog {
    return new SloCatalog(
      records.map((record, index) => ({ index, record })),
      [],
    );
  }

  get size(): number {
    return this.records.length;
  }

  all(): readonly SloRecord[] {
    return this.records;
  }

  lookupByProject(project: string): readonly SloRecord[] {
    return this.byProject.get(project) ?? EMPTY;
  }

  lookupByService(project: string, service: string): readonly SloRecord[] {
    return this.byService.get(serviceKey(project, service)) ?? EMPTY;
  }

  lookupByIdentity(identity: Pick<SloIdentity, "project" | "name">): SloRecord | undefined {
    return this.byKey.get(sloKey(identity));
  }

  allComposites(): readonly SloRecord[] {
    return this.records.filter((record) => record.isComposite);
  }

  /** Distinct projects in first-seen order. */
  projects(): readonly ProjectSummary[] {
    return [...this.byProject.entries()].map(([project, list]) => ({
      project,
      count: list.length,
    }));
  }

  /** Distinct (project, service) pairs in first-seen order. */
  services(): readonly ServiceSummary[] {
    const result: ServiceSummary[] = [];
    for (const list of this.byService.values()) {
      const first = list[0];
      if (first?.identity.service !== undefined) {
        result.push({
          project: first.identity.project,
          service: first.identity.service,
          count: list.length,
        });
      }
    }
    return result;
  }
}
