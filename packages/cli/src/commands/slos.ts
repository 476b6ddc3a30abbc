/**
 * `slos`: print the catalog, numbered in listing order.
 */

import { z } from "zod";
import type { SloRecord } from "@slo-annotator/types";
import { sloKey } from "@slo-annotator/types";
import { loadCatalog, openSession } from "../session.js";
import type { CommandDeps, ExitCode, GlobalOptions } from "./shared.js";
import { EXIT_OK, guarded, parseOptions } from "./shared.js";

export const SlosOptionsSchema = z.object({
  project: z.string().min(1).optional(),
  service: z.string().min(1).optional(),
  slosFile: z.string().min(1).optional(),
});

export async function runSlos(
  rawOptions: unknown,
  globals: GlobalOptions,
  deps: CommandDeps,
): Promise<ExitCode> {
  return guarded(deps, async () => {
    const options = parseOptions(SlosOptionsSchema, rawOptions);
    const { printer } = deps;

    const client =
      options.slosFile !== undefined
        ? undefined
        : (await openSession(deps, { context: globals.context })).client;
    const catalog = await loadCatalog(deps, { client, slosFile: options.slosFile });

    const records = catalog
      .all()
      .filter(
        (record: SloRecord) =>
          (options.project === undefined || record.identity.project === options.project) &&
          (options.service === undefined || record.identity.service === options.service),
      );

    printer.heading(`SLOs (${records.length} of ${catalog.size}):`);
    records.forEach((record, i) => {
      const service = record.identity.service !== undefined ? ` (${record.identity.service})` : "";
      const marker = record.isComposite
        ? ` [composite, ${record.componentRefs.length} components]`
        : "";
      printer.line(`${String(i + 1).padStart(3)}. ${sloKey(record.identity)}${service}${marker}`);
    });
    if (catalog.skipped.length > 0) {
      printer.warn(`${catalog.skipped.length} invalid SLO definitions skipped`);
    }
    return EXIT_OK;
  });
}
