import dotenv from "dotenv";
dotenv.config();

import { parseArgs } from "util";
import { parseRef, type ResourceRef } from "@shared/fhirTypes";
import { getBundlesDir, resolveTargetContext } from "../server/config";
import { closeDb } from "../server/db";
import { deleteEntityGraph } from "../server/deletion/graphDeleter";
import { ConfigurationError } from "../server/errors";
import { loadSharedResourceRefs } from "../server/provisioning/bundleLoader";

const USAGE =
  "Usage: cleanup <entity-identifier> [--server HOST] [--delete-shared] [--practice-id ID] [--bundles-dir DIR] [--entity-type TYPE]";

async function main(): Promise<number> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      server: { type: "string" },
      "delete-shared": { type: "boolean" },
      "practice-id": { type: "string" },
      "bundles-dir": { type: "string" },
      "entity-type": { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }
  if (positionals.length !== 1) {
    throw new ConfigurationError(`Expected exactly one entity identifier\n${USAGE}`);
  }

  const ctx = resolveTargetContext({ serverHost: values.server });

  let sharedResources: ResourceRef[] | undefined;
  if (values["delete-shared"]) {
    const refs = await loadSharedResourceRefs(values["bundles-dir"] ?? getBundlesDir());
    sharedResources = refs.map(parseRef).filter((ref): ref is ResourceRef => ref !== undefined);
  }

  const summary = await deleteEntityGraph(ctx, positionals[0], {
    sharedResources,
    practiceId: values["practice-id"],
    entityType: values["entity-type"],
  });

  if (summary.status === "not_found") {
    console.log(`[cleanup] ${summary.message ?? "no resources found"} for ${summary.identifier}`);
    return 0;
  }
  for (const ref of summary.blocked) console.log(`[cleanup] blocked: ${ref.type}/${ref.id}`);
  for (const ref of summary.failed) console.log(`[cleanup] failed: ${ref.type}/${ref.id}`);
  console.log(`[cleanup] ${summary.identifier}: ${summary.status} ${JSON.stringify(summary.counts)}`);
  return summary.status === "completed" ? 0 : 1;
}

main()
  .then(async (code) => {
    await closeDb();
    process.exit(code);
  })
  .catch(async (e) => {
    console.error(e instanceof ConfigurationError ? e.message : e);
    await closeDb();
    process.exit(1);
  });
