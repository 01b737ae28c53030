import dotenv from "dotenv";
dotenv.config();

import { parseArgs } from "util";
import { resolveTargetContext } from "../server/config";
import { closeDb } from "../server/db";
import { ConfigurationError } from "../server/errors";
import { logError } from "../server/logger";
import { runPipeline } from "../server/provisioning/pipelineController";

const USAGE =
  "Usage: provision <entity-id> [--server HOST] [--practice-id ID] [--start-step 1-6] [--bundles-dir DIR] [--entity-type TYPE]";

async function main(): Promise<number> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      server: { type: "string" },
      "practice-id": { type: "string" },
      "start-step": { type: "string" },
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
    throw new ConfigurationError(`Expected exactly one entity id\n${USAGE}`);
  }

  const ctx = resolveTargetContext({ serverHost: values.server });
  const result = await runPipeline(ctx, {
    entityId: positionals[0],
    practiceId: values["practice-id"] ?? process.env.PRACTICE_ID ?? "",
    startStep: values["start-step"] === undefined ? undefined : Number(values["start-step"]),
    bundlesDir: values["bundles-dir"],
    entityType: values["entity-type"],
  });

  for (const step of result.steps) {
    console.log(`[provision] step ${step.step} ${step.key}: ${step.status}${step.message ? ` - ${step.message}` : ""}`);
  }
  if (!result.success && result.failure) {
    logError(result.failure.message, "provision");
    if (result.failure.body) logError(`Store response: ${result.failure.body}`, "provision");
    return 1;
  }
  console.log(`[provision] ${result.externalId} provisioned (${result.uploadedCount} resources uploaded)`);
  return 0;
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
