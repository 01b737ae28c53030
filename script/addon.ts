import dotenv from "dotenv";
dotenv.config();

import { readFile } from "fs/promises";
import path from "path";
import { parseArgs } from "util";
import { resolveTargetContext } from "../server/config";
import { ConfigurationError } from "../server/errors";
import { logError } from "../server/logger";
import { uploadAddonDocument } from "../server/provisioning/addonDocumentService";

const USAGE = "Usage: addon <entity-id> <xml-file> [--server HOST] [--practice-id ID] [--entity-type TYPE]";

async function main(): Promise<number> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      server: { type: "string" },
      "practice-id": { type: "string" },
      "entity-type": { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }
  if (positionals.length !== 2) {
    throw new ConfigurationError(`Expected an entity id and an XML file\n${USAGE}`);
  }
  const [entityId, filePath] = positionals;

  let document: string;
  try {
    document = await readFile(filePath, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const ctx = resolveTargetContext({ serverHost: values.server });
  const result = await uploadAddonDocument(ctx, {
    entityId,
    practiceId: values["practice-id"] ?? process.env.PRACTICE_ID ?? "",
    entityType: values["entity-type"],
    fileName: path.basename(filePath),
    document,
  });

  for (const step of result.steps) {
    console.log(`[addon] ${step.key}: ${step.status}${step.message ? ` - ${step.message}` : ""}`);
  }
  if (!result.success && result.failure) {
    logError(result.failure.message, "addon");
    if (result.failure.body) logError(`Service response: ${result.failure.body}`, "addon");
    return 1;
  }
  console.log(`[addon] ${path.basename(filePath)} attached to ${result.externalId}`);
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((e) => {
    console.error(e instanceof ConfigurationError ? e.message : e);
    process.exit(1);
  });
