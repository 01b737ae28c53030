import { access, readFile } from "fs/promises";
import path from "path";
import { fhirBundleSchema } from "@shared/fhirTypes";
import { ConfigurationError } from "../errors";
import { buildResourceBundle, sharedRefsOf, type ResourceBundle } from "../model/resourceModel";

// Upload order: each type may only reference types before it.
export const SHARED_BUNDLE_ORDER = ["Organization", "Practitioner", "Location", "PractitionerRole"] as const;

export function entityBundlePath(bundlesDir: string, entityId: string): string {
  return path.join(bundlesDir, `${entityId}_bundle.json`);
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function readBundleFile(filePath: string, name: string, scope: ResourceBundle["scope"]): Promise<ResourceBundle> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read bundle file ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ConfigurationError(`Bundle file ${filePath} is not valid JSON`);
  }

  const parsed = fhirBundleSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigurationError(`Bundle file ${filePath} is not a FHIR Bundle: ${issues}`);
  }
  return buildResourceBundle(name, scope, parsed.data);
}

/** Shared bundles present in the directory, in upload order. Missing files are skipped. */
export async function loadSharedBundles(bundlesDir: string): Promise<ResourceBundle[]> {
  const bundles: ResourceBundle[] = [];
  for (const type of SHARED_BUNDLE_ORDER) {
    const filePath = path.join(bundlesDir, `${type}.json`);
    if (!(await fileExists(filePath))) continue;
    bundles.push(await readBundleFile(filePath, type, "shared"));
  }
  return bundles;
}

export async function loadEntityBundle(bundlesDir: string, entityId: string): Promise<ResourceBundle> {
  const filePath = entityBundlePath(bundlesDir, entityId);
  if (!(await fileExists(filePath))) {
    throw new ConfigurationError(`Entity bundle not found: ${filePath}`);
  }
  return readBundleFile(filePath, `${entityId}_bundle`, "entity");
}

/**
 * `Type/id` of every shared resource authored in the bundle directory.
 * Entries without an id are skipped since their store id is not known up front.
 */
export async function loadSharedResourceRefs(bundlesDir: string): Promise<string[]> {
  const bundles = await loadSharedBundles(bundlesDir);
  return sharedRefsOf(bundles).filter((ref) => !ref.startsWith("urn:"));
}
