import type { BundleEntry, FhirBundle } from "@shared/fhirTypes";
import { getFhirClient } from "../fhir/fhirClient";
import { log } from "../logger";
import {
  assignRemoteId,
  parseLocation,
  toTransactionBundle,
  validateBundleOrder,
  type ResourceBundle,
  type ResourceRecord,
} from "../model/resourceModel";
import type { TargetContext } from "../target";
import type { IdentifierScratch } from "./identifierScratch";

export type ExtractedId =
  | { source: "location"; type: string; id: string; version?: string }
  | { source: "resource"; type: string; id: string }
  | { source: "bundle"; type: string; id: string }
  | { source: "missing"; type?: string };

export type FoundId = Exclude<ExtractedId, { source: "missing" }>;

export interface UploadResult {
  bundleName: string;
  records: ResourceRecord[];
  extracted: FoundId[];
  countsByType: Record<string, number>;
  unassigned: ResourceRecord[];
}

function nonEmpty(value: string | undefined): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

/**
 * Pull the store id out of one transaction-response entry. Sources are
 * tried in order: the location header, the echoed resource, then the
 * id of the response bundle itself.
 */
export function extractEntryId(
  entry: BundleEntry,
  opts: { bundleId?: string; typeHint?: string } = {},
): ExtractedId {
  const location = entry.response?.location;
  if (nonEmpty(location)) {
    const parsed = parseLocation(location);
    if (parsed && nonEmpty(parsed.id)) {
      return parsed.version
        ? { source: "location", type: parsed.type, id: parsed.id, version: parsed.version }
        : { source: "location", type: parsed.type, id: parsed.id };
    }
  }

  const resource = entry.resource;
  if (resource && nonEmpty(resource.id)) {
    return { source: "resource", type: resource.resourceType, id: resource.id };
  }

  const type = resource?.resourceType ?? opts.typeHint;
  if (nonEmpty(opts.bundleId) && nonEmpty(type)) {
    return { source: "bundle", type, id: opts.bundleId };
  }
  return { source: "missing", type };
}

export function extractResponseIds(response: FhirBundle, requestTypes: string[]): ExtractedId[] {
  return (response.entry ?? []).map((entry, index) =>
    extractEntryId(entry, { bundleId: response.id, typeHint: requestTypes[index] }),
  );
}

/**
 * Submit one bundle as a single transaction and assign the returned ids to
 * its records, by type in bundle order.
 */
export async function uploadBundle(
  ctx: TargetContext,
  bundle: ResourceBundle,
  opts: { knownRefs?: Iterable<string>; scratch?: IdentifierScratch } = {},
): Promise<UploadResult> {
  validateBundleOrder(bundle, opts.knownRefs);

  const requestTypes = bundle.items.map((item) => item.record.type);
  log(`Uploading bundle "${bundle.name}" (${bundle.items.length} resources)`, "uploader");
  const response = await getFhirClient(ctx).transaction(toTransactionBundle(bundle));

  const extracted: FoundId[] = [];
  const countsByType: Record<string, number> = {};
  for (const type of requestTypes) countsByType[type] = 0;

  for (const result of extractResponseIds(response, requestTypes)) {
    if (result.type && countsByType[result.type] === undefined) {
      countsByType[result.type] = 0;
    }
    if (result.source === "missing") continue;
    extracted.push(result);
    countsByType[result.type] = (countsByType[result.type] ?? 0) + 1;
  }

  const queues = new Map<string, string[]>();
  for (const found of extracted) {
    const queue = queues.get(found.type) ?? [];
    queue.push(found.id);
    queues.set(found.type, queue);
    opts.scratch?.record(found.type, found.id);
  }

  const records = bundle.items.map((item) => item.record);
  const unassigned: ResourceRecord[] = [];
  for (const record of records) {
    const next = queues.get(record.type)?.shift();
    if (next === undefined) {
      unassigned.push(record);
    } else {
      assignRemoteId(record, next);
    }
  }

  for (const [type, total] of Object.entries(countsByType).sort(([a], [b]) => a.localeCompare(b))) {
    log(`  ${type}: ${total} id(s)`, "uploader");
  }
  log(`Extracted ${extracted.length} resource id(s) from "${bundle.name}"`, "uploader");

  return { bundleName: bundle.name, records, extracted, countsByType, unassigned };
}
