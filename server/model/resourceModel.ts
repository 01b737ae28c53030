import type { FhirBundle, FhirResource } from "@shared/fhirTypes";
import { BundleOrderError, ConfigurationError, RemoteIdAlreadyAssignedError } from "../errors";

export type BundleScope = "shared" | "entity";

export interface ResourceRecord {
  type: string;
  localRef: string;
  remoteId?: string;
  refs: string[];
}

export interface BundleItem {
  record: ResourceRecord;
  resource: FhirResource;
  fullUrl?: string;
  // Request line authored in the source file, kept when already a transaction.
  request?: { method: string; url: string };
}

export interface ResourceBundle {
  name: string;
  scope: BundleScope;
  items: BundleItem[];
}

export interface ParsedLocation {
  type: string;
  id: string;
  version?: string;
}

const RELATIVE_REF = /^([A-Z][A-Za-z]+)\/([A-Za-z0-9.-]{1,64})(?:\/_history\/[^/]+)?$/;
const LOCATION = /^(?:.*?\/)??([A-Z][A-Za-z]+)\/([A-Za-z0-9.-]{1,64})(?:\/_history)?(?:\/([^/]+))?\/?$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Normalise a reference string to `Type/id`. Contained (`#...`) and absolute
 * references point outside the upload and yield undefined; `urn:` references
 * are kept verbatim since they name another entry's fullUrl.
 */
export function normalizeReference(reference: string): string | undefined {
  const trimmed = reference.trim();
  if (!trimmed || trimmed.startsWith("#")) return undefined;
  if (/^https?:\/\//i.test(trimmed)) return undefined;
  if (trimmed.startsWith("urn:")) return trimmed;
  const match = RELATIVE_REF.exec(trimmed);
  if (!match) return undefined;
  return `${match[1]}/${match[2]}`;
}

export function collectReferences(resource: unknown): string[] {
  const refs: string[] = [];
  const seen = new Set<string>();

  const walk = (value: unknown): void => {
    if (Array.isArray(value)) {
      for (const item of value) walk(item);
      return;
    }
    if (!isRecord(value)) return;
    for (const [key, child] of Object.entries(value)) {
      if (key === "reference" && typeof child === "string") {
        const ref = normalizeReference(child);
        if (ref && !seen.has(ref)) {
          seen.add(ref);
          refs.push(ref);
        }
      } else {
        walk(child);
      }
    }
  };

  walk(resource);
  return refs;
}

export function buildResourceBundle(name: string, scope: BundleScope, source: FhirBundle): ResourceBundle {
  const items: BundleItem[] = [];
  for (const [index, entry] of (source.entry ?? []).entries()) {
    const resource = entry.resource;
    if (!resource) continue;
    const localRef = resource.id ? `${resource.resourceType}/${resource.id}` : entry.fullUrl;
    if (!localRef) {
      throw new ConfigurationError(
        `Bundle "${name}": entry ${index} (${resource.resourceType}) has neither an id nor a fullUrl`,
      );
    }
    items.push({
      record: {
        type: resource.resourceType,
        localRef,
        refs: collectReferences(resource).filter((ref) => ref !== localRef),
      },
      resource,
      fullUrl: entry.fullUrl,
      request: entry.request ? { method: entry.request.method, url: entry.request.url } : undefined,
    });
  }
  return { name, scope, items };
}

/**
 * Reject forward references: every ref must name an earlier item (by
 * localRef or fullUrl) or an already-known shared resource.
 */
export function validateBundleOrder(bundle: ResourceBundle, knownRefs: Iterable<string> = []): void {
  const seen = new Set<string>(knownRefs);
  for (const item of bundle.items) {
    for (const ref of item.record.refs) {
      if (!seen.has(ref)) {
        throw new BundleOrderError(bundle.name, item.record.localRef, ref);
      }
    }
    seen.add(item.record.localRef);
    if (item.fullUrl) seen.add(item.fullUrl);
  }
}

export function assignRemoteId(record: ResourceRecord, remoteId: string): void {
  if (record.remoteId !== undefined) {
    throw new RemoteIdAlreadyAssignedError(record.localRef, record.remoteId);
  }
  record.remoteId = remoteId;
}

export function parseLocation(location: string): ParsedLocation | undefined {
  const match = LOCATION.exec(location.trim());
  if (!match) return undefined;
  const [, type, id, version] = match;
  return version ? { type, id, version } : { type, id };
}

export function toTransactionBundle(bundle: ResourceBundle): FhirBundle {
  return {
    resourceType: "Bundle",
    type: "transaction",
    entry: bundle.items.map((item) => {
      const { type } = item.record;
      const id = item.resource.id;
      if (item.request) {
        return { fullUrl: item.fullUrl, resource: item.resource, request: item.request };
      }
      if (id) {
        return {
          fullUrl: item.fullUrl,
          resource: item.resource,
          request: { method: "PUT", url: `${type}/${id}` },
        };
      }
      return {
        fullUrl: item.fullUrl,
        resource: item.resource,
        request: { method: "POST", url: type },
      };
    }),
  };
}

export function sharedRefsOf(bundles: ResourceBundle[]): string[] {
  return bundles.flatMap((b) => b.items.map((i) => i.record.localRef));
}
