import { formatRef, type FhirResource, type ResourceRef } from "@shared/fhirTypes";
import { describeError } from "../errors";
import { getFhirClient } from "../fhir/fhirClient";
import { log, warn } from "../logger";
import type { TargetContext } from "../target";
import {
  ENTITY_TIER,
  compareForDeletion,
  isSharedType,
  scopedSearchTypes,
  tierLabel,
  tierOf,
} from "./tierTable";

export type ExpansionSource = "everything" | "search";

export interface EntityExpansion {
  entityStoreId: string;
  source: ExpansionSource;
  resources: ResourceRef[];
  warnings: string[];
}

export interface DeletionClosure {
  entityIdentifier: string;
  entityType: string;
  entityStoreIds: string[];
  resources: ResourceRef[];
  expansions: EntityExpansion[];
}

export interface DeletionTier {
  tier: number;
  label: string;
  resources: ResourceRef[];
}

function toRefs(resources: FhirResource[]): ResourceRef[] {
  const refs: ResourceRef[] = [];
  for (const resource of resources) {
    if (resource.id) refs.push({ type: resource.resourceType, id: resource.id });
  }
  return refs;
}

/** Store ids of every entity carrying the identifier. All pages are read. */
export async function findEntityStoreIds(
  ctx: TargetContext,
  identifier: string,
  entityType = "Patient",
): Promise<string[]> {
  const found = await getFhirClient(ctx).searchAll(entityType, { identifier });
  const ids: string[] = [];
  for (const resource of found) {
    if (resource.resourceType === entityType && resource.id && !ids.includes(resource.id)) {
      ids.push(resource.id);
    }
  }
  return ids;
}

/**
 * Everything that belongs to one entity. Uses `$everything` and falls back
 * to per-type scoped searches when the operation fails.
 */
export async function expandClosure(
  ctx: TargetContext,
  entityType: string,
  entityStoreId: string,
): Promise<EntityExpansion> {
  const client = getFhirClient(ctx);
  try {
    const resources = await client.everything(entityType, entityStoreId);
    log(`$everything returned ${resources.length} resource(s) for ${entityType}/${entityStoreId}`, "deleter");
    return { entityStoreId, source: "everything", resources: toRefs(resources), warnings: [] };
  } catch (err) {
    warn(`$everything failed for ${entityType}/${entityStoreId}, falling back to searches: ${describeError(err)}`, "deleter");
  }

  const warnings: string[] = [];
  const refs: ResourceRef[] = [];
  for (const entry of scopedSearchTypes()) {
    if (!entry.searchParam) continue;
    try {
      const found = await client.searchAll(entry.resourceType, {
        [entry.searchParam]: `${entityType}/${entityStoreId}`,
      });
      refs.push(...toRefs(found));
    } catch (err) {
      const message = `Search for ${entry.resourceType} failed: ${describeError(err)}`;
      warn(message, "deleter");
      warnings.push(message);
    }
  }
  return { entityStoreId, source: "search", resources: refs, warnings };
}

/**
 * De-duplicated closure for every entity matching `identifier`. Shared
 * types never enter the closure; other entities of the same type found
 * through expansion are left alone.
 */
export async function buildDeletionClosure(
  ctx: TargetContext,
  identifier: string,
  entityType = "Patient",
): Promise<DeletionClosure> {
  const entityStoreIds = await findEntityStoreIds(ctx, identifier, entityType);
  const closure: DeletionClosure = {
    entityIdentifier: identifier,
    entityType,
    entityStoreIds,
    resources: [],
    expansions: [],
  };
  const seen = new Set<string>();
  const add = (ref: ResourceRef) => {
    const key = formatRef(ref);
    if (seen.has(key)) return;
    seen.add(key);
    closure.resources.push(ref);
  };

  for (const storeId of entityStoreIds) {
    const expansion = await expandClosure(ctx, entityType, storeId);
    closure.expansions.push(expansion);
    for (const ref of expansion.resources) {
      if (isSharedType(ref.type)) continue;
      if (ref.type === entityType && !entityStoreIds.includes(ref.id)) continue;
      add(ref);
    }
    add({ type: entityType, id: storeId });
  }
  return closure;
}

/** Tiers 1 to 5 in processing order, each sorted by table position then id. */
export function partitionIntoTiers(closure: DeletionClosure): DeletionTier[] {
  const tiers: DeletionTier[] = [];
  for (let tier = 1; tier <= ENTITY_TIER; tier++) {
    tiers.push({ tier, label: tierLabel(tier), resources: [] });
  }
  for (const ref of closure.resources) {
    const tier = ref.type === closure.entityType ? ENTITY_TIER : Math.min(tierOf(ref.type), ENTITY_TIER);
    tiers[tier - 1].resources.push(ref);
  }
  for (const t of tiers) t.resources.sort(compareForDeletion);
  return tiers;
}
