import { formatRef, type ResourceRef } from "@shared/fhirTypes";
import { ProvisioningError, describeError } from "../errors";
import { log, warn } from "../logger";
import { buildExternalId } from "../model/identifiers";
import { emitProvisioningEvent } from "../services/provisioningEventService";
import { storage } from "../storage";
import type { TargetContext } from "../target";
import { buildDeletionClosure, partitionIntoTiers, type DeletionClosure } from "./closureDiscovery";
import { deleteResourcePermanently, type RemovalOutcome, type RemovalResult } from "./resourceDeleter";
import { SHARED_RESOURCE_ORDER, SHARED_TIER, compareForDeletion, isSharedType, tierLabel } from "./tierTable";

export interface DeletionOptions {
  sharedResources?: ResourceRef[];
  practiceId?: string;
  entityType?: string;
}

export type DeletionStatus = "completed" | "partial" | "not_found";

export interface TierSummary {
  tier: number;
  label: string;
  results: RemovalResult[];
}

export interface DeletionCounts {
  deleted: number;
  alreadyAbsent: number;
  blocked: number;
  notFinalized: number;
  failed: number;
}

export interface DeletionSummary {
  identifier: string;
  status: DeletionStatus;
  message?: string;
  entityStoreIds: string[];
  tiers: TierSummary[];
  shared?: RemovalResult[];
  counts: DeletionCounts;
  blocked: ResourceRef[];
  failed: ResourceRef[];
  mappingsRemoved: number;
  warnings: string[];
}

// Outcomes after which the store no longer serves the resource.
const GONE: ReadonlySet<RemovalOutcome> = new Set<RemovalOutcome>(["deleted", "already_absent", "not_finalized"]);

function emptyCounts(): DeletionCounts {
  return { deleted: 0, alreadyAbsent: 0, blocked: 0, notFinalized: 0, failed: 0 };
}

function tally(summary: DeletionSummary, result: RemovalResult): void {
  switch (result.outcome) {
    case "deleted":
      summary.counts.deleted++;
      break;
    case "already_absent":
      summary.counts.alreadyAbsent++;
      break;
    case "blocked":
      summary.counts.blocked++;
      summary.blocked.push(result.ref);
      break;
    case "not_finalized":
      summary.counts.notFinalized++;
      break;
    case "failed":
      summary.counts.failed++;
      summary.failed.push(result.ref);
      break;
  }
}

/** Shared resources in removal order: PractitionerRole, Location, Practitioner, Organization. */
export function orderSharedResources(refs: ResourceRef[]): ResourceRef[] {
  const seen = new Set<string>();
  const unique = refs.filter((ref) => {
    const key = formatRef(ref);
    if (seen.has(key) || !isSharedType(ref.type)) return false;
    seen.add(key);
    return true;
  });
  return unique.sort((a, b) => {
    const diff = SHARED_RESOURCE_ORDER.indexOf(a.type) - SHARED_RESOURCE_ORDER.indexOf(b.type);
    return diff !== 0 ? diff : compareForDeletion(a, b);
  });
}

async function removeMappings(
  summary: DeletionSummary,
  entityType: string,
  practiceId: string,
  entityGone: boolean,
): Promise<void> {
  if (entityGone) {
    const externalId = buildExternalId(practiceId, summary.identifier);
    try {
      summary.mappingsRemoved += await storage.deleteIdentifierMapping(entityType, externalId);
    } catch (err) {
      summary.warnings.push(`Could not remove ${entityType} mapping for ${externalId}: ${describeError(err)}`);
    }
  }

  const removedShared = new Map<string, string[]>();
  for (const result of summary.shared ?? []) {
    if (!GONE.has(result.outcome)) continue;
    const ids = removedShared.get(result.ref.type) ?? [];
    ids.push(result.ref.id);
    removedShared.set(result.ref.type, ids);
  }
  for (const [type, ids] of Array.from(removedShared.entries())) {
    try {
      summary.mappingsRemoved += await storage.deleteIdentifierMappingsByStoreIds(type, ids);
    } catch (err) {
      summary.warnings.push(`Could not remove ${type} mappings: ${describeError(err)}`);
    }
  }
}

/**
 * Remove every resource belonging to the entity, tier by tier. Each tier
 * is fully processed before the next one starts. Store-side failures are
 * collected in the summary rather than thrown; only a failed discovery
 * throws, after a failed `deletion.completed` event.
 */
export async function deleteEntityGraph(
  ctx: TargetContext,
  identifier: string,
  opts: DeletionOptions = {},
): Promise<DeletionSummary> {
  const entityType = opts.entityType ?? "Patient";
  const summary: DeletionSummary = {
    identifier,
    status: "completed",
    entityStoreIds: [],
    tiers: [],
    counts: emptyCounts(),
    blocked: [],
    failed: [],
    mappingsRemoved: 0,
    warnings: [],
  };

  emitProvisioningEvent(ctx, { type: "deletion.started", status: "started", entityId: identifier });
  let closure: DeletionClosure;
  try {
    closure = await buildDeletionClosure(ctx, identifier, entityType);
  } catch (err) {
    emitProvisioningEvent(ctx, {
      type: "deletion.completed",
      status: "failed",
      entityId: identifier,
      error: { code: err instanceof ProvisioningError ? err.code : undefined, message: describeError(err) },
    });
    throw err;
  }
  summary.entityStoreIds = closure.entityStoreIds;
  for (const expansion of closure.expansions) summary.warnings.push(...expansion.warnings);

  if (closure.entityStoreIds.length === 0) {
    summary.status = "not_found";
    summary.message = "no resources found";
    log(`No ${entityType} found with identifier ${identifier}; nothing to delete`, "deleter");
    if (opts.practiceId) {
      await removeMappings(summary, entityType, opts.practiceId, true);
    }
    emitProvisioningEvent(ctx, { type: "deletion.completed", status: summary.status, entityId: identifier });
    return summary;
  }

  log(
    `Deleting ${closure.resources.length} resource(s) for ${entityType} ${identifier} (${closure.entityStoreIds.join(", ")})`,
    "deleter",
  );

  for (const tier of partitionIntoTiers(closure)) {
    const tierSummary: TierSummary = { tier: tier.tier, label: tier.label, results: [] };
    for (const ref of tier.resources) {
      const result = await deleteResourcePermanently(ctx, ref);
      tierSummary.results.push(result);
      tally(summary, result);
      if (result.outcome === "blocked") {
        emitProvisioningEvent(ctx, {
          type: "deletion.resource_blocked",
          status: "blocked",
          entityId: identifier,
          tier: tier.tier,
          details: { resource: formatRef(ref) },
        });
      }
    }
    summary.tiers.push(tierSummary);
    emitProvisioningEvent(ctx, {
      type: "deletion.tier_completed",
      status: "completed",
      entityId: identifier,
      tier: tier.tier,
      details: { label: tier.label, processed: tier.resources.length },
    });
  }

  if (opts.sharedResources) {
    const shared = orderSharedResources(opts.sharedResources);
    log(`Deleting ${shared.length} shared resource(s) (${tierLabel(SHARED_TIER)})`, "deleter");
    summary.shared = [];
    for (const ref of shared) {
      const result = await deleteResourcePermanently(ctx, ref);
      summary.shared.push(result);
      tally(summary, result);
    }
  }

  if (opts.practiceId) {
    const entityResults = summary.tiers
      .flatMap((t) => t.results)
      .filter((r) => r.ref.type === entityType);
    const entityGone = entityResults.length > 0 && entityResults.every((r) => GONE.has(r.outcome));
    await removeMappings(summary, entityType, opts.practiceId, entityGone);
  }

  const { blocked, failed, notFinalized } = summary.counts;
  if (blocked > 0 || failed > 0 || notFinalized > 0 || summary.warnings.length > 0) {
    summary.status = "partial";
  }
  if (summary.warnings.length > 0) {
    for (const message of summary.warnings) warn(message, "deleter");
  }

  const c = summary.counts;
  log(
    `Deletion of ${identifier} ${summary.status}: ${c.deleted} deleted, ${c.alreadyAbsent} already absent, ` +
      `${c.blocked} blocked, ${c.notFinalized} not finalized, ${c.failed} failed, ${summary.mappingsRemoved} mapping(s) removed`,
    "deleter",
  );
  emitProvisioningEvent(ctx, {
    type: "deletion.completed",
    status: summary.status,
    entityId: identifier,
    details: { ...summary.counts },
  });
  return summary;
}
