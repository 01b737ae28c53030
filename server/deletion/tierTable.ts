import { z } from "zod";
import type { ResourceRef } from "@shared/fhirTypes";
import tierData from "./deletionTiers.json";

const tierTableSchema = z.object({
  defaultTier: z.number().int(),
  tiers: z.array(z.object({
    tier: z.number().int().positive(),
    label: z.string(),
    types: z.array(z.object({
      resourceType: z.string().min(1),
      searchParam: z.string().nullable(),
    })),
  })),
});

export interface TierEntry {
  resourceType: string;
  tier: number;
  label: string;
  searchParam: string | null;
}

const table = tierTableSchema.parse(tierData);

export const ENTITY_TIER = 5;
export const SHARED_TIER = 6;
export const DEFAULT_TIER = table.defaultTier;

/** Reverse-dependency order: lower tiers are removed first. */
export const DELETION_TIER_TABLE: readonly TierEntry[] = table.tiers
  .slice()
  .sort((a, b) => a.tier - b.tier)
  .flatMap((t) => t.types.map((type) => ({ ...type, tier: t.tier, label: t.label })));

const tierByType = new Map(DELETION_TIER_TABLE.map((e) => [e.resourceType, e.tier]));
const positionByType = new Map(DELETION_TIER_TABLE.map((e, index) => [e.resourceType, index]));

export const SHARED_RESOURCE_ORDER: readonly string[] = DELETION_TIER_TABLE
  .filter((e) => e.tier === SHARED_TIER)
  .map((e) => e.resourceType);

export function isSharedType(resourceType: string): boolean {
  return tierByType.get(resourceType) === SHARED_TIER;
}

export function tierOf(resourceType: string): number {
  return tierByType.get(resourceType) ?? DEFAULT_TIER;
}

export function tierLabel(tier: number): string {
  return table.tiers.find((t) => t.tier === tier)?.label ?? `tier-${tier}`;
}

/** Types that can be found by a patient-scoped search when `$everything` is unavailable. */
export function scopedSearchTypes(): TierEntry[] {
  return DELETION_TIER_TABLE.filter((e) => e.searchParam !== null && e.tier < ENTITY_TIER);
}

// Table position first; types missing from the table sort after, by name.
export function compareForDeletion(a: ResourceRef, b: ResourceRef): number {
  const pa = positionByType.get(a.type) ?? Number.MAX_SAFE_INTEGER;
  const pb = positionByType.get(b.type) ?? Number.MAX_SAFE_INTEGER;
  if (pa !== pb) return pa - pb;
  if (a.type !== b.type) return a.type < b.type ? -1 : 1;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}
