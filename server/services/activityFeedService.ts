import type { TargetContext } from "../target";
import {
  PROVISIONING_EVENT_TYPES,
  subscribe,
  type ProvisioningEvent,
  type ProvisioningEventType,
} from "./provisioningEventService";

export interface ActivityFeedEntry {
  timestamp: Date;
  serverHost: string;
  eventType: ProvisioningEventType;
  status: string;
  entityId: string;
  step?: number;
  tier?: number;
  error?: { code?: string; message: string };
}

const DEFAULT_CAPACITY = 200;

let entries: ActivityFeedEntry[] = [];
let unsubscribers: Array<() => void> = [];

function toEntry(ctx: TargetContext, event: ProvisioningEvent): ActivityFeedEntry {
  const entry: ActivityFeedEntry = {
    timestamp: new Date(),
    serverHost: ctx.serverHost,
    eventType: event.type,
    status: event.status,
    entityId: event.entityId,
  };
  if (event.step !== undefined) entry.step = event.step;
  if (event.tier !== undefined) entry.tier = event.tier;
  if (event.error) entry.error = event.error;
  return entry;
}

/**
 * Subscribe to every provisioning event and keep the most recent ones in
 * memory. Starting again drops the previous buffer and subscriptions.
 * Returns a function that unsubscribes.
 */
export function startActivityFeed(capacity = DEFAULT_CAPACITY): () => void {
  for (const unsubscribe of unsubscribers) unsubscribe();
  entries = [];

  unsubscribers = PROVISIONING_EVENT_TYPES.map((eventType) =>
    subscribe(eventType, (ctx, event) => {
      entries.push(toEntry(ctx, event));
      if (entries.length > capacity) entries.splice(0, entries.length - capacity);
    }),
  );

  const current = unsubscribers;
  return () => {
    for (const unsubscribe of current) unsubscribe();
  };
}

// Newest first.
export function getActivityFeed(opts: { limit?: number; entityId?: string } = {}): ActivityFeedEntry[] {
  const limit = opts.limit ?? 50;
  const matching = opts.entityId ? entries.filter((e) => e.entityId === opts.entityId) : entries;
  return matching.slice().reverse().slice(0, limit);
}
