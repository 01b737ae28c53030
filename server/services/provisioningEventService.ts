import { log } from "../logger";
import type { TargetContext } from "../target";

export const PROVISIONING_EVENT_TYPES = [
  "pipeline.step_started",
  "pipeline.step_completed",
  "pipeline.step_warning",
  "pipeline.step_failed",
  "pipeline.prerequisite_failed",
  "pipeline.completed",
  "addon.completed",
  "deletion.started",
  "deletion.tier_completed",
  "deletion.resource_blocked",
  "deletion.completed",
] as const;

export type ProvisioningEventType = (typeof PROVISIONING_EVENT_TYPES)[number];

export interface ProvisioningEvent {
  type: ProvisioningEventType;
  status: string;
  entityId: string;
  step?: number;
  tier?: number;
  error?: { code?: string; message: string };
  details?: Record<string, unknown>;
}

export type ProvisioningEventHandler = (
  ctx: TargetContext,
  event: ProvisioningEvent,
) => void | Promise<void>;

const subscribers = new Map<ProvisioningEventType, ProvisioningEventHandler[]>();

export function subscribe(
  eventType: ProvisioningEventType,
  handler: ProvisioningEventHandler,
): () => void {
  const handlers = subscribers.get(eventType) ?? [];
  handlers.push(handler);
  subscribers.set(eventType, handlers);
  return () => {
    const current = subscribers.get(eventType);
    if (current) {
      const idx = current.indexOf(handler);
      if (idx !== -1) current.splice(idx, 1);
    }
  };
}

export function clearSubscribers(): void {
  subscribers.clear();
}

function notifySubscribers(ctx: TargetContext, event: ProvisioningEvent): void {
  const handlers = subscribers.get(event.type);
  if (!handlers || handlers.length === 0) return;
  for (const handler of handlers) {
    Promise.resolve()
      .then(() => handler(ctx, event))
      .catch((err) => {
        console.error(
          `[provisioning-event] Subscriber error for ${event.type}: ${err instanceof Error ? err.message : err}`,
        );
      });
  }
}

/**
 * Emit a run-scoped event. Fire-and-forget: subscribers run after the
 * current tick and their failures are only logged.
 */
export function emitProvisioningEvent(ctx: TargetContext, event: ProvisioningEvent): void {
  const where = event.step !== undefined ? ` step=${event.step}` : event.tier !== undefined ? ` tier=${event.tier}` : "";
  const suffix = event.error ? ` :: ${event.error.message}` : "";
  log(`${event.type} ${event.status} entity=${event.entityId}${where}${suffix}`, "event");
  notifySubscribers(ctx, event);
}
