import { formatRef, type ResourceRef } from "@shared/fhirTypes";
import {
  ApplicationError,
  ConflictError,
  ConnectivityError,
  NotFoundError,
  ProvisioningError,
} from "../errors";
import { getFhirClient } from "../fhir/fhirClient";
import { log, warn } from "../logger";
import type { TargetContext } from "../target";

export type RemovalOutcome = "deleted" | "already_absent" | "blocked" | "failed" | "not_finalized";

export interface RemovalResult {
  ref: ResourceRef;
  outcome: RemovalOutcome;
  error?: { code: string; message: string; status?: number; body?: string };
}

function errorDetail(err: ProvisioningError): NonNullable<RemovalResult["error"]> {
  if (err instanceof ApplicationError) {
    return { code: err.code, message: err.message, status: err.status, body: err.body };
  }
  if (err instanceof ConflictError) {
    return { code: err.code, message: err.message, status: 409, body: err.body };
  }
  if (err instanceof ConnectivityError) {
    return { code: err.code, message: err.message, status: 0 };
  }
  return { code: err.code, message: err.message };
}

/**
 * Soft delete followed by expunge. Never throws for store-side outcomes;
 * each one is classified into a RemovalOutcome.
 */
export async function deleteResourcePermanently(ctx: TargetContext, ref: ResourceRef): Promise<RemovalResult> {
  const client = getFhirClient(ctx);
  const label = formatRef(ref);

  try {
    await client.deleteResource(ref.type, ref.id);
  } catch (err) {
    if (err instanceof NotFoundError) {
      log(`${label} already absent`, "deleter");
      return { ref, outcome: "already_absent" };
    }
    if (err instanceof ConflictError) {
      warn(`${label} is still referenced; left in place`, "deleter");
      return { ref, outcome: "blocked", error: errorDetail(err) };
    }
    if (err instanceof ProvisioningError) {
      warn(`${label} delete failed: ${err.message}`, "deleter");
      return { ref, outcome: "failed", error: errorDetail(err) };
    }
    throw err;
  }

  try {
    await client.expunge(ref.type, ref.id);
  } catch (err) {
    if (err instanceof NotFoundError) {
      log(`${label} deleted (nothing left to expunge)`, "deleter");
      return { ref, outcome: "deleted" };
    }
    if (err instanceof ProvisioningError) {
      warn(`${label} deleted but expunge failed: ${err.message}`, "deleter");
      return { ref, outcome: "not_finalized", error: errorDetail(err) };
    }
    throw err;
  }

  log(`${label} deleted and expunged`, "deleter");
  return { ref, outcome: "deleted" };
}
