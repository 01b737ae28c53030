/**
 * Attach an extra clinical document (an XML care summary) to an entity
 * that was already provisioned, then re-run tagging and indexing so the
 * new content is picked up.
 */
import { ApplicationError, ConfigurationError, NotFoundError, ProvisioningError, describeError } from "../errors";
import { getFhirClient } from "../fhir/fhirClient";
import { isSuccessStatus, sendRequest } from "../http/transport";
import { log, logError, warn } from "../logger";
import { buildExternalId, requireIdentifier } from "../model/identifiers";
import { indexEntity, tagEntityResources, type DownstreamResult } from "../services/downstreamServices";
import { emitProvisioningEvent } from "../services/provisioningEventService";
import type { TargetContext } from "../target";
import type { PipelineFailure, StepStatus } from "./pipelineController";

const ADDON_UPLOAD_FIELD = "xmlfile";

export type AddonStepKey = "upload" | "tagging" | "indexing";

export interface AddonStepOutcome {
  key: AddonStepKey;
  status: StepStatus;
  message?: string;
}

export interface AddonDocumentInput {
  entityId: string;
  practiceId: string;
  document: string;
  fileName?: string;
  entityType?: string;
}

export interface AddonDocumentResult {
  success: boolean;
  entityId: string;
  externalId: string;
  entityStoreId?: string;
  steps: AddonStepOutcome[];
  failure?: PipelineFailure;
}

async function encodeUpload(document: string, fileName: string): Promise<{ body: Buffer; contentType: string }> {
  const form = new FormData();
  form.append(ADDON_UPLOAD_FIELD, new Blob([document], { type: "application/xml" }), fileName);
  const encoded = new Response(form);
  const contentType = encoded.headers.get("content-type");
  if (!contentType) {
    throw new ConfigurationError("Multipart encoding produced no content type");
  }
  return { body: Buffer.from(await encoded.arrayBuffer()), contentType };
}

async function findEntityStoreId(ctx: TargetContext, entityType: string, entityId: string): Promise<string> {
  const found = await getFhirClient(ctx).search(entityType, { identifier: entityId });
  const storeId = (found.entry ?? [])
    .filter((e) => e.resource?.resourceType === entityType)
    .map((e) => e.resource?.id)
    .find((id): id is string => !!id);
  if (!storeId) {
    throw new NotFoundError(`${entityType} ${entityId} not found in clinical-resource store; provision it first`);
  }
  return storeId;
}

async function uploadDocument(ctx: TargetContext, externalId: string, document: string, fileName: string): Promise<void> {
  const url = `${ctx.metadataServiceUrl}${ctx.servicePaths.documentUpload}/${encodeURIComponent(externalId)}`;
  const { body, contentType } = await encodeUpload(document, fileName);
  const res = await sendRequest({
    method: "POST",
    url,
    headers: { Accept: "application/json", "Content-Type": contentType },
    body,
    connectTimeoutMs: ctx.timeouts.connectMs,
    timeoutMs: ctx.timeouts.requestMs,
  });
  if (!isSuccessStatus(res.status)) {
    throw new ApplicationError({ url, method: "POST", status: res.status, body: res.body });
  }
}

function followUp(key: AddonStepKey, result: DownstreamResult, what: string): AddonStepOutcome {
  if (result.success) return { key, status: "completed", message: `${what} succeeded` };
  const message = `${what} failed: ${result.error ?? "unknown error"}`;
  warn(message, "addon");
  return { key, status: "warning", message };
}

function toFailure(err: unknown): PipelineFailure {
  if (err instanceof ApplicationError) {
    return { code: err.code, message: err.message, body: err.body };
  }
  if (err instanceof ProvisioningError) {
    return { code: err.code, message: err.message };
  }
  return { code: "UNEXPECTED_ERROR", message: describeError(err) };
}

/**
 * Upload is fatal; tagging and indexing afterwards only warn. Input
 * problems throw ConfigurationError before any network call.
 */
export async function uploadAddonDocument(ctx: TargetContext, input: AddonDocumentInput): Promise<AddonDocumentResult> {
  const entityId = requireIdentifier("entity id", input.entityId);
  const practiceId = requireIdentifier("practice id", input.practiceId);
  const entityType = input.entityType ?? "Patient";
  const document = input.document.trim();
  if (!document) {
    throw new ConfigurationError("Addon document is empty");
  }
  if (!document.startsWith("<")) {
    throw new ConfigurationError("Addon document is not XML");
  }
  const fileName = input.fileName ?? `${entityId}.xml`;
  const externalId = buildExternalId(practiceId, entityId);

  const result: AddonDocumentResult = { success: false, entityId, externalId, steps: [] };
  log(`Attaching ${fileName} to ${entityType} ${entityId} (${externalId}) on ${ctx.serverHost}`, "addon");

  try {
    result.entityStoreId = await findEntityStoreId(ctx, entityType, entityId);
    await uploadDocument(ctx, externalId, document, fileName);
    result.steps.push({ key: "upload", status: "completed", message: `Uploaded ${fileName}` });
  } catch (err) {
    result.failure = toFailure(err);
    logError(`Addon upload for ${externalId} failed: ${result.failure.message}`, "addon");
    result.steps.push(
      { key: "upload", status: "failed", message: result.failure.message },
      { key: "tagging", status: "not_run" },
      { key: "indexing", status: "not_run" },
    );
    emitProvisioningEvent(ctx, {
      type: "addon.completed",
      status: "failed",
      entityId,
      error: { code: result.failure.code, message: result.failure.message },
    });
    return result;
  }

  result.steps.push(followUp("tagging", await tagEntityResources(ctx, practiceId, entityId), "Tagging"));
  result.steps.push(followUp("indexing", await indexEntity(ctx, externalId), "Indexing"));
  result.success = true;

  log(`Addon document attached to ${externalId}`, "addon");
  emitProvisioningEvent(ctx, {
    type: "addon.completed",
    status: "succeeded",
    entityId,
    details: { fileName, warnings: result.steps.filter((s) => s.status === "warning").length },
  });
  return result;
}
