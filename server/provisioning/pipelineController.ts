import type { InsertResourceFhirMap } from "@shared/schema";
import { getBundlesDir } from "../config";
import {
  ApplicationError,
  ConfigurationError,
  EntityIdMissingError,
  PrerequisiteNotMetError,
  ProvisioningError,
  describeError,
} from "../errors";
import { getFhirClient } from "../fhir/fhirClient";
import { log, logError, warn } from "../logger";
import { buildExternalId, requireIdentifier } from "../model/identifiers";
import type { ResourceBundle } from "../model/resourceModel";
import { indexEntity, reloadMappingCache, tagEntityResources, type DownstreamResult } from "../services/downstreamServices";
import { emitProvisioningEvent } from "../services/provisioningEventService";
import { storage } from "../storage";
import type { TargetContext } from "../target";
import { loadEntityBundle, loadSharedBundles } from "./bundleLoader";
import { uploadBundle } from "./bundleUploader";
import { IdentifierScratch } from "./identifierScratch";
import { buildEntityMapping, persistEntityMapping } from "./mappingBuilder";
import { createEntityMetadataRecord } from "./metadataRecordService";

export const PIPELINE_STEPS = [
  { step: 1, key: "upload", title: "Upload clinical resources", fatal: true },
  { step: 2, key: "metadata", title: "Create entity metadata record", fatal: true },
  { step: 3, key: "mapping", title: "Persist identifier mapping", fatal: true },
  { step: 4, key: "cache", title: "Reload mapping cache", fatal: false },
  { step: 5, key: "tagging", title: "Tag entity resources", fatal: false },
  { step: 6, key: "indexing", title: "Index entity", fatal: false },
] as const;

export type PipelineStep = (typeof PIPELINE_STEPS)[number];
export type StepKey = PipelineStep["key"];
export type StepStatus = "completed" | "warning" | "failed" | "skipped" | "not_run";

export interface StepOutcome {
  step: number;
  key: StepKey;
  status: StepStatus;
  message?: string;
}

export interface PipelineFailure {
  step?: number;
  missingStep?: string;
  code: string;
  message: string;
  body?: string;
}

export interface PipelineOptions {
  entityId: string;
  practiceId: string;
  startStep?: number;
  bundlesDir?: string;
  entityType?: string;
}

export interface PipelineResult {
  success: boolean;
  entityId: string;
  externalId: string;
  startStep: number;
  steps: StepOutcome[];
  failure?: PipelineFailure;
  entityStoreId?: string;
  mapping?: InsertResourceFhirMap;
  uploadedCount: number;
  verifiedSteps: number[];
}

export interface PipelineRun {
  currentStep: number;
  entityId: string;
  practiceId: string;
  externalId: string;
  entityType: string;
  prerequisitesVerified: Set<number>;
  scratch: IdentifierScratch;
}

interface PreparedBundles {
  shared: ResourceBundle[];
  entity: ResourceBundle;
}

const ENTITY_TYPE_PATTERN = /^[A-Z][A-Za-z]+$/;

export function validateStartStep(value: unknown): number {
  const step = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (typeof step !== "number" || !Number.isInteger(step) || step < 1 || step > PIPELINE_STEPS.length) {
    throw new ConfigurationError(`Invalid start step "${String(value)}": must be an integer from 1 to ${PIPELINE_STEPS.length}`);
  }
  return step;
}

/**
 * Live checks that the steps before `startStep` really happened. Checks
 * are cumulative; the first one that fails throws PrerequisiteNotMetError.
 * Each passing check adds its step to `run.prerequisitesVerified`, and the
 * entity's store id is written into the run scratch. Step 4 (cache reload)
 * leaves nothing behind to check.
 */
export async function verifyPrerequisites(ctx: TargetContext, run: PipelineRun, startStep: number): Promise<void> {
  if (startStep >= 2) {
    const found = await getFhirClient(ctx).search(run.entityType, { identifier: run.entityId });
    const storeId = (found.entry ?? [])
      .filter((e) => e.resource?.resourceType === run.entityType)
      .map((e) => e.resource?.id)
      .find((id): id is string => !!id);
    if (!storeId) {
      throw new PrerequisiteNotMetError({
        requestedStep: startStep,
        missingStep: "1",
        reason: `${run.entityType} not found in clinical-resource store`,
      });
    }
    run.scratch.record(run.entityType, storeId);
    run.prerequisitesVerified.add(1);
    log(`Prerequisite: ${run.entityType}/${storeId} exists in clinical-resource store`, "pipeline");
  }

  if (startStep >= 3) {
    const records = await storage.countPatientRecords(run.externalId);
    if (records !== 1) {
      throw new PrerequisiteNotMetError({
        requestedStep: startStep,
        missingStep: "2",
        reason: `expected 1 metadata record for ${run.externalId}, found ${records}`,
      });
    }
    run.prerequisitesVerified.add(2);
    log(`Prerequisite: metadata record exists for ${run.externalId}`, "pipeline");
  }

  if (startStep >= 5) {
    const mappings = await storage.countIdentifierMappings(run.entityType, run.externalId);
    if (mappings !== 1) {
      throw new PrerequisiteNotMetError({
        requestedStep: startStep,
        missingStep: "3-4",
        reason: `expected 1 ${run.entityType} identifier mapping for ${run.externalId}, found ${mappings}`,
      });
    }
    run.prerequisitesVerified.add(3);
    log(`Prerequisite: identifier mapping exists for ${run.externalId}`, "pipeline");
  }
}

function toFailure(err: unknown, step?: number): PipelineFailure {
  if (err instanceof PrerequisiteNotMetError) {
    return { step, missingStep: err.missingStep, code: err.code, message: err.message };
  }
  if (err instanceof ApplicationError) {
    return { step, code: err.code, message: err.message, body: err.body };
  }
  if (err instanceof ProvisioningError) {
    return { step, code: err.code, message: err.message };
  }
  return { step, code: "UNEXPECTED_ERROR", message: describeError(err) };
}

function requireEntityStoreId(run: PipelineRun): string {
  const storeId = run.scratch.first(run.entityType);
  if (!storeId) throw new EntityIdMissingError(run.entityType);
  return storeId;
}

async function runUploadStep(
  ctx: TargetContext,
  run: PipelineRun,
  bundles: PreparedBundles,
): Promise<{ uploaded: number; warnings: string[] }> {
  const warnings: string[] = [];
  const knownRefs: string[] = [];
  let uploaded = 0;

  for (const bundle of bundles.shared) {
    try {
      const result = await uploadBundle(ctx, bundle, { knownRefs });
      uploaded += result.extracted.length;
    } catch (err) {
      const message = `Shared bundle "${bundle.name}" upload failed (may already exist): ${describeError(err)}`;
      warn(message, "pipeline");
      warnings.push(message);
    }
    for (const item of bundle.items) knownRefs.push(item.record.localRef);
  }

  const result = await uploadBundle(ctx, bundles.entity, { knownRefs, scratch: run.scratch });
  uploaded += result.extracted.length;
  if (result.unassigned.length > 0) {
    warn(`${result.unassigned.length} resource(s) in "${bundles.entity.name}" received no store id`, "pipeline");
  }
  requireEntityStoreId(run);
  return { uploaded, warnings };
}

function downstreamOutcome(result: DownstreamResult, what: string): { status: StepStatus; message: string } {
  if (result.success) return { status: "completed", message: `${what} succeeded` };
  return { status: "warning", message: `${what} failed: ${result.error ?? "unknown error"}` };
}

/**
 * Execute steps `startStep..6` for one entity. Input problems throw
 * ConfigurationError before any network call; every other failure is
 * reported in the returned result.
 */
export async function runPipeline(ctx: TargetContext, opts: PipelineOptions): Promise<PipelineResult> {
  const startStep = validateStartStep(opts.startStep ?? 1);
  const entityId = requireIdentifier("entity id", opts.entityId);
  const practiceId = requireIdentifier("practice id", opts.practiceId);
  const entityType = opts.entityType ?? "Patient";
  if (!ENTITY_TYPE_PATTERN.test(entityType)) {
    throw new ConfigurationError(`Invalid entity type "${entityType}"`);
  }
  const bundlesDir = opts.bundlesDir ?? getBundlesDir();

  let bundles: PreparedBundles | undefined;
  if (startStep === 1) {
    bundles = {
      entity: await loadEntityBundle(bundlesDir, entityId),
      shared: await loadSharedBundles(bundlesDir),
    };
  }

  const run: PipelineRun = {
    currentStep: startStep,
    entityId,
    practiceId,
    externalId: buildExternalId(practiceId, entityId),
    entityType,
    prerequisitesVerified: new Set<number>(),
    scratch: new IdentifierScratch(),
  };

  const result: PipelineResult = {
    success: false,
    entityId,
    externalId: run.externalId,
    startStep,
    steps: PIPELINE_STEPS.filter((s) => s.step < startStep).map((s): StepOutcome => ({
      step: s.step,
      key: s.key,
      status: "skipped",
    })),
    uploadedCount: 0,
    verifiedSteps: [],
  };

  log(`Provisioning ${entityType} ${entityId} (${run.externalId}) from step ${startStep} on ${ctx.serverHost}`, "pipeline");

  if (startStep > 1) {
    try {
      await verifyPrerequisites(ctx, run, startStep);
    } catch (err) {
      result.verifiedSteps = [...run.prerequisitesVerified].sort((a, b) => a - b);
      result.failure = toFailure(err);
      logError(result.failure.message, "pipeline");
      emitProvisioningEvent(ctx, {
        type: "pipeline.prerequisite_failed",
        status: "failed",
        entityId,
        step: startStep,
        error: { code: result.failure.code, message: result.failure.message },
      });
      return finish(ctx, result);
    }
    result.verifiedSteps = [...run.prerequisitesVerified].sort((a, b) => a - b);
  }

  for (const def of PIPELINE_STEPS) {
    if (def.step < startStep) continue;
    if (result.failure) {
      result.steps.push({ step: def.step, key: def.key, status: "not_run" });
      continue;
    }

    run.currentStep = def.step;
    log(`STEP ${def.step}: ${def.title}`, "pipeline");
    emitProvisioningEvent(ctx, { type: "pipeline.step_started", status: "started", entityId, step: def.step });

    try {
      const outcome = await executeStep(ctx, run, def.key, bundles, result);
      result.steps.push({ step: def.step, key: def.key, ...outcome });
      if (outcome.status === "warning") {
        warn(`Step ${def.step} (${def.key}): ${outcome.message}`, "pipeline");
      }
      emitProvisioningEvent(ctx, {
        type: outcome.status === "warning" ? "pipeline.step_warning" : "pipeline.step_completed",
        status: outcome.status,
        entityId,
        step: def.step,
        details: { message: outcome.message },
      });
    } catch (err) {
      const failure = toFailure(err, def.step);
      if (def.fatal) {
        result.failure = failure;
        result.steps.push({ step: def.step, key: def.key, status: "failed", message: failure.message });
        logError(`Step ${def.step} (${def.key}) failed: ${failure.message}`, "pipeline");
        emitProvisioningEvent(ctx, {
          type: "pipeline.step_failed",
          status: "failed",
          entityId,
          step: def.step,
          error: { code: failure.code, message: failure.message },
        });
      } else {
        result.steps.push({ step: def.step, key: def.key, status: "warning", message: failure.message });
        warn(`Step ${def.step} (${def.key}): ${failure.message}`, "pipeline");
        emitProvisioningEvent(ctx, {
          type: "pipeline.step_warning",
          status: "warning",
          entityId,
          step: def.step,
          error: { code: failure.code, message: failure.message },
        });
      }
    }
  }

  return finish(ctx, result);
}

async function executeStep(
  ctx: TargetContext,
  run: PipelineRun,
  key: StepKey,
  bundles: PreparedBundles | undefined,
  result: PipelineResult,
): Promise<{ status: StepStatus; message: string }> {
  switch (key) {
    case "upload": {
      if (!bundles) throw new ConfigurationError("No bundles loaded for the upload step");
      const { uploaded, warnings } = await runUploadStep(ctx, run, bundles);
      result.uploadedCount = uploaded;
      result.entityStoreId = requireEntityStoreId(run);
      const message = `Uploaded ${uploaded} resource(s); ${run.entityType}/${result.entityStoreId}`;
      return warnings.length > 0
        ? { status: "warning", message: `${message}; ${warnings.join("; ")}` }
        : { status: "completed", message };
    }
    case "metadata": {
      const entityStoreId = requireEntityStoreId(run);
      result.entityStoreId = entityStoreId;
      const record = await createEntityMetadataRecord(ctx, {
        entityId: run.entityId,
        practiceId: run.practiceId,
        externalId: run.externalId,
        entityStoreId,
        entityType: run.entityType,
      });
      return { status: "completed", message: `Metadata record created under practice ${record.practiceIdFk}` };
    }
    case "mapping": {
      const mapping = buildEntityMapping(run.scratch, run.externalId, run.entityType);
      await persistEntityMapping(mapping);
      result.mapping = mapping;
      result.entityStoreId = mapping.storeId;
      return { status: "completed", message: `${mapping.resource}: ${mapping.externalId} -> ${mapping.storeId}` };
    }
    case "cache":
      return downstreamOutcome(await reloadMappingCache(ctx), "Mapping cache reload");
    case "tagging":
      return downstreamOutcome(await tagEntityResources(ctx, run.practiceId, run.entityId), "Tagging");
    case "indexing":
      return downstreamOutcome(await indexEntity(ctx, run.externalId), "Indexing");
  }
}

function finish(ctx: TargetContext, result: PipelineResult): PipelineResult {
  result.success = !result.failure;
  if (!result.entityStoreId && result.mapping) result.entityStoreId = result.mapping.storeId;
  emitProvisioningEvent(ctx, {
    type: "pipeline.completed",
    status: result.success ? "succeeded" : "failed",
    entityId: result.entityId,
    details: { startStep: result.startStep, uploadedCount: result.uploadedCount },
  });
  log(
    result.success
      ? `Provisioning of ${result.externalId} finished`
      : `Provisioning of ${result.externalId} failed: ${result.failure?.message ?? "unknown error"}`,
    "pipeline",
  );
  return result;
}
