import { z } from "zod";
import { patientDemographicsSchema } from "@shared/fhirTypes";
import { ApplicationError, NotFoundError, PracticeNotFoundError } from "../errors";
import { getFhirClient } from "../fhir/fhirClient";
import { isSuccessStatus, sendRequest, type HttpMethod } from "../http/transport";
import { log } from "../logger";
import type { TargetContext } from "../target";

const practiceSchema = z.object({
  practiceId: z.coerce.number().int(),
  practiceIdEhrInt: z.union([z.string(), z.number()]).transform(String),
  name: z.string().nullish(),
}).passthrough();

const practiceListSchema = z.array(z.unknown());

const createdRecordSchema = z.object({
  patientId: z.union([z.string(), z.number()]).optional(),
}).passthrough();

export interface MetadataRecordInput {
  entityId: string;
  practiceId: string;
  externalId: string;
  entityStoreId: string;
  entityType?: string;
}

export interface MetadataRecordResult {
  practiceIdFk: number;
  practiceName?: string;
  createdRecordId?: string;
  firstName: string | null;
  lastName: string | null;
  sex: string | null;
  dateOfBirth: string | null;
}

async function callJson(ctx: TargetContext, method: HttpMethod, url: string, body?: unknown): Promise<unknown> {
  const res = await sendRequest({
    method,
    url,
    headers: body === undefined
      ? { Accept: "application/json" }
      : { Accept: "application/json", "Content-Type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body),
    connectTimeoutMs: ctx.timeouts.connectMs,
    timeoutMs: ctx.timeouts.requestMs,
  });
  if (!isSuccessStatus(res.status)) {
    throw new ApplicationError({ url, method, status: res.status, body: res.body });
  }
  if (!res.body.trim()) return undefined;
  try {
    return JSON.parse(res.body);
  } catch {
    throw new ApplicationError({ url, method, status: res.status, body: res.body });
  }
}

export async function findPractice(ctx: TargetContext, practiceId: string): Promise<z.infer<typeof practiceSchema>> {
  const url = `${ctx.metadataServiceUrl}/practices/getAllPractices`;
  const list = practiceListSchema.safeParse(await callJson(ctx, "GET", url));
  if (!list.success) {
    throw new ApplicationError({ url, method: "GET", status: 200, body: "practice list is not an array" });
  }
  for (const candidate of list.data) {
    const practice = practiceSchema.safeParse(candidate);
    if (practice.success && practice.data.practiceIdEhrInt === practiceId) {
      return practice.data;
    }
  }
  throw new PracticeNotFoundError(practiceId);
}

/**
 * Create the entity's row in the metadata service, using the demographics
 * of the resource already uploaded to the clinical-resource store.
 */
export async function createEntityMetadataRecord(
  ctx: TargetContext,
  input: MetadataRecordInput,
): Promise<MetadataRecordResult> {
  const entityType = input.entityType ?? "Patient";
  const practice = await findPractice(ctx, input.practiceId);
  log(`Matched practice ${practice.practiceId}${practice.name ? ` (${practice.name})` : ""}`, "metadata");

  const resource = await getFhirClient(ctx).read(entityType, input.entityStoreId);
  if (!resource) {
    throw new NotFoundError(`${entityType}/${input.entityStoreId} not found in clinical-resource store`);
  }
  const parsed = patientDemographicsSchema.safeParse(resource);
  if (!parsed.success) {
    throw new ApplicationError({
      url: `${ctx.fhirBaseUrl}/${entityType}/${input.entityStoreId}`,
      method: "GET",
      status: 200,
      body: JSON.stringify(resource),
    });
  }
  const demographics = parsed.data;
  const name = demographics.name?.[0];

  const record = {
    practiceIdFK: practice.practiceId,
    patientIdExt: `E-${input.entityId}`,
    patientIdEhrInt: input.externalId,
    fhir_patient_id: input.entityStoreId,
    firstName: name?.given?.[0] ?? null,
    lastName: name?.family ?? null,
    sex: demographics.gender ?? null,
    dateOfBirth: demographics.birthDate ?? null,
  };

  const created = createdRecordSchema.safeParse(
    await callJson(ctx, "POST", `${ctx.metadataServiceUrl}/patients/createPatient`, record),
  );
  const createdRecordId = created.success && created.data.patientId !== undefined
    ? String(created.data.patientId)
    : undefined;
  log(`Created metadata record${createdRecordId ? ` ${createdRecordId}` : ""} for ${input.externalId}`, "metadata");

  return {
    practiceIdFk: practice.practiceId,
    practiceName: practice.name ?? undefined,
    createdRecordId,
    firstName: record.firstName,
    lastName: record.lastName,
    sex: record.sex,
    dateOfBirth: record.dateOfBirth,
  };
}
