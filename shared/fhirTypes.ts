/**
 * FHIR R4 shapes used at the clinical-resource store boundary.
 *
 * Only the parts the provisioner reads are typed; everything else passes
 * through untouched so that uploaded payloads keep their full content.
 */
import { z } from "zod";

export const fhirResourceSchema = z.object({
  resourceType: z.string().min(1),
  id: z.string().optional(),
}).passthrough();

export type FhirResource = z.infer<typeof fhirResourceSchema>;

export const bundleEntryResponseSchema = z.object({
  status: z.string(),
  location: z.string().optional(),
  etag: z.string().optional(),
  lastModified: z.string().optional(),
}).passthrough();

export const bundleEntrySchema = z.object({
  fullUrl: z.string().optional(),
  resource: fhirResourceSchema.optional(),
  request: z.object({
    method: z.string(),
    url: z.string(),
  }).passthrough().optional(),
  response: bundleEntryResponseSchema.optional(),
}).passthrough();

export type BundleEntry = z.infer<typeof bundleEntrySchema>;

export const bundleLinkSchema = z.object({
  relation: z.string(),
  url: z.string(),
});

export const fhirBundleSchema = z.object({
  resourceType: z.literal("Bundle"),
  id: z.string().optional(),
  type: z.string().optional(),
  total: z.number().int().nonnegative().optional(),
  link: z.array(bundleLinkSchema).optional(),
  entry: z.array(bundleEntrySchema).optional(),
}).passthrough();

export type FhirBundle = z.infer<typeof fhirBundleSchema>;

export interface ResourceRef {
  type: string;
  id: string;
}

export function formatRef(ref: ResourceRef): string {
  return `${ref.type}/${ref.id}`;
}

const humanNameSchema = z.object({
  family: z.string().optional(),
  given: z.array(z.string()).optional(),
}).passthrough();

export const patientDemographicsSchema = z.object({
  resourceType: z.string(),
  id: z.string().optional(),
  name: z.array(humanNameSchema).optional(),
  gender: z.string().optional(),
  birthDate: z.string().optional(),
}).passthrough();

export function parseRef(value: string): ResourceRef | undefined {
  const match = /^([A-Z][A-Za-z]+)\/([A-Za-z0-9.-]{1,64})$/.exec(value.trim());
  if (!match) return undefined;
  return { type: match[1], id: match[2] };
}
