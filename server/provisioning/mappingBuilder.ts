import { insertResourceFhirMapSchema, type InsertResourceFhirMap, type ResourceFhirMap } from "@shared/schema";
import { ConfigurationError, DuplicateMappingError, EntityIdMissingError } from "../errors";
import { storage } from "../storage";
import type { IdentifierScratch } from "./identifierScratch";

const UNIQUE_VIOLATION = "23505";

function isUniqueViolation(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === UNIQUE_VIOLATION;
}

/**
 * One mapping row for the entity resource. Other resource types in the
 * scratch are not mapped.
 */
export function buildEntityMapping(
  scratch: IdentifierScratch,
  externalId: string,
  entityType = "Patient",
): InsertResourceFhirMap {
  const storeId = scratch.first(entityType);
  if (!storeId) {
    throw new EntityIdMissingError(entityType);
  }
  return { resource: entityType, externalId, storeId };
}

export async function persistEntityMapping(mapping: InsertResourceFhirMap): Promise<ResourceFhirMap> {
  const parsed = insertResourceFhirMapSchema.safeParse(mapping);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigurationError(`Invalid identifier mapping: ${issues}`);
  }
  const data = parsed.data;

  const existing = await storage.countIdentifierMappings(data.resource, data.externalId);
  if (existing > 0) {
    throw new DuplicateMappingError(data.resource, data.externalId);
  }

  try {
    return await storage.createIdentifierMapping(data);
  } catch (err) {
    if (isUniqueViolation(err)) {
      throw new DuplicateMappingError(data.resource, data.externalId);
    }
    throw err;
  }
}
