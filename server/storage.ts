import { and, count, eq, inArray } from "drizzle-orm";
import { getDb } from "./db";
import {
  patients,
  resourceFhirMap,
  type InsertResourceFhirMap,
  type ResourceFhirMap,
} from "@shared/schema";

export interface IStorage {
  countPatientRecords(externalId: string): Promise<number>;

  countIdentifierMappings(resourceType: string, externalId: string): Promise<number>;
  createIdentifierMapping(data: InsertResourceFhirMap): Promise<ResourceFhirMap>;
  deleteIdentifierMapping(resourceType: string, externalId: string): Promise<number>;
  deleteIdentifierMappingsByStoreIds(resourceType: string, storeIds: string[]): Promise<number>;
}

export class DatabaseStorage implements IStorage {
  async countPatientRecords(externalId: string): Promise<number> {
    const [row] = await getDb()
      .select({ value: count() })
      .from(patients)
      .where(eq(patients.patientIdEhrInt, externalId));
    return row?.value ?? 0;
  }

  async countIdentifierMappings(resourceType: string, externalId: string): Promise<number> {
    const [row] = await getDb()
      .select({ value: count() })
      .from(resourceFhirMap)
      .where(and(eq(resourceFhirMap.resource, resourceType), eq(resourceFhirMap.externalId, externalId)));
    return row?.value ?? 0;
  }

  async createIdentifierMapping(data: InsertResourceFhirMap): Promise<ResourceFhirMap> {
    const [mapping] = await getDb().insert(resourceFhirMap).values(data).returning();
    return mapping;
  }

  async deleteIdentifierMapping(resourceType: string, externalId: string): Promise<number> {
    const deleted = await getDb()
      .delete(resourceFhirMap)
      .where(and(eq(resourceFhirMap.resource, resourceType), eq(resourceFhirMap.externalId, externalId)))
      .returning({ id: resourceFhirMap.id });
    return deleted.length;
  }

  async deleteIdentifierMappingsByStoreIds(resourceType: string, storeIds: string[]): Promise<number> {
    if (storeIds.length === 0) return 0;
    const deleted = await getDb()
      .delete(resourceFhirMap)
      .where(and(eq(resourceFhirMap.resource, resourceType), inArray(resourceFhirMap.storeId, storeIds)))
      .returning({ id: resourceFhirMap.id });
    return deleted.length;
  }
}

export const storage = new DatabaseStorage();
