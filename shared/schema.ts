import { pgTable, text, serial, integer, timestamp, unique } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// Cross-store identifier mapping read by the app server's mapping cache.
export const resourceFhirMap = pgTable("resource_fhir_map", {
  id: serial("id").primaryKey(),
  resource: text("resource").notNull(),
  externalId: text("external_id").notNull(),
  storeId: text("store_id").notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
}, (table) => [
  unique("uq_resource_fhir_map_resource_external").on(table.resource, table.externalId),
]);

// Entity metadata records. Written by the metadata service, only counted here.
export const patients = pgTable("patient", {
  patientId: serial("patient_id").primaryKey(),
  practiceIdFk: integer("practice_id_fk").notNull(),
  patientIdExt: text("patient_id_ext").notNull(),
  patientIdEhrInt: text("patient_id_ehr_int").notNull().unique(),
  fhirPatientId: text("fhir_patient_id"),
  firstName: text("first_name"),
  lastName: text("last_name"),
  sex: text("sex"),
  dateOfBirth: text("date_of_birth"),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

// Insert schemas
export const insertResourceFhirMapSchema = createInsertSchema(resourceFhirMap).omit({
  id: true,
  createdAt: true,
});

// Types
export type InsertResourceFhirMap = z.infer<typeof insertResourceFhirMapSchema>;
export type ResourceFhirMap = typeof resourceFhirMap.$inferSelect;
