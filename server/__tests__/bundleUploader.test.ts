import { describe, it, expect, vi, beforeEach } from "vitest";
import type { FhirBundle } from "@shared/fhirTypes";
import type { TargetContext } from "../target";

const mockTransaction = vi.fn();

vi.mock("../fhir/fhirClient", () => ({
  getFhirClient: () => ({
    transaction: (...args: unknown[]) => mockTransaction(...args),
  }),
}));

import { ApplicationError, BundleOrderError } from "../errors";
import { buildResourceBundle } from "../model/resourceModel";
import { extractEntryId, uploadBundle } from "../provisioning/bundleUploader";
import { IdentifierScratch } from "../provisioning/identifierScratch";
import { buildEntityMapping } from "../provisioning/mappingBuilder";

const ctx: TargetContext = {
  serverHost: "records.test",
  fhirBaseUrl: "http://records.test:8080/fhir",
  metadataServiceUrl: "http://records.test:9090",
  appServerUrl: "http://records.test",
  indexServiceUrl: "http://records.test:5000",
  servicePaths: {
    tagging: "/athenahealth/tagAPatient",
    indexing: "/trais/qa/indexPatient",
    documentUpload: "/athenahealth/loadCCDAFromXML",
  },
  timeouts: { connectMs: 100, requestMs: 1000, expansionMs: 2000 },
};

const sixResourceBundle: FhirBundle = {
  resourceType: "Bundle",
  type: "collection",
  entry: [
    { fullUrl: "urn:uuid:p", resource: { resourceType: "Patient", identifier: [{ value: "t7" }] } },
    { fullUrl: "urn:uuid:e", resource: { resourceType: "Encounter", subject: { reference: "urn:uuid:p" } } },
    { fullUrl: "urn:uuid:o1", resource: { resourceType: "Observation", subject: { reference: "urn:uuid:p" } } },
    { fullUrl: "urn:uuid:o2", resource: { resourceType: "Observation", subject: { reference: "urn:uuid:p" } } },
    { fullUrl: "urn:uuid:c", resource: { resourceType: "Condition", subject: { reference: "urn:uuid:p" } } },
    { fullUrl: "urn:uuid:pr", resource: { resourceType: "Procedure", subject: { reference: "urn:uuid:p" } } },
  ],
};

function transactionResponse(locations: string[]): FhirBundle {
  return {
    resourceType: "Bundle",
    id: "resp-1",
    type: "transaction-response",
    entry: locations.map((location) => ({ response: { status: "201 Created", location } })),
  };
}

describe("extractEntryId", () => {
  it("prefers the location header", () => {
    expect(
      extractEntryId({ response: { status: "201 Created", location: "Patient/101/_history/1" } }),
    ).toEqual({ source: "location", type: "Patient", id: "101", version: "1" });
  });

  it("falls back to the echoed resource id", () => {
    expect(
      extractEntryId({
        response: { status: "200 OK", location: "" },
        resource: { resourceType: "Encounter", id: "202" },
      }),
    ).toEqual({ source: "resource", type: "Encounter", id: "202" });
  });

  it("falls back to the response bundle id", () => {
    expect(
      extractEntryId({ response: { status: "200 OK" } }, { bundleId: "bundle-9", typeHint: "Condition" }),
    ).toEqual({ source: "bundle", type: "Condition", id: "bundle-9" });
  });

  it("reports missing when no source carries an id", () => {
    expect(
      extractEntryId(
        { response: { status: "200 OK" }, resource: { resourceType: "Observation", id: "" } },
        { bundleId: "  " },
      ),
    ).toEqual({ source: "missing", type: "Observation" });
  });
});

describe("uploadBundle", () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it("extracts six ids from a six-resource bundle and maps only the entity", async () => {
    mockTransaction.mockResolvedValue(
      transactionResponse([
        "Patient/101/_history/1",
        "Encounter/102/_history/1",
        "Observation/103/_history/1",
        "Observation/104/_history/1",
        "Condition/105/_history/1",
        "Procedure/106/_history/1",
      ]),
    );
    const scratch = new IdentifierScratch();
    const bundle = buildResourceBundle("t7_bundle", "entity", sixResourceBundle);

    const result = await uploadBundle(ctx, bundle, { scratch });

    expect(result.extracted).toHaveLength(6);
    expect(scratch.first("Observation")).toBe("103");
    expect(result.countsByType).toEqual({
      Patient: 1,
      Encounter: 1,
      Observation: 2,
      Condition: 1,
      Procedure: 1,
    });
    expect(result.unassigned).toEqual([]);
    expect(result.records.map((r) => r.remoteId)).toEqual(["101", "102", "103", "104", "105", "106"]);

    const mapping = buildEntityMapping(scratch, "a-16349.E-t7");
    expect(mapping).toEqual({ resource: "Patient", externalId: "a-16349.E-t7", storeId: "101" });

    const submitted = mockTransaction.mock.calls[0][0];
    expect(submitted).toMatchObject({ resourceType: "Bundle", type: "transaction" });
  });

  it("uploads an organization to observation chain with six distinct ids and one entity mapping", async () => {
    const shared = buildResourceBundle("Organization", "shared", {
      resourceType: "Bundle",
      type: "transaction",
      entry: [
        { resource: { resourceType: "Organization", id: "org-1", name: "Test Clinic" } },
        { resource: { resourceType: "Practitioner", id: "prac-1" } },
        {
          resource: {
            resourceType: "PractitionerRole",
            id: "role-1",
            practitioner: { reference: "Practitioner/prac-1" },
            organization: { reference: "Organization/org-1" },
          },
        },
      ],
    });
    const entity = buildResourceBundle("t7_bundle", "entity", {
      resourceType: "Bundle",
      type: "transaction",
      entry: [
        {
          fullUrl: "urn:uuid:p",
          resource: {
            resourceType: "Patient",
            identifier: [{ value: "t7" }],
            managingOrganization: { reference: "Organization/org-1" },
            generalPractitioner: [{ reference: "Practitioner/prac-1" }],
          },
        },
        {
          fullUrl: "urn:uuid:e",
          resource: {
            resourceType: "Encounter",
            subject: { reference: "urn:uuid:p" },
            participant: [{ individual: { reference: "PractitionerRole/role-1" } }],
            serviceProvider: { reference: "Organization/org-1" },
          },
        },
        {
          fullUrl: "urn:uuid:o",
          resource: {
            resourceType: "Observation",
            subject: { reference: "urn:uuid:p" },
            encounter: { reference: "urn:uuid:e" },
            performer: [{ reference: "PractitionerRole/role-1" }],
          },
        },
      ],
    });
    mockTransaction
      .mockResolvedValueOnce(
        transactionResponse([
          "Organization/org-1/_history/1",
          "Practitioner/prac-1/_history/1",
          "PractitionerRole/role-1/_history/1",
        ]),
      )
      .mockResolvedValueOnce(
        transactionResponse(["Patient/201/_history/1", "Encounter/202/_history/1", "Observation/203/_history/1"]),
      );
    const scratch = new IdentifierScratch();

    const sharedResult = await uploadBundle(ctx, shared);
    const entityResult = await uploadBundle(ctx, entity, {
      knownRefs: shared.items.map((item) => item.record.localRef),
      scratch,
    });

    const ids = [...sharedResult.extracted, ...entityResult.extracted].map((found) => `${found.type}/${found.id}`);
    expect(ids).toEqual([
      "Organization/org-1",
      "Practitioner/prac-1",
      "PractitionerRole/role-1",
      "Patient/201",
      "Encounter/202",
      "Observation/203",
    ]);
    expect(new Set(ids).size).toBe(6);
    expect(sharedResult.unassigned).toEqual([]);
    expect(entityResult.unassigned).toEqual([]);
    expect(buildEntityMapping(scratch, "a-16349.E-t7")).toEqual({
      resource: "Patient",
      externalId: "a-16349.E-t7",
      storeId: "201",
    });
    expect(scratch.first("Organization")).toBeUndefined();
    expect(mockTransaction).toHaveBeenCalledTimes(2);
  });

  it("logs a zero count for a type that yields no ids", async () => {
    mockTransaction.mockResolvedValue({
      resourceType: "Bundle",
      type: "transaction-response",
      entry: [
        { response: { status: "201 Created", location: "Patient/101/_history/1" } },
        { response: { status: "200 OK" } },
      ],
    });
    const bundle = buildResourceBundle("partial", "entity", {
      resourceType: "Bundle",
      entry: [
        { fullUrl: "urn:uuid:p", resource: { resourceType: "Patient" } },
        { fullUrl: "urn:uuid:m", resource: { resourceType: "Medication" } },
      ],
    });

    const result = await uploadBundle(ctx, bundle);

    expect(result.countsByType).toEqual({ Patient: 1, Medication: 0 });
    expect(result.unassigned.map((r) => r.localRef)).toEqual(["urn:uuid:m"]);
  });

  it("rejects an out-of-order bundle before any network call", async () => {
    const bundle = buildResourceBundle("fwd", "entity", {
      resourceType: "Bundle",
      entry: [
        { resource: { resourceType: "Encounter", id: "e1", subject: { reference: "Patient/p1" } } },
        { resource: { resourceType: "Patient", id: "p1" } },
      ],
    });

    await expect(uploadBundle(ctx, bundle)).rejects.toBeInstanceOf(BundleOrderError);
    expect(mockTransaction).not.toHaveBeenCalled();
  });

  it("propagates application errors with the store body", async () => {
    mockTransaction.mockRejectedValue(
      new ApplicationError({ url: ctx.fhirBaseUrl, method: "POST", status: 400, body: "{\"issue\":[]}" }),
    );
    const bundle = buildResourceBundle("t7_bundle", "entity", sixResourceBundle);

    await expect(uploadBundle(ctx, bundle)).rejects.toMatchObject({ status: 400, body: "{\"issue\":[]}" });
  });
});
