import { describe, it, expect, vi, beforeEach } from "vitest";
import type { TargetContext } from "../target";

const mockSendRequest = vi.fn();

vi.mock("../http/transport", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../http/transport")>();
  return {
    ...actual,
    sendRequest: (...args: unknown[]) => mockSendRequest(...args),
  };
});

import { ApplicationError, ConflictError, NotFoundError } from "../errors";
import { getFhirClient } from "../fhir/fhirClient";

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

function page(ids: string[], next?: string) {
  return {
    status: 200,
    body: JSON.stringify({
      resourceType: "Bundle",
      type: "searchset",
      link: next ? [{ relation: "self", url: "ignored" }, { relation: "next", url: next }] : [],
      entry: ids.map((id) => ({ resource: { resourceType: "Observation", id } })),
    }),
  };
}

describe("getFhirClient", () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it("posts transactions as FHIR JSON", async () => {
    mockSendRequest.mockResolvedValue({
      status: 200,
      body: JSON.stringify({ resourceType: "Bundle", type: "transaction-response", entry: [] }),
    });

    const response = await getFhirClient(ctx).transaction({ resourceType: "Bundle", type: "transaction", entry: [] });

    expect(response.type).toBe("transaction-response");
    expect(mockSendRequest).toHaveBeenCalledWith({
      method: "POST",
      url: "http://records.test:8080/fhir",
      headers: { Accept: "application/fhir+json", "Content-Type": "application/fhir+json" },
      body: JSON.stringify({ resourceType: "Bundle", type: "transaction", entry: [] }),
      connectTimeoutMs: 100,
      timeoutMs: 1000,
    });
  });

  it("surfaces a rejected transaction with the store body", async () => {
    mockSendRequest.mockResolvedValue({ status: 422, body: "{\"resourceType\":\"OperationOutcome\"}" });

    const err = await getFhirClient(ctx)
      .transaction({ resourceType: "Bundle", type: "transaction" })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ApplicationError);
    expect(err).toMatchObject({ status: 422, body: "{\"resourceType\":\"OperationOutcome\"}" });
  });

  it("follows next links across pages", async () => {
    mockSendRequest
      .mockResolvedValueOnce(page(["o1", "o2"], "http://records.test:8080/fhir?_getpages=abc&_offset=2"))
      .mockResolvedValueOnce(page(["o3"]));

    const found = await getFhirClient(ctx).searchAll("Observation", { patient: "Patient/p1" });

    expect(found.map((r) => r.id)).toEqual(["o1", "o2", "o3"]);
    expect(mockSendRequest.mock.calls[0][0].url).toBe("http://records.test:8080/fhir/Observation?patient=Patient%2Fp1");
    expect(mockSendRequest.mock.calls[1][0].url).toBe("http://records.test:8080/fhir?_getpages=abc&_offset=2");
  });

  it("reads every page of a long expansion", async () => {
    let served = 0;
    mockSendRequest.mockImplementation(async () => {
      served++;
      const ids = Array.from({ length: 50 }, (_, i) => `o${served}-${i}`);
      const next = served < 60 ? `http://records.test:8080/fhir?_getpages=abc&_offset=${served * 50}` : undefined;
      return page(ids, next);
    });

    const found = await getFhirClient(ctx).everything("Patient", "p1");

    expect(found).toHaveLength(3000);
    expect(found[2999].id).toBe("o60-49");
    expect(mockSendRequest).toHaveBeenCalledTimes(60);
  });

  it("rejects a next link that loops back to a page already read", async () => {
    mockSendRequest.mockImplementation(async () => page(["o1"], "http://records.test:8080/fhir?_getpages=loop"));

    const err = await getFhirClient(ctx).searchAll("Observation", {}).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ApplicationError);
    expect(err).toMatchObject({ url: "http://records.test:8080/fhir?_getpages=loop" });
    expect(mockSendRequest).toHaveBeenCalledTimes(2);
  });

  it("expands with the longer timeout", async () => {
    mockSendRequest.mockResolvedValue(page(["o1"]));

    await getFhirClient(ctx).everything("Patient", "p1");

    expect(mockSendRequest).toHaveBeenCalledWith(expect.objectContaining({
      method: "GET",
      url: "http://records.test:8080/fhir/Patient/p1/$everything",
      timeoutMs: 2000,
    }));
  });

  it("returns undefined when a read finds nothing", async () => {
    mockSendRequest.mockResolvedValue({ status: 410, body: "" });

    await expect(getFhirClient(ctx).read("Patient", "gone")).resolves.toBeUndefined();
  });

  it("rejects a search response that is not a bundle", async () => {
    mockSendRequest.mockResolvedValue({ status: 200, body: "<html>proxy error</html>" });

    await expect(getFhirClient(ctx).search("Patient", { identifier: "t7" })).rejects.toBeInstanceOf(ApplicationError);
  });

  it("classifies delete responses", async () => {
    const client = getFhirClient(ctx);

    mockSendRequest.mockResolvedValueOnce({ status: 204, body: "" });
    await expect(client.deleteResource("Observation", "o1")).resolves.toBeUndefined();

    mockSendRequest.mockResolvedValueOnce({ status: 404, body: "" });
    await expect(client.deleteResource("Observation", "o1")).rejects.toBeInstanceOf(NotFoundError);

    mockSendRequest.mockResolvedValueOnce({ status: 410, body: "" });
    await expect(client.deleteResource("Observation", "o1")).rejects.toBeInstanceOf(NotFoundError);

    mockSendRequest.mockResolvedValueOnce({ status: 409, body: "still referenced" });
    await expect(client.deleteResource("Encounter", "e1")).rejects.toBeInstanceOf(ConflictError);

    mockSendRequest.mockResolvedValueOnce({ status: 500, body: "boom" });
    await expect(client.deleteResource("Encounter", "e1")).rejects.toMatchObject({ code: "APPLICATION_ERROR", status: 500 });
  });

  it("expunges deleted resources and their history", async () => {
    mockSendRequest.mockResolvedValue({ status: 200, body: "{}" });

    await getFhirClient(ctx).expunge("Observation", "o1");

    const call = mockSendRequest.mock.calls[0][0];
    expect(call.method).toBe("POST");
    expect(call.url).toBe("http://records.test:8080/fhir/Observation/o1/$expunge");
    expect(JSON.parse(call.body)).toEqual({
      resourceType: "Parameters",
      parameter: [
        { name: "expungeDeletedResources", valueBoolean: true },
        { name: "expungePreviousVersions", valueBoolean: true },
      ],
    });
  });
});
