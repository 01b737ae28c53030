import { describe, it, expect, vi, beforeEach } from "vitest";
import type { TargetContext } from "../target";
import {
  clearSubscribers,
  emitProvisioningEvent,
  subscribe,
} from "../services/provisioningEventService";

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

function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe("emitProvisioningEvent", () => {
  beforeEach(() => {
    clearSubscribers();
  });

  it("delivers events to subscribers of that type only", async () => {
    const onWarning = vi.fn();
    const onCompleted = vi.fn();
    subscribe("pipeline.step_warning", onWarning);
    subscribe("pipeline.completed", onCompleted);

    emitProvisioningEvent(ctx, { type: "pipeline.step_warning", status: "warning", entityId: "t7", step: 5 });
    expect(onWarning).not.toHaveBeenCalled();
    await flush();

    expect(onWarning).toHaveBeenCalledWith(ctx, { type: "pipeline.step_warning", status: "warning", entityId: "t7", step: 5 });
    expect(onCompleted).not.toHaveBeenCalled();
  });

  it("stops delivering after unsubscribe", async () => {
    const handler = vi.fn();
    const unsubscribe = subscribe("deletion.completed", handler);
    unsubscribe();

    emitProvisioningEvent(ctx, { type: "deletion.completed", status: "completed", entityId: "t7" });
    await flush();

    expect(handler).not.toHaveBeenCalled();
  });

  it("keeps emitting when a subscriber throws", async () => {
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => {});
    const healthy = vi.fn();
    subscribe("deletion.resource_blocked", () => {
      throw new Error("subscriber broke");
    });
    subscribe("deletion.resource_blocked", healthy);

    expect(() =>
      emitProvisioningEvent(ctx, { type: "deletion.resource_blocked", status: "blocked", entityId: "t7", tier: 4 }),
    ).not.toThrow();
    await flush();

    expect(healthy).toHaveBeenCalledTimes(1);
    expect(consoleError).toHaveBeenCalledWith(
      "[provisioning-event] Subscriber error for deletion.resource_blocked: subscriber broke",
    );
    consoleError.mockRestore();
  });
});
