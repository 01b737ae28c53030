import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { ConfigurationError } from "../errors";
import {
  loadEntityBundle,
  loadSharedBundles,
  loadSharedResourceRefs,
} from "../provisioning/bundleLoader";

let dir: string;

async function writeBundle(name: string, content: unknown): Promise<void> {
  await writeFile(path.join(dir, name), typeof content === "string" ? content : JSON.stringify(content));
}

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), "bundles-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("bundle loader", () => {
  it("loads the shared bundles that exist, in upload order", async () => {
    await writeBundle("Location.json", {
      resourceType: "Bundle",
      entry: [{ resource: { resourceType: "Location", id: "loc-1", managingOrganization: { reference: "Organization/org-1" } } }],
    });
    await writeBundle("Organization.json", {
      resourceType: "Bundle",
      entry: [
        { resource: { resourceType: "Organization", id: "org-1" } },
        { fullUrl: "urn:uuid:org-new", resource: { resourceType: "Organization" } },
      ],
    });

    const bundles = await loadSharedBundles(dir);

    expect(bundles.map((b) => [b.name, b.scope, b.items.length])).toEqual([
      ["Organization", "shared", 2],
      ["Location", "shared", 1],
    ]);
    expect(await loadSharedResourceRefs(dir)).toEqual(["Organization/org-1", "Location/loc-1"]);
  });

  it("loads the entity bundle by id", async () => {
    await writeBundle("t7_bundle.json", {
      resourceType: "Bundle",
      type: "transaction",
      entry: [{ resource: { resourceType: "Patient", id: "t7" }, request: { method: "PUT", url: "Patient/t7" } }],
    });

    const bundle = await loadEntityBundle(dir, "t7");
    expect(bundle.name).toBe("t7_bundle");
    expect(bundle.scope).toBe("entity");
    expect(bundle.items[0].record.localRef).toBe("Patient/t7");
  });

  it("reports a missing entity bundle", async () => {
    await expect(loadEntityBundle(dir, "t8")).rejects.toThrow(
      `Entity bundle not found: ${path.join(dir, "t8_bundle.json")}`,
    );
  });

  it("rejects files that are not FHIR bundles", async () => {
    await writeBundle("t7_bundle.json", "{ not json");
    await expect(loadEntityBundle(dir, "t7")).rejects.toBeInstanceOf(ConfigurationError);

    await writeBundle("t7_bundle.json", { resourceType: "Patient", id: "t7" });
    await expect(loadEntityBundle(dir, "t7")).rejects.toThrow("is not a FHIR Bundle");
  });
});
