import { fhirBundleSchema, fhirResourceSchema, type FhirBundle, type FhirResource } from "@shared/fhirTypes";
import { ApplicationError, ConflictError, NotFoundError } from "../errors";
import { isSuccessStatus, sendRequest, type HttpMethod, type TransportResponse } from "../http/transport";
import type { TargetContext } from "../target";

const FHIR_JSON = "application/fhir+json";

export type SearchParams = Record<string, string>;

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function parseBundle(res: TransportResponse, url: string, method: HttpMethod): FhirBundle {
  const parsed = fhirBundleSchema.safeParse(parseJson(res.body));
  if (!parsed.success) {
    throw new ApplicationError({ url, method, status: res.status, body: res.body });
  }
  return parsed.data;
}

function nextLink(bundle: FhirBundle): string | undefined {
  return bundle.link?.find((l) => l.relation === "next")?.url;
}

function entryResources(bundle: FhirBundle): FhirResource[] {
  const resources: FhirResource[] = [];
  for (const entry of bundle.entry ?? []) {
    if (entry.resource) resources.push(entry.resource);
  }
  return resources;
}

/**
 * Clinical-resource store operations scoped to one target. Every call goes
 * through the transport with the target's connect and total timeouts.
 */
export function getFhirClient(ctx: TargetContext) {
  const baseUrl = ctx.fhirBaseUrl;
  const { connectMs, requestMs, expansionMs } = ctx.timeouts;

  function call(method: HttpMethod, url: string, body?: unknown, timeoutMs = requestMs) {
    const headers: Record<string, string> = { Accept: FHIR_JSON };
    if (body !== undefined) headers["Content-Type"] = FHIR_JSON;
    return sendRequest({
      method,
      url,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
      connectTimeoutMs: connectMs,
      timeoutMs,
    });
  }

  function resourceUrl(type: string, id: string): string {
    return `${baseUrl}/${encodeURIComponent(type)}/${encodeURIComponent(id)}`;
  }

  function classifyRemovalFailure(res: TransportResponse, type: string, id: string, url: string, method: HttpMethod): never {
    if (res.status === 404 || res.status === 410) {
      throw new NotFoundError(`${type}/${id} not found`);
    }
    if (res.status === 409 || res.status === 412) {
      throw new ConflictError(`${type}/${id}`, res.body);
    }
    throw new ApplicationError({ url, method, status: res.status, body: res.body });
  }

  // Follows `next` links until the store stops sending one. A link that
  // points back at a page already read is a paging fault, not the end.
  async function collectPages(firstUrl: string, timeoutMs: number): Promise<FhirResource[]> {
    const resources: FhirResource[] = [];
    const visited = new Set<string>();
    let url: string | undefined = firstUrl;
    while (url) {
      if (visited.has(url)) {
        throw new ApplicationError({
          url,
          method: "GET",
          status: 200,
          body: `Paging loop: next link ${url} was already read after ${visited.size} page(s)`,
        });
      }
      visited.add(url);
      const res = await call("GET", url, undefined, timeoutMs);
      if (!isSuccessStatus(res.status)) {
        throw new ApplicationError({ url, method: "GET", status: res.status, body: res.body });
      }
      const bundle = parseBundle(res, url, "GET");
      resources.push(...entryResources(bundle));
      url = nextLink(bundle);
    }
    return resources;
  }

  return {
    baseUrl,

    async transaction(bundle: FhirBundle): Promise<FhirBundle> {
      const res = await call("POST", baseUrl, bundle);
      if (!isSuccessStatus(res.status)) {
        throw new ApplicationError({ url: baseUrl, method: "POST", status: res.status, body: res.body });
      }
      return parseBundle(res, baseUrl, "POST");
    },

    async search(type: string, params: SearchParams): Promise<FhirBundle> {
      const url = `${baseUrl}/${encodeURIComponent(type)}?${new URLSearchParams(params).toString()}`;
      const res = await call("GET", url);
      if (!isSuccessStatus(res.status)) {
        throw new ApplicationError({ url, method: "GET", status: res.status, body: res.body });
      }
      return parseBundle(res, url, "GET");
    },

    async searchAll(type: string, params: SearchParams): Promise<FhirResource[]> {
      const url = `${baseUrl}/${encodeURIComponent(type)}?${new URLSearchParams(params).toString()}`;
      return collectPages(url, requestMs);
    },

    async read(type: string, id: string): Promise<FhirResource | undefined> {
      const url = resourceUrl(type, id);
      const res = await call("GET", url);
      if (res.status === 404 || res.status === 410) return undefined;
      if (!isSuccessStatus(res.status)) {
        throw new ApplicationError({ url, method: "GET", status: res.status, body: res.body });
      }
      const parsed = fhirResourceSchema.safeParse(parseJson(res.body));
      if (!parsed.success) {
        throw new ApplicationError({ url, method: "GET", status: res.status, body: res.body });
      }
      return parsed.data;
    },

    async everything(type: string, id: string): Promise<FhirResource[]> {
      return collectPages(`${resourceUrl(type, id)}/$everything`, expansionMs);
    },

    async deleteResource(type: string, id: string): Promise<void> {
      const url = resourceUrl(type, id);
      const res = await call("DELETE", url);
      if (isSuccessStatus(res.status)) return;
      classifyRemovalFailure(res, type, id, url, "DELETE");
    },

    async expunge(type: string, id: string): Promise<void> {
      const url = `${resourceUrl(type, id)}/$expunge`;
      const res = await call("POST", url, {
        resourceType: "Parameters",
        parameter: [
          { name: "expungeDeletedResources", valueBoolean: true },
          { name: "expungePreviousVersions", valueBoolean: true },
        ],
      });
      if (isSuccessStatus(res.status)) return;
      classifyRemovalFailure(res, type, id, url, "POST");
    },
  };
}
