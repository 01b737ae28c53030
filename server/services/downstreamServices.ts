/**
 * Calls into the app server, tagging service and index service.
 *
 * Best-effort: none of these throw. Failures come back as structured
 * results and the pipeline records them as warnings.
 */
import { describeError } from "../errors";
import { isSuccessStatus, sendRequest, type HttpMethod } from "../http/transport";
import type { TargetContext } from "../target";

export interface DownstreamResult {
  success: boolean;
  status?: number;
  error?: string;
}

async function callService(ctx: TargetContext, method: HttpMethod, url: string): Promise<DownstreamResult> {
  try {
    const res = await sendRequest({
      method,
      url,
      headers: { Accept: "application/json" },
      connectTimeoutMs: ctx.timeouts.connectMs,
      timeoutMs: ctx.timeouts.requestMs,
    });
    if (isSuccessStatus(res.status)) {
      return { success: true, status: res.status };
    }
    return {
      success: false,
      status: res.status,
      error: `HTTP ${res.status}: ${res.body.substring(0, 200)}`,
    };
  } catch (err) {
    return { success: false, status: 0, error: describeError(err) };
  }
}

/** Ask the app server to reload its identifier mapping cache from the relational store. */
export function reloadMappingCache(ctx: TargetContext): Promise<DownstreamResult> {
  return callService(ctx, "POST", `${ctx.appServerUrl}/api/fhir/reloadResourceMapListFromDB`);
}

export function tagEntityResources(ctx: TargetContext, practiceId: string, entityId: string): Promise<DownstreamResult> {
  return callService(
    ctx,
    "GET",
    `${ctx.metadataServiceUrl}${ctx.servicePaths.tagging}/${encodeURIComponent(practiceId)}/${encodeURIComponent(entityId)}`,
  );
}

export function indexEntity(ctx: TargetContext, externalId: string): Promise<DownstreamResult> {
  return callService(ctx, "GET", `${ctx.indexServiceUrl}${ctx.servicePaths.indexing}/${encodeURIComponent(externalId)}`);
}
