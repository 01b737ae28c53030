import { ConfigurationError } from "./errors";
import type { TargetContext } from "./target";

type Env = Record<string, string | undefined>;

const DEFAULT_CONNECT_TIMEOUT_MS = 5_000;
const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
const DEFAULT_EXPANSION_TIMEOUT_MS = 60_000;
const DEFAULT_BUNDLES_DIR = "./mock_patients/bundles";
const DEFAULT_PORT = 5000;
const DEFAULT_TAGGING_PATH = "/athenahealth/tagAPatient";
const DEFAULT_INDEXING_PATH = "/trais/qa/indexPatient";
const DEFAULT_DOCUMENT_UPLOAD_PATH = "/athenahealth/loadCCDAFromXML";

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const val = env[name];
  if (val) {
    const parsed = parseInt(val, 10);
    if (!isNaN(parsed) && parsed > 0) return parsed;
  }
  return fallback;
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

function readPath(env: Env, name: string, fallback: string): string {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const path = trimTrailingSlash(raw);
  return path.startsWith("/") ? path : `/${path}`;
}

export function stripScheme(host: string): string {
  return host.trim().replace(/^https?:\/\//, "").replace(/\/+$/, "");
}

/**
 * Build the connection parameters for a run. Service URLs derive from the
 * server host unless an explicit override is set in the environment.
 */
export function resolveTargetContext(
  opts: { serverHost?: string } = {},
  env: Env = process.env,
): TargetContext {
  const rawHost = opts.serverHost ?? env.SERVER_HOST;
  if (!rawHost || !stripScheme(rawHost)) {
    throw new ConfigurationError("Missing server host (pass --server or set SERVER_HOST)");
  }
  const host = stripScheme(rawHost);

  return {
    serverHost: host,
    fhirBaseUrl: trimTrailingSlash(env.FHIR_BASE_URL || `http://${host}:8080/fhir`),
    metadataServiceUrl: trimTrailingSlash(env.METADATA_SERVICE_URL || `http://${host}:9090`),
    appServerUrl: trimTrailingSlash(env.APP_SERVER_URL || `http://${host}`),
    indexServiceUrl: trimTrailingSlash(env.INDEX_SERVICE_URL || `http://${host}:5000`),
    servicePaths: {
      tagging: readPath(env, "TAGGING_PATH", DEFAULT_TAGGING_PATH),
      indexing: readPath(env, "INDEXING_PATH", DEFAULT_INDEXING_PATH),
      documentUpload: readPath(env, "DOCUMENT_UPLOAD_PATH", DEFAULT_DOCUMENT_UPLOAD_PATH),
    },
    timeouts: {
      connectMs: readPositiveInt(env, "STORE_CONNECT_TIMEOUT_MS", DEFAULT_CONNECT_TIMEOUT_MS),
      requestMs: readPositiveInt(env, "STORE_REQUEST_TIMEOUT_MS", DEFAULT_REQUEST_TIMEOUT_MS),
      expansionMs: readPositiveInt(env, "STORE_EXPANSION_TIMEOUT_MS", DEFAULT_EXPANSION_TIMEOUT_MS),
    },
  };
}

export function getBundlesDir(env: Env = process.env): string {
  return env.BUNDLES_DIR || DEFAULT_BUNDLES_DIR;
}

export function getPort(env: Env = process.env): number {
  return readPositiveInt(env, "PORT", DEFAULT_PORT);
}

export function getDatabaseUrl(env: Env = process.env): string {
  const url = env.DATABASE_URL;
  if (!url) {
    throw new ConfigurationError("DATABASE_URL must be set. Did you forget to provision a database?");
  }
  return url;
}
