export class ProvisioningError extends Error {
  public readonly code: string;
  public readonly statusCode: number;

  constructor(code: string, message: string, statusCode = 500) {
    super(message);
    this.name = "ProvisioningError";
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class ConfigurationError extends ProvisioningError {
  constructor(message: string) {
    super("CONFIGURATION_ERROR", message, 400);
    this.name = "ConfigurationError";
  }
}

/**
 * Timeout or refused connection. Carries status 0, the way curl reports a
 * request that never got an HTTP status back.
 */
export class ConnectivityError extends ProvisioningError {
  public readonly url: string;
  public readonly status = 0;

  constructor(url: string, detail: string) {
    super("CONNECTIVITY_ERROR", `Connection to ${url} failed (status 0): ${detail}`, 502);
    this.name = "ConnectivityError";
    this.url = url;
  }
}

export class ApplicationError extends ProvisioningError {
  public readonly status: number;
  public readonly body: string;
  public readonly url: string;

  constructor(opts: { url: string; method: string; status: number; body: string }) {
    super("APPLICATION_ERROR", `${opts.method} ${opts.url} returned HTTP ${opts.status}`, 502);
    this.name = "ApplicationError";
    this.status = opts.status;
    this.body = opts.body;
    this.url = opts.url;
  }
}

export class ConflictError extends ProvisioningError {
  public readonly resourceRef: string;
  public readonly body: string;

  constructor(resourceRef: string, body: string) {
    super("CONFLICT", `${resourceRef} is still referenced by another resource`, 409);
    this.name = "ConflictError";
    this.resourceRef = resourceRef;
    this.body = body;
  }
}

export class NotFoundError extends ProvisioningError {
  constructor(message: string) {
    super("NOT_FOUND", message, 404);
    this.name = "NotFoundError";
  }
}

export class PrerequisiteNotMetError extends ProvisioningError {
  public readonly requestedStep: number;
  public readonly missingStep: string;

  constructor(opts: { requestedStep: number; missingStep: string; reason: string }) {
    super(
      "PREREQUISITE_NOT_MET",
      `Cannot start from step ${opts.requestedStep}: prerequisite step ${opts.missingStep} not completed (${opts.reason})`,
      409,
    );
    this.name = "PrerequisiteNotMetError";
    this.requestedStep = opts.requestedStep;
    this.missingStep = opts.missingStep;
  }
}

export class DuplicateMappingError extends ProvisioningError {
  constructor(resourceType: string, externalId: string) {
    super(
      "DUPLICATE_MAPPING",
      `Identifier mapping for ${resourceType} "${externalId}" already exists; delete the prior mapping before re-running`,
      409,
    );
    this.name = "DuplicateMappingError";
  }
}

export class BundleOrderError extends ProvisioningError {
  public readonly referrer: string;
  public readonly target: string;

  constructor(bundleName: string, referrer: string, target: string) {
    super(
      "BUNDLE_ORDER_VIOLATION",
      `Bundle "${bundleName}": ${referrer} references ${target}, which does not appear earlier in the bundle or in the shared set`,
      422,
    );
    this.name = "BundleOrderError";
    this.referrer = referrer;
    this.target = target;
  }
}

export class EntityIdMissingError extends ProvisioningError {
  constructor(entityType: string) {
    super("ENTITY_ID_MISSING", `No ${entityType} id was captured for this run`, 422);
    this.name = "EntityIdMissingError";
  }
}

export class PracticeNotFoundError extends ProvisioningError {
  constructor(practiceId: string) {
    super("PRACTICE_NOT_FOUND", `No matching practice found for practiceIdEhrInt: ${practiceId}`, 404);
    this.name = "PracticeNotFoundError";
  }
}

export class RemoteIdAlreadyAssignedError extends ProvisioningError {
  constructor(localRef: string, existing: string) {
    super("REMOTE_ID_REASSIGNED", `${localRef} already has remote id "${existing}"`, 500);
    this.name = "RemoteIdAlreadyAssignedError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
