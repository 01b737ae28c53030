/**
 * Connection parameters for one provisioning or deletion invocation.
 * Every store call is scoped by a TargetContext; nothing about the target
 * is cached between invocations.
 */
export type TargetContext = {
  serverHost: string;
  fhirBaseUrl: string;
  metadataServiceUrl: string;
  appServerUrl: string;
  indexServiceUrl: string;
  servicePaths: ServicePaths;
  timeouts: StoreTimeouts;
};

// Endpoint prefixes on the metadata and index services.
export type ServicePaths = {
  tagging: string;
  indexing: string;
  documentUpload: string;
};

export type StoreTimeouts = {
  connectMs: number;
  requestMs: number;
  expansionMs: number;
};
