import { ConfigurationError } from "../errors";

const ID_PATTERN = /^[A-Za-z0-9-]+$/;

export function isValidIdentifier(value: string): boolean {
  return ID_PATTERN.test(value);
}

export function requireIdentifier(label: string, value: string | undefined): string {
  if (!value || !value.trim()) {
    throw new ConfigurationError(`Missing ${label}`);
  }
  const trimmed = value.trim();
  if (!isValidIdentifier(trimmed)) {
    throw new ConfigurationError(`Invalid ${label} "${trimmed}": only letters, digits and '-' are allowed`);
  }
  return trimmed;
}

// Composite id shared by the relational store, tagging and indexing.
export function buildExternalId(practiceId: string, entityId: string): string {
  return `a-${practiceId}.E-${entityId}`;
}
