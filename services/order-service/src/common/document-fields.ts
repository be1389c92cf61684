import { DocumentData, DocumentValue } from "@orderdesk/database";

export function stringField(data: DocumentData, field: string): string | undefined {
  const value = data[field];
  return typeof value === "string" ? value : undefined;
}

export function numberField(data: DocumentData, field: string): number | undefined {
  const value = data[field];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function booleanField(data: DocumentData, field: string): boolean | undefined {
  const value = data[field];
  return typeof value === "boolean" ? value : undefined;
}

export function arrayField(data: DocumentData, field: string): DocumentValue[] | undefined {
  const value = data[field];
  return Array.isArray(value) ? value : undefined;
}

export function isDocumentData(value: DocumentValue): value is DocumentData {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Drops undefined members so the result is storable. */
export function compactDocument(input: Record<string, DocumentValue | undefined>): DocumentData {
  const data: DocumentData = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) data[key] = value;
  }
  return data;
}
