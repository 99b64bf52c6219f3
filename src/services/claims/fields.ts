// =============================================================================
// CLAIMER — JSON Field Readers
//
// Typed access to fields of untrusted JSON objects. An absent (or null)
// required field is MissingField; a present field of the wrong type is
// MalformedInput.
// =============================================================================

import { ClaimError, missingField } from '../../errors';

export type JsonObject = Record<string, unknown>;

export function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function requireObject(value: unknown, context: string): JsonObject {
  if (!isObject(value)) {
    throw new ClaimError('MalformedInput', `${context} must be a JSON object`);
  }
  return value;
}

function isAbsent(value: unknown): value is undefined | null {
  return value === undefined || value === null;
}

export function requiredString(raw: JsonObject, field: string, context: string): string {
  const value = raw[field];
  if (isAbsent(value)) throw missingField(field, context);
  if (typeof value !== 'string') {
    throw new ClaimError('MalformedInput', `${field} must be a string, got ${typeof value}`, { field });
  }
  return value;
}

export function optionalString(raw: JsonObject, field: string): string | undefined {
  const value = raw[field];
  if (isAbsent(value)) return undefined;
  if (typeof value !== 'string') {
    throw new ClaimError('MalformedInput', `${field} must be a string, got ${typeof value}`, { field });
  }
  return value;
}

function asIndex(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ClaimError('MalformedInput', `${field} must be a non-negative integer`, { field });
  }
  return value;
}

export function requiredIndex(raw: JsonObject, field: string, context: string): number {
  const value = raw[field];
  if (isAbsent(value)) throw missingField(field, context);
  return asIndex(value, field);
}

export function optionalIndex(raw: JsonObject, field: string): number | undefined {
  const value = raw[field];
  return isAbsent(value) ? undefined : asIndex(value, field);
}

export function requiredList(raw: JsonObject, field: string, context: string): unknown[] {
  const value = raw[field];
  if (isAbsent(value)) throw missingField(field, context);
  if (!Array.isArray(value)) {
    throw new ClaimError('MalformedInput', `${field} must be a list`, { field });
  }
  return value;
}

export function requiredStringList(raw: JsonObject, field: string, context: string): string[] {
  return requiredList(raw, field, context).map((entry, index) => {
    if (typeof entry !== 'string') {
      throw new ClaimError('MalformedInput', `${field}[${index}] must be a string, got ${typeof entry}`, {
        field,
        recipientIndex: index,
      });
    }
    return entry;
  });
}
