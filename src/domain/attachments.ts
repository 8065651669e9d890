/**
 * Attachment normalization.
 *
 * Providers emit an `attachments` parameter in whatever shape they like:
 * a bare id, a JSON-encoded array, a comma-separated list, an array of ids
 * or an array of objects. Both the planner and the send path coerce it to
 * a uniform AttachmentRef[] so downstream code handles exactly one shape.
 *
 * An entry is a `reference` only while its value still holds a placeholder.
 * Once the executor has substituted it, the entry is re-read from the
 * resolved value: a list of ids becomes one `document_id` per id.
 */

import { AttachmentRef } from './workflow';

const PLACEHOLDER_PATTERN = /\{\{[^}]+\}\}/;

function toRef(value: string): AttachmentRef {
  return {
    type: PLACEHOLDER_PATTERN.test(value) ? 'reference' : 'document_id',
    value,
  };
}

function fromObject(obj: Record<string, unknown>): AttachmentRef[] {
  const raw = obj.value ?? obj.id ?? obj.document_id ?? obj.documentId;
  if (typeof raw === 'string' || typeof raw === 'number') {
    const value = String(raw).trim();
    return value ? [toRef(value)] : [];
  }
  // A resolved reference: the value is whatever the upstream step returned.
  if (typeof raw === 'object' && raw !== null) {
    return normalizeAttachments(raw);
  }
  return [];
}

function fromString(raw: string): AttachmentRef[] {
  const text = raw.trim();
  if (!text) return [];

  if (text.startsWith('[')) {
    const parsed = parseJsonArray(text);
    if (parsed) return normalizeAttachments(parsed);
  }

  if (PLACEHOLDER_PATTERN.test(text) && !text.includes(',')) {
    return [toRef(text)];
  }

  return text
    .split(',')
    .map((part) => part.trim().replace(/^["']|["']$/g, ''))
    .filter((part) => part.length > 0)
    .map(toRef);
}

/** Coerce any attachments value into a list of typed references. */
export function normalizeAttachments(value: unknown): AttachmentRef[] {
  if (value === null || value === undefined) return [];

  if (Array.isArray(value)) {
    const refs: AttachmentRef[] = [];
    for (const item of value) {
      if (typeof item === 'string') {
        const trimmed = item.trim();
        if (trimmed) refs.push(toRef(trimmed));
      } else if (typeof item === 'number') {
        refs.push(toRef(String(item)));
      } else if (typeof item === 'object' && item !== null && !Array.isArray(item)) {
        refs.push(...fromObject(toRecord(item)));
      }
    }
    return refs;
  }

  if (typeof value === 'string') return fromString(value);
  if (typeof value === 'number') return [toRef(String(value))];
  if (typeof value === 'object') return fromObject(toRecord(value));
  return [];
}

function parseJsonArray(text: string): unknown[] | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return Array.isArray(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function toRecord(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value));
}
