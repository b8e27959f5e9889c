/**
 * Local scalar labels
 *
 * A label is one user-provided ground-truth value plus where it sits on the
 * page. Labels are a tagged union on `kind`; every kind has a display format
 * and an unambiguous format. The unambiguous format must stay
 * machine-parseable: it is what gets written whenever this system has to
 * read the value back.
 *
 * @module models/labels
 */

import type { Cell, Location } from './location.js';
import type { InferredFieldType } from './field-types.js';
import { formatDisplayDate, formatUnambiguousDate } from '../utils/dates.js';

export const SCALAR_KINDS = ['text', 'number', 'timestamp', 'checkbox', 'signature', 'document_tag'] as const;

export type ScalarKind = (typeof SCALAR_KINDS)[number];

/** 1 = checked/signed, 0 = explicitly empty, null = unknown */
export type TriState = 0 | 1 | null;

interface LabelBase {
  location?: Location | null;
  cell?: Cell | null;
}

export interface TextLabel extends LabelBase {
  kind: 'text';
  value: string | null;
}

export interface NumberLabel extends LabelBase {
  kind: 'number';
  value: number | string | null;
}

export interface TimestampLabel extends LabelBase {
  kind: 'timestamp';
  value: Date | null;
}

export interface CheckboxLabel extends LabelBase {
  kind: 'checkbox';
  value: TriState;
}

export interface SignatureLabel extends LabelBase {
  kind: 'signature';
  value: TriState;
}

export interface DocumentTagLabel extends LabelBase {
  kind: 'document_tag';
  value: string | string[] | null;
}

export type ScalarLabel =
  | TextLabel
  | NumberLabel
  | TimestampLabel
  | CheckboxLabel
  | SignatureLabel
  | DocumentTagLabel;

// ═══════════════════════════════════════════════════════════════════════════════
// KIND MAPPINGS
// ═══════════════════════════════════════════════════════════════════════════════

/** Type tags used for scalar fields in manifest files */
export const KIND_TO_MANIFEST_TAG: Record<ScalarKind, string> = {
  text: 'TextLabel',
  number: 'NumberLabel',
  timestamp: 'TimestampLabel',
  checkbox: 'CheckboxLabel',
  signature: 'SignatureLabel',
  document_tag: 'DocumentTagLabel',
};

const MANIFEST_TAG_TO_KIND = new Map<string, ScalarKind>(
  SCALAR_KINDS.map((kind) => [KIND_TO_MANIFEST_TAG[kind], kind])
);

export function manifestTagToKind(tag: string): ScalarKind | undefined {
  return MANIFEST_TAG_TO_KIND.get(tag);
}

const KIND_TO_FIELD_TYPE: Record<ScalarKind, InferredFieldType> = {
  text: 'text',
  number: 'number',
  timestamp: 'timestamp',
  checkbox: 'checkbox',
  signature: 'signature',
  document_tag: 'document_tag',
};

export function labelKindToFieldType(kind: ScalarKind): InferredFieldType {
  return KIND_TO_FIELD_TYPE[kind];
}

export function isScalarKind(value: string): value is ScalarKind {
  return (SCALAR_KINDS as readonly string[]).includes(value);
}

export function toTriState(value: boolean | number | null | undefined): TriState {
  if (value === null || value === undefined) return null;
  return value ? 1 : 0;
}

// ═══════════════════════════════════════════════════════════════════════════════
// FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

function tagList(value: string | string[] | null): string[] {
  if (value === null) return [];
  return Array.isArray(value) ? [...value] : [value];
}

/**
 * Human-facing form of a label's value
 */
export function formatDisplay(label: ScalarLabel): string | string[] {
  switch (label.kind) {
    case 'text':
      return label.value ?? '';
    case 'number':
      return label.value === null ? '' : String(label.value);
    case 'timestamp':
      return label.value === null ? '' : formatDisplayDate(label.value);
    case 'checkbox':
      return label.value ? '✗' : '';
    case 'signature':
      return label.value === null ? '' : String(label.value);
    case 'document_tag':
      return tagList(label.value);
  }
}

/**
 * Machine-parseable form of a label's value
 */
export function formatUnambiguous(label: ScalarLabel): string | number | string[] {
  switch (label.kind) {
    case 'text':
      return label.value ?? '';
    case 'number':
      return label.value ?? '';
    case 'timestamp':
      return label.value === null ? '' : formatUnambiguousDate(label.value);
    case 'checkbox':
    case 'signature':
      return label.value ? 'true' : 'false';
    case 'document_tag':
      return tagList(label.value);
  }
}
