/**
 * Label builder
 *
 * Turns one local record into the platform's label tree. Scalar values are
 * anchored to the OCR words under their location; the words' entities are
 * attached as context and used to pick the exact span when an entity of the
 * field's own type covers it.
 *
 * @module services/labeling/label-builder
 */

import { isLocationOverlapping, type Location } from '../../models/location.js';
import {
  formatUnambiguous,
  labelKindToFieldType,
  type CheckboxLabel,
  type DocumentTagLabel,
  type ScalarLabel,
  type SignatureLabel,
} from '../../models/labels.js';
import type { DocRecord, DocSchema } from '../../models/schema.js';
import type { InferredFieldType } from '../../models/field-types.js';
import type {
  PlatformEntity,
  PlatformWord,
  RowLabelWire,
  ScalarLabelWire,
  TableLabelWire,
  WireLabel,
} from '../../models/wire.js';
import { isPredictionLabel } from '../../models/wire.js';
import type { EntityIndex } from './entity-index.js';
import type { Logger } from '../../utils/logger.js';

/**
 * Entity tags the platform extracts as first-class values, and the field
 * type each one implies
 */
export const FIRST_CLASS_ENTITY_TYPES: Readonly<Record<string, InferredFieldType>> = {
  NUMBER: 'number',
  MONEY: 'number',
  DATE: 'timestamp',
  TIME: 'text',
};

export function entityFieldType(entity: PlatformEntity): InferredFieldType | undefined {
  return FIRST_CLASS_ENTITY_TYPES[entity.label];
}

export type LabelSet = Record<string, WireLabel>;

export interface GenerateLabelsInput {
  /** Used in log lines */
  fileName: string;
  record: DocRecord;
  schema: DocSchema;
  words: readonly PlatformWord[];
  entityIndex: EntityIndex;
  /** Latest known model version per field name */
  modelVersions: Readonly<Record<string, number>>;
  /** Send explicit "no value" labels for empty fields */
  emptyLabels?: boolean;
  log: Logger;
}

// ═══════════════════════════════════════════════════════════════════════════════
// WORD MATCHING
// ═══════════════════════════════════════════════════════════════════════════════

export function findOverlappingWords(location: Location, words: readonly PlatformWord[]): PlatformWord[] {
  return words.filter((word) => isLocationOverlapping(word.location, location));
}

/**
 * Words backing a location. Uids win when every one of them resolves;
 * otherwise any word overlapping the rectangle counts.
 */
export function resolveSupportingWords(
  location: Location,
  words: readonly PlatformWord[],
  wordsByUid: ReadonlyMap<string, PlatformWord>
): PlatformWord[] {
  if (location.uids && location.uids.length > 0) {
    const resolved: PlatformWord[] = [];
    for (const uid of location.uids) {
      const word = wordsByUid.get(uid);
      if (!word) break;
      resolved.push(word);
    }
    if (resolved.length === location.uids.length) {
      return resolved;
    }
  }
  return findOverlappingWords(location, words);
}

// ═══════════════════════════════════════════════════════════════════════════════
// LABEL CONSTRUCTION
// ═══════════════════════════════════════════════════════════════════════════════

function emptyLabel(modelVersion: number): ScalarLabelWire {
  return {
    Label: { Source: [], IsPrediction: false },
    ModelVersion: modelVersion,
    Context: { Entities: [] },
  };
}

function flagLabel(label: CheckboxLabel | SignatureLabel, modelVersion: number): ScalarLabelWire {
  const wire: ScalarLabelWire = {
    Label: {
      Value: { Value: label.value, State: label.value },
      IsPrediction: false,
    },
    ModelVersion: modelVersion,
    Context: { Entities: [] },
  };
  if (label.location) {
    wire.Label.Source = { BBoxes: [label.location] };
  }
  return wire;
}

function documentTagLabel(label: DocumentTagLabel, modelVersion: number): ScalarLabelWire {
  const tags = label.value === null ? [] : Array.isArray(label.value) ? label.value : [label.value];
  return {
    Label: {
      Value: tags.map((tag) => ({ Label: { Value: tag, IsPrediction: false } })),
      IsPrediction: false,
    },
    ModelVersion: modelVersion,
    Context: { Entities: [] },
  };
}

class LabelBuilder {
  private readonly wordsByUid: Map<string, PlatformWord>;

  constructor(private readonly input: GenerateLabelsInput) {
    this.wordsByUid = new Map(input.words.map((w) => [w.uid, w]));
  }

  build(record: DocRecord, schema: DocSchema): LabelSet {
    const labels: LabelSet = {};
    for (const [fieldName, field] of Object.entries(schema.fields)) {
      const value = record[fieldName] ?? null;
      const modelVersion = this.input.modelVersions[fieldName] ?? 0;

      if (field.type === 'table') {
        if (Array.isArray(value)) {
          labels[fieldName] = this.table(value, field.schema, modelVersion);
        }
        continue;
      }

      if (value === null || Array.isArray(value)) {
        if (this.input.emptyLabels) {
          labels[fieldName] = emptyLabel(modelVersion);
        }
        continue;
      }

      const label = this.scalar(fieldName, value, modelVersion);
      if (label) {
        labels[fieldName] = label;
      }
    }
    return labels;
  }

  private table(rows: DocRecord[], schema: DocSchema, modelVersion: number): TableLabelWire {
    const rowLabels: RowLabelWire[] = rows.map((row) => {
      const values = this.build(row, schema);
      const entries = Object.values(values);
      return {
        Label: {
          Value: values,
          IsPrediction: entries.length === 0 || entries.some(isPredictionLabel),
        },
      };
    });

    return {
      Label: {
        Value: rowLabels,
        IsPrediction: rowLabels.length === 0 || rowLabels.some(isPredictionLabel),
      },
      ModelVersion: modelVersion,
    };
  }

  private scalar(fieldName: string, label: ScalarLabel, modelVersion: number): ScalarLabelWire | null {
    switch (label.kind) {
      case 'checkbox':
      case 'signature':
        return flagLabel(label, modelVersion);
      case 'document_tag':
        return documentTagLabel(label, modelVersion);
      default:
        break;
    }

    if (label.value === null) {
      return this.input.emptyLabels ? emptyLabel(modelVersion) : null;
    }

    if (!label.location) {
      return emptyLabel(modelVersion);
    }

    const { entityIndex, words, log, fileName } = this.input;
    const targetType = labelKindToFieldType(label.kind);

    let supporting = resolveSupportingWords(label.location, words, this.wordsByUid);
    const candidates = supporting.flatMap((w) => entityIndex.find([w], { matchSupersets: true }));

    for (const entity of candidates) {
      if (entityFieldType(entity) === targetType) {
        const spanUids = new Set(entity.source_word_uids);
        supporting = words.filter((w) => spanUids.has(w.uid));
        break;
      }
    }

    const entities = entityIndex.find(supporting);

    if (targetType !== 'text' && entities.length === 0 && supporting.length === 0) {
      log.warn(
        `Field ${fieldName} in ${fileName} with value ${String(label.value)} did not match any words or entities, so will label it by value`
      );
      return {
        Label: { Value: formatUnambiguous(label), Source: [], IsPrediction: false },
        ModelVersion: modelVersion,
        Context: { Entities: [] },
      };
    }

    return {
      Label: { Source: supporting, IsPrediction: false },
      ModelVersion: modelVersion,
      Context: { Entities: entities },
    };
  }
}

/**
 * Build the label set for one document. Fields absent from the result are
 * left untouched on the platform.
 */
export function generateLabels(input: GenerateLabelsInput): LabelSet {
  return new LabelBuilder(input).build(input.record, input.schema);
}
