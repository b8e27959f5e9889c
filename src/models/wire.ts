/**
 * Platform wire structures
 *
 * Evidence objects (OCR words and entities) as the platform returns them, and
 * the nested label structures written back through the update endpoint.
 * Evidence schemas pass unknown keys through so words and entities echo back
 * to the platform exactly as received.
 *
 * @module models/wire
 */

import { z } from 'zod';
import { LocationSchema } from './location.js';

// ═══════════════════════════════════════════════════════════════════════════════
// EVIDENCE
// ═══════════════════════════════════════════════════════════════════════════════

export const PlatformWordSchema = z
  .object({
    uid: z.string(),
    word: z.string(),
    location: LocationSchema,
    confidence: z.number().optional(),
  })
  .passthrough();

export type PlatformWord = z.infer<typeof PlatformWordSchema>;

export const PlatformEntitySchema = z
  .object({
    uid: z.string(),
    label: z.string(),
    location: LocationSchema.optional(),
    source_word_uids: z.array(z.string()),
  })
  .passthrough();

export type PlatformEntity = z.infer<typeof PlatformEntitySchema>;

/**
 * One file's OCR payload, as returned by the document projection query
 */
export const RetrievedDocumentSchema = z.object({
  uid: z.string().min(1),
  name: z.string(),
  text: z
    .object({
      words: z
        .array(PlatformWordSchema)
        .nullish()
        .transform((v) => v ?? []),
    })
    .nullish()
    .transform((v) => v ?? { words: [] }),
  entities: z
    .array(PlatformEntitySchema)
    .nullish()
    .transform((v) => v ?? []),
});

export type RetrievedDocument = z.output<typeof RetrievedDocumentSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// OUTGOING LABELS
// ═══════════════════════════════════════════════════════════════════════════════

export const CheckboxSourceSchema = z.object({
  BBoxes: z.array(LocationSchema),
});

export type CheckboxSource = z.infer<typeof CheckboxSourceSchema>;

export interface TagValueWire {
  Label: { Value: string; IsPrediction: boolean };
}

export interface ScalarLabelWire {
  Label: {
    Source?: PlatformWord[] | CheckboxSource;
    Value?: unknown;
    IsPrediction: boolean;
    IsConfident?: boolean;
  };
  ModelVersion: number;
  Context: { Entities: PlatformEntity[] };
}

export interface RowLabelWire {
  Label: {
    IsPrediction: boolean;
    Value: Record<string, WireLabel>;
  };
}

export interface TableLabelWire {
  Label: {
    IsPrediction: boolean;
    Value: RowLabelWire[];
  };
  ModelVersion: number;
}

export type WireLabel = ScalarLabelWire | TableLabelWire;

export function isTableLabel(label: WireLabel): label is TableLabelWire {
  return !('Context' in label);
}

export function isPredictionLabel(label: WireLabel | RowLabelWire): boolean {
  return label.Label.IsPrediction;
}

// ═══════════════════════════════════════════════════════════════════════════════
// INCOMING LABELS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A scalar label read back from a collection. Everything but `Label` is
 * optional: older rows and predictions omit most of it.
 */
export const IncomingScalarLabelSchema = z.object({
  Label: z.object({
    Source: z.union([CheckboxSourceSchema, z.array(PlatformWordSchema)]).nullish(),
    Value: z.unknown().optional(),
    IsPrediction: z.boolean().nullish().transform((v) => v ?? false),
    IsConfident: z.boolean().nullish(),
  }),
  ModelVersion: z.number().nullish(),
  Context: z
    .object({
      Entities: z.array(PlatformEntitySchema).nullish(),
    })
    .nullish(),
});

export type IncomingScalarLabel = z.output<typeof IncomingScalarLabelSchema>;

export const IncomingTableLabelSchema = z.object({
  Label: z.object({
    IsPrediction: z.boolean().nullish(),
    Value: z
      .array(
        z.object({
          Label: z.object({
            IsPrediction: z.boolean().nullish(),
            Value: z.record(z.unknown()).nullish(),
          }),
        })
      )
      .nullish()
      .transform((v) => v ?? []),
  }),
});

export type IncomingTableLabel = z.output<typeof IncomingTableLabelSchema>;
