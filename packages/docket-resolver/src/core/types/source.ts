/**
 * Source table row types
 *
 * Shapes of the rows read from the board database after validation and
 * coercion. Column names are kept as they appear in the source schema.
 */

import type { z } from 'zod';
import type {
  adjacentRowSchema,
  boardDataRowSchema,
  boardDocumentRowSchema,
  fieldRowSchema,
  ownerRowSchema,
  platRowSchema,
  surveyRowSchema,
  wellInfoRowSchema,
} from '../../persistence/schemas.js';

export type WellInfoRow = z.infer<typeof wellInfoRowSchema>;
export type SurveyRow = z.infer<typeof surveyRowSchema>;
export type BoardDataRow = z.infer<typeof boardDataRowSchema>;
export type BoardDocumentRow = z.infer<typeof boardDocumentRowSchema>;
export type PlatRow = z.infer<typeof platRowSchema>;
export type AdjacentRow = z.infer<typeof adjacentRowSchema>;
export type FieldRow = z.infer<typeof fieldRowSchema>;
export type OwnerRow = z.infer<typeof ownerRowSchema>;

/**
 * Every table the resolvers read, materialised in memory.
 */
export interface SourceTables {
  readonly wellInfo: readonly WellInfoRow[];
  readonly surveys: readonly SurveyRow[];
  readonly boardData: readonly BoardDataRow[];
  readonly boardDocuments: readonly BoardDocumentRow[];
  readonly plats: readonly PlatRow[];
  readonly adjacent: readonly AdjacentRow[];
  readonly fields: readonly FieldRow[];
  readonly owners: readonly OwnerRow[];
}
