/**
 * Car rental request extraction
 */

import { z } from 'zod/v4';
import type { GenerationClient } from '../../core/models/index.js';
import { extractStructured, type ExtractionResult } from './structured.js';

export const CAR_TYPES = ['A', 'B', 'C', 'D'] as const;

export const RentalRequestSchema = z.object({
  car_type: z.enum(CAR_TYPES),
  first_rent_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date in YYYY-MM-DD format'),
  customer_request: z.string().nullable(),
});

export type RentalRequest = z.infer<typeof RentalRequestSchema>;

export const RENTAL_SYSTEM_PROMPT = `Transform the customer's text into a JSON object with the following keys:
- car_type: one of "A", "B", "C", "D"
- first_rent_date: the first rental date in format YYYY-MM-DD
- customer_request: any additional customer request, or null if none was given
The JSON must be valid and use exactly these keys.`;

export const DEFAULT_RENTAL_TEXT = 'hi, i need a type B car from 2/2/25.  child seat if possible, and gps.';

export function parseRentalRequest(client: GenerationClient, text: string, model?: string): Promise<ExtractionResult<RentalRequest>> {
  return extractStructured(client, {
    system: RENTAL_SYSTEM_PROMPT,
    user: text,
    schema: RentalRequestSchema,
    model,
    temperature: 0.7,
    maxTokens: 100,
  });
}
