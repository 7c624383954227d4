import { z } from 'zod';
import { config } from '../config';
import { CALENDAR } from '../utils/constants';

const OffsetHoursSchema = z.number().int().min(-CALENDAR.MAX_OFFSET_HOURS).max(CALENDAR.MAX_OFFSET_HOURS);

const IsoTimestampSchema = z.string().datetime({ offset: true });

export const ParseDateSchema = z.object({
  text: z.string()
    .min(1, 'Text is required')
    .max(config.limits.maxPhraseLength, `Text must be at most ${config.limits.maxPhraseLength} characters`),
  // Reference instant for relative phrases; defaults to server time
  now: IsoTimestampSchema.optional(),
  // Offset used for the "natural" rendering in the response
  displayOffsetHours: OffsetHoursSchema.optional(),
});

export const FormatDateSchema = z.object({
  timestamp: IsoTimestampSchema,
  offsetHours: OffsetHoursSchema.optional(),
  includeTime: z.boolean().optional(),
  now: IsoTimestampSchema.optional(),
});

export type ParseDateRequest = z.infer<typeof ParseDateSchema>;
export type FormatDateRequest = z.infer<typeof FormatDateSchema>;
