import express, { Request, Response } from 'express';
import { DateTime } from 'luxon';
import { z } from 'zod';
import { FormatDateSchema, ParseDateSchema } from '../schemas/dateSchemas';
import { describeParse, isDateParseError } from '../services/dateParsingService';
import { DateFormatter } from '../utils/dateFormatter';
import { serializeError } from '../utils/errorHandler';
import logger from '../utils/logger';

const router = express.Router();

function sendValidationError(res: Response, error: z.ZodError): void {
    res.status(400).json({
        status: 'error',
        error: {
            message: 'Validation failed',
            details: error.format(),
            code: 'VALIDATION_ERROR'
        }
    });
}

function sendInternalError(res: Response, context: string, error: unknown): void {
    logger.error(`❌ Error ${context}:`, { error: serializeError(error) });
    res.status(500).json({
        status: 'error',
        error: { message: 'Internal server error', code: 'INTERNAL_ERROR' }
    });
}

export function parseDateHandler(req: Request, res: Response): void {
    const validationResult = ParseDateSchema.safeParse(req.body);
    if (!validationResult.success) {
        sendValidationError(res, validationResult.error);
        return;
    }

    const { text, now, displayOffsetHours } = validationResult.data;
    const reference = now ? new Date(now) : new Date();

    try {
        const outcome = describeParse(text, reference);
        res.json({
            status: 'success',
            iso: DateFormatter.toCanonical(outcome.result),
            fields: outcome.fields,
            offsetHours: outcome.result.offset / 60,
            translated: outcome.translated,
            matchedRules: outcome.matchedRules,
            fastPath: outcome.fastPath,
            natural: DateFormatter.toNatural(outcome.result, {
                offsetHours: displayOffsetHours ?? 0,
                now: reference
            })
        });
    } catch (error: unknown) {
        if (isDateParseError(error)) {
            logger.warn(`⚠️ Could not parse date phrase: ${error.message}`, {
                code: error.code,
                field: error.field
            });
            res.status(400).json({
                status: 'error',
                error: { message: error.message, code: error.code, field: error.field }
            });
            return;
        }
        sendInternalError(res, 'parsing date phrase', error);
    }
}

export function formatDateHandler(req: Request, res: Response): void {
    const validationResult = FormatDateSchema.safeParse(req.body);
    if (!validationResult.success) {
        sendValidationError(res, validationResult.error);
        return;
    }

    const { timestamp, offsetHours, includeTime, now } = validationResult.data;

    try {
        const natural = DateFormatter.toNatural(DateTime.fromISO(timestamp, { setZone: true }), {
            offsetHours,
            includeTime,
            now: now ? new Date(now) : undefined
        });
        res.json({ status: 'success', natural });
    } catch (error: unknown) {
        sendInternalError(res, 'formatting timestamp', error);
    }
}

router.post('/parse-date', parseDateHandler);
router.post('/format-date', formatDateHandler);

router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
});

export default router;
