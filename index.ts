import 'dotenv/config';

import express, { Express } from 'express';
import { config, validateConfig } from './config';
import logger from './utils/logger';
import { extractErrorMessage } from './utils/errorHandler';
import dateRoutes from './routes/dateRoutes';
import { apiLimiter } from './middleware/rateLimiter';

export { parseDateTime, tryParseDateTime, describeParse, DateParseError } from './services/dateParsingService';
export { DateFormatter } from './utils/dateFormatter';
export { toLatin, toLatinString } from './utils/transliteration';

/**
 * Build the Express application without binding a port
 */
export function createApp(): Express {
    const app = express();

    if (config.server.trustProxy) {
        app.enable('trust proxy');
    }
    app.use(express.json({ limit: config.limits.jsonBodySize }));

    app.use('/api', apiLimiter);
    app.use('/api', dateRoutes);

    return app;
}

function startServer(): void {
    try {
        validateConfig();
        logger.info('✅ Configuration validated successfully', { environment: config.env });
    } catch (error: unknown) {
        logger.error('❌ Configuration validation failed', { error: extractErrorMessage(error) });
        process.exit(1);
    }

    const app = createApp();

    const server = app.listen(config.server.port, config.server.host, () => {
        logger.info('🚀 Server running', {
            port: config.server.port,
            host: config.server.host,
            environment: config.env
        });
        logger.info('📋 Available endpoints', {
            endpoints: [
                'POST /api/parse-date - Parse a date/time phrase into an ISO timestamp',
                'POST /api/format-date - Render a timestamp in natural language',
                'GET /api/health - Liveness check'
            ]
        });
    });

    const shutdown = (signal: string) => {
        logger.info(`🛑 ${signal} received, closing server`);
        server.close(() => process.exit(0));
    };
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
}

if (require.main === module) {
    startServer();
}
