// src/app.ts

import express from 'express';
import { AppConfig, loadConfig } from './config';
import { AllocationEngine } from './engine/allocationEngine';
import { log, logError } from './logging';
import { createScheduleRoutes } from './routes/scheduleRoutes';
import { createUploadRoutes } from './routes/uploadRoutes';
import { createGroqBackends } from './services/visionClient';

/**
 * Express application setup
 *
 * No state is kept between requests: every allocation is computed from
 * the request body alone.
 * - allocationEngine: stateless, shared capacity profile from config
 * - visionBackends: one per configured model, none without an API key
 */
export function createApp(config: AppConfig): express.Express {
    const app = express();

    const allocationEngine = new AllocationEngine(config.capacity);
    const visionBackends = config.groqApiKey
        ? createGroqBackends(config.groqApiKey, config.visionModels)
        : [];

    // Middleware
    app.use('/api/schedule', express.json({ limit: config.uploadLimit }));

    // Routes
    app.use('/api/schedule', createScheduleRoutes(allocationEngine));
    app.use('/api/upload', createUploadRoutes({
        uploadLimit: config.uploadLimit,
        visionBackends,
        visionTimeoutMs: config.visionTimeoutMs
    }));

    // Health check
    app.get('/api/health', (_req, res) => {
        res.json({ status: 'healthy', service: 'exam-scheduler' });
    });

    // Error handling - body parser errors carry their own 4xx status
    app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
        const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
        logError('Request failed', err);
        res.status(status).json({ error: err.message });
    });

    return app;
}

// Start server
if (require.main === module) {
    const config = loadConfig();
    createApp(config).listen(config.port, () => {
        log(`Exam scheduler running on port ${config.port}`);
        if (!config.groqApiKey) {
            log('GROQ_API_KEY not set; image analysis is disabled');
        }
    });
}
