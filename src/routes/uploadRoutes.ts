// src/routes/uploadRoutes.ts

import express, { Router, Request, Response, NextFunction } from 'express';
import { handleAnalyzeImage, handleParseFile } from '../handlers/uploadHandlers';
import { VisionBackend } from '../services/visionClient';

export interface UploadRouteOptions {
    uploadLimit: string;
    visionBackends: VisionBackend[];  // Empty when no API key is configured
    visionTimeoutMs: number;
}

/**
 * Upload routes - raw request bodies, HTTP mapping only
 */
export function createUploadRoutes(options: UploadRouteOptions): Router {
    const router = Router();
    const rawBody = express.raw({ type: () => true, limit: options.uploadLimit });

    /**
     * Parse a roster file
     * POST /api/upload/parse-file
     * Headers: X-File-Name (optional, used for format detection)
     * Body: file bytes
     */
    router.post('/parse-file', rawBody, (req: Request, res: Response) => {
        if (!Buffer.isBuffer(req.body) || req.body.length === 0) {
            res.status(400).json({ error: 'File content is required' });
            return;
        }

        res.json(handleParseFile(req.get('X-File-Name'), req.body));
    });

    /**
     * Extract exam data from a schedule image
     * POST /api/upload/analyze-image
     * Headers: Content-Type image/png or image/jpeg
     * Body: image bytes
     */
    router.post('/analyze-image', rawBody, (req: Request, res: Response, next: NextFunction) => {
        if (!Buffer.isBuffer(req.body) || req.body.length === 0) {
            res.status(400).json({ error: 'Image content is required' });
            return;
        }

        // Stop walking backends once the client has gone away
        const controller = new AbortController();
        res.on('close', () => {
            if (!res.writableFinished) {
                controller.abort();
            }
        });

        const mimeType = (req.get('Content-Type') ?? 'image/png').split(';')[0].trim().toLowerCase();

        handleAnalyzeImage(
            { data: req.body, mimeType },
            options.visionBackends,
            { timeoutMs: options.visionTimeoutMs, signal: controller.signal }
        )
            .then(result => {
                res.json(result);
            })
            .catch(next);
    });

    return router;
}
