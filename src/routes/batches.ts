import { NextFunction, Request, Response, Router } from "express";
import multer from "multer";
import path from "path";
import fs from "fs";
import { z } from "zod";
import { logger, errorFields } from "../config/logger";
import type { DocumentHandle } from "../models/candidate-record";
import type { BatchRegistryService } from "../services/batch-registry.service";
import type { IDocumentExtractor } from "../services/document-extractor.service";
import { ConfigurationError } from "../types/errors";

export const MAX_RESUMES_PER_BATCH = 50;
const MAX_FILE_SIZE = 10 * 1024 * 1024; // 10MB

export interface BatchRouteDependencies {
    registry: BatchRegistryService;
    extractor: IDocumentExtractor;
    storageDir: string;
}

// Validation schema for the text fields of a batch request
const startBatchSchema = z.object({
    jobDescription: z.string().trim().optional()
});

type UploadedFiles = Record<string, Express.Multer.File[]>;

function uploadedFiles(req: Request): UploadedFiles {
    if (!req.files || Array.isArray(req.files)) {
        return {};
    }
    return req.files;
}

function toHandle(file: Express.Multer.File): DocumentHandle {
    return { path: file.path, name: file.originalname };
}

async function discardUploads(files: readonly Express.Multer.File[]): Promise<void> {
    for (const file of files) {
        try {
            await fs.promises.rm(file.path, { force: true });
        } catch (error) {
            logger.warn({ path: file.path, ...errorFields(error) }, 'Could not remove uploaded file');
        }
    }
}

export function createBatchRoutes({ registry, extractor, storageDir }: BatchRouteDependencies): Router {
    const router = Router();

    // Create storage directory if it doesn't exist
    if (!fs.existsSync(storageDir)) {
        fs.mkdirSync(storageDir, { recursive: true });
    }

    // Any file type is accepted; unsupported formats fail per candidate
    const storage = multer.diskStorage({
        destination: (req, file, cb) => {
            cb(null, storageDir);
        },
        filename: (req, file, cb) => {
            const uniqueSuffix = Date.now() + '-' + Math.round(Math.random() * 1E9);
            cb(null, `${file.fieldname}-${uniqueSuffix}${path.extname(file.originalname)}`);
        }
    });

    const upload = multer({
        storage,
        limits: {
            fileSize: MAX_FILE_SIZE,
            files: MAX_RESUMES_PER_BATCH + 1
        }
    });

    /**
     * POST /batches
     *
     * Start screening a set of resumes against one job description.
     *
     * Multipart: resumes (files), jobDescription (text) or jobDescriptionFile (file)
     * Returns: 202 { id, status, total }
     */
    router.post('/', upload.fields([
        { name: 'resumes', maxCount: MAX_RESUMES_PER_BATCH },
        { name: 'jobDescriptionFile', maxCount: 1 }
    ]), async (req: Request, res: Response, next: NextFunction) => {
        const files = uploadedFiles(req);
        const resumes = files.resumes ?? [];
        const jobDescriptionFiles = files.jobDescriptionFile ?? [];

        try {
            if (resumes.length === 0) {
                await discardUploads(jobDescriptionFiles);
                return res.status(400).json({ error: 'At least one resume file is required' });
            }

            const body = startBatchSchema.safeParse(req.body);
            if (!body.success) {
                await discardUploads([...resumes, ...jobDescriptionFiles]);
                return res.status(400).json({
                    error: 'Validation failed',
                    details: body.error.errors
                });
            }

            let jobDescription = body.data.jobDescription ?? '';
            const jobDescriptionFile = jobDescriptionFiles[0];

            if (!jobDescription && jobDescriptionFile) {
                const extracted = await extractor.extract(toHandle(jobDescriptionFile));
                if (!extracted.ok) {
                    await discardUploads([...resumes, ...jobDescriptionFiles]);
                    return res.status(400).json({
                        error: 'Job description could not be read',
                        kind: extracted.error.kind,
                        message: extracted.error.message
                    });
                }
                jobDescription = extracted.value.trim();
            }
            await discardUploads(jobDescriptionFiles);

            if (!jobDescription) {
                await discardUploads(resumes);
                return res.status(400).json({ error: 'A job description is required' });
            }

            const summary = await registry.start(jobDescription, resumes.map(toHandle), {
                uploads: resumes.map(file => file.path)
            });

            logger.info({
                batchId: summary.id,
                resumes: resumes.length,
                jobDescriptionLength: jobDescription.length
            }, 'Screening batch accepted');

            res.status(202).json({
                id: summary.id,
                status: summary.status,
                total: summary.counts.total
            });

        } catch (error) {
            await discardUploads([...resumes, ...jobDescriptionFiles]);
            if (error instanceof ConfigurationError) {
                logger.error({ error: error.message }, 'Batch rejected at pre-flight');
                return res.status(503).json({
                    error: 'Inference service unavailable',
                    message: error.message
                });
            }
            next(error);
        }
    });

    /**
     * GET /batches/:id
     *
     * Status, counters and per-candidate states; includes the report once finished.
     */
    router.get('/:id', (req: Request, res: Response) => {
        const summary = registry.get(req.params.id);
        if (!summary) {
            return res.status(404).json({ error: 'Batch not found' });
        }
        res.json(summary);
    });

    /**
     * GET /batches/:id/report
     *
     * The ranked report, served as-is for downstream tooling.
     */
    router.get('/:id/report', (req: Request, res: Response) => {
        const summary = registry.get(req.params.id);
        if (!summary) {
            return res.status(404).json({ error: 'Batch not found' });
        }
        if (!summary.report) {
            return res.status(409).json({ error: 'Batch is still running', status: summary.status });
        }
        res.json(summary.report);
    });

    /**
     * GET /batches/:id/events
     *
     * Server-Sent Events: one `progress` event per candidate transition,
     * then a final `report` event before the stream closes.
     */
    router.get('/:id/events', (req: Request, res: Response) => {
        if (!registry.get(req.params.id)) {
            return res.status(404).json({ error: 'Batch not found' });
        }

        res.setHeader('Content-Type', 'text/event-stream');
        res.setHeader('Cache-Control', 'no-cache, no-transform');
        res.setHeader('Connection', 'keep-alive');
        res.setHeader('X-Accel-Buffering', 'no');
        res.flushHeaders();

        const send = (event: string, data: unknown) => {
            res.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
        };

        const unsubscribe = registry.subscribe(
            req.params.id,
            event => send('progress', event),
            summary => {
                send('report', summary.report ?? { error: summary.error, status: summary.status });
                res.end();
            }
        );

        req.on('close', () => {
            unsubscribe?.();
        });
    });

    /**
     * POST /batches/:id/cancel
     *
     * Stop dispatching new stages; in-flight calls finish and a partial report is produced.
     */
    router.post('/:id/cancel', (req: Request, res: Response) => {
        const summary = registry.cancel(req.params.id);
        if (!summary) {
            return res.status(404).json({ error: 'Batch not found' });
        }

        logger.info({ batchId: summary.id }, 'Batch cancellation requested');

        res.status(202).json({
            id: summary.id,
            status: summary.status,
            cancelRequested: true
        });
    });

    return router;
}
