import { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { logger, errorFields } from '../config/logger';
import { ConfigurationError } from '../types/errors';

export const notFound = (req: Request, res: Response) => {
    res.status(404).json({ error: 'Route not found' });
};

export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof multer.MulterError) {
        return res.status(400).json({ error: 'Upload rejected', message: err.message, field: err.field ?? null });
    }

    if (err instanceof ConfigurationError) {
        return res.status(503).json({ error: 'Inference service unavailable', message: err.message });
    }

    logger.error({ path: req.path, method: req.method, ...errorFields(err) }, 'Unhandled request error');
    res.status(500).json({
        error: 'Internal server error',
        message: err instanceof Error ? err.message : 'Unknown error'
    });
};
