import express, { Application, Request, Response } from "express";
import { createBatchRoutes, BatchRouteDependencies, MAX_RESUMES_PER_BATCH } from "./routes/batches";
import { errorHandler, notFound } from "./middleware/error-handler";
import { SUPPORTED_EXTENSIONS } from "./services/document-extractor.service";

export function createApp(dependencies: BatchRouteDependencies): Application {
    const app = express();

    // Middleware
    app.use(express.json());
    app.use(express.urlencoded({ extended: true }));

    // Routes
    app.use("/batches", createBatchRoutes(dependencies));

    // Health check
    app.get("/health", (req: Request, res: Response) => {
        res.json({ status: "ok", timestamp: new Date().toISOString() });
    });

    // Root route
    app.get("/", (req: Request, res: Response) => {
        res.json({
            message: "Resume Screening Orchestrator API",
            version: "1.0.0",
            description: "Ranks a batch of resumes against a job description with a local inference service",
            endpoints: {
                "Screening": {
                    "POST /batches": `Upload up to ${MAX_RESUMES_PER_BATCH} resumes and a job description`,
                    "GET /batches/:id": "Batch status and per-candidate states",
                    "GET /batches/:id/report": "Ranked report",
                    "GET /batches/:id/events": "Progress stream (Server-Sent Events)",
                    "POST /batches/:id/cancel": "Cancel a running batch"
                },
                "System": {
                    "GET /health": "Health check",
                    "GET /": "API information"
                }
            },
            supportedFormats: SUPPORTED_EXTENSIONS
        });
    });

    app.use(notFound);
    app.use(errorHandler);

    return app;
}
