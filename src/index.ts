import { logger, errorFields } from "./config/logger";
import { getSettings } from "./config/settings";
import { createApp } from "./app";
import { getBatchRegistry } from "./services/batch-registry.service";
import { getDocumentExtractor } from "./services/document-extractor.service";
import { getModelClient } from "./services/model-client.service";

// Initialize services and start server
async function startServer() {
    const settings = getSettings();

    // Probe the inference service; batches re-check before they start
    const modelClient = getModelClient();
    const available = await modelClient.checkAvailability(settings.pipeline.timeoutMs);
    if (available.ok) {
        logger.info({ model: modelClient.model, baseUrl: settings.inference.baseUrl }, "Inference service connected");
    } else {
        logger.warn({
            model: modelClient.model,
            baseUrl: settings.inference.baseUrl,
            kind: available.error.kind,
            error: available.error.message
        }, "Inference service not ready; batches will be rejected until it is");
    }

    const app = createApp({
        registry: getBatchRegistry(),
        extractor: getDocumentExtractor(),
        storageDir: settings.storageDir
    });

    app.listen(settings.port, () => {
        logger.info({
            port: settings.port,
            maxConcurrent: settings.pipeline.maxConcurrent,
            retryAttempts: settings.pipeline.retryAttempts,
            timeoutMs: settings.pipeline.timeoutMs,
            reportDir: settings.reportDir ?? null
        }, `Server running at http://localhost:${settings.port}`);
    });
}

startServer().catch((error: unknown) => {
    logger.error(errorFields(error), "Failed to start server");
    process.exit(1);
});
