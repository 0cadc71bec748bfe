import { config } from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../types/errors';

config();

/**
 * Pipeline knobs consumed by the orchestrator and stage executor.
 */
export const pipelineConfigSchema = z.object({
    maxConcurrent: z.number().int("Worker pool size must be an integer").min(1, "Worker pool size must be at least 1"),
    retryAttempts: z.number().int("Retry attempts must be an integer").min(0, "Retry attempts cannot be negative"),
    timeoutMs: z.number().positive("Per-call timeout must be positive"),
    retryBaseDelayMs: z.number().min(0),
    retryMaxDelayMs: z.number().min(0),
    backoffMultiplier: z.number().min(1)
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;

const envSchema = z.object({
    INFERENCE_BASE_URL: z.string().url().default('http://localhost:11434/v1'),
    INFERENCE_API_KEY: z.string().min(1).default('ollama'),
    INFERENCE_MODEL: z.string().min(1).default('llama3.1:8b'),
    INFERENCE_TIMEOUT_MS: z.coerce.number().default(30000),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
    LLM_MAX_TOKENS: z.coerce.number().int().positive().default(2000),
    MAX_CONCURRENT: z.coerce.number().default(3),
    RETRY_ATTEMPTS: z.coerce.number().default(2),
    RETRY_BASE_DELAY_MS: z.coerce.number().default(1000),
    RETRY_MAX_DELAY_MS: z.coerce.number().default(10000),
    RETRY_BACKOFF_MULTIPLIER: z.coerce.number().default(2),
    PORT: z.coerce.number().int().positive().default(3000),
    STORAGE_DIR: z.string().min(1).default('./storage'),
    REPORT_DIR: z.string().min(1).optional(),
    MAX_RETAINED_BATCHES: z.coerce.number().int().min(1).default(100)
});

export interface InferenceSettings {
    baseUrl: string;
    apiKey: string;
    model: string;
    temperature: number;
    maxTokens: number;
}

export interface Settings {
    inference: InferenceSettings;
    pipeline: PipelineConfig;
    port: number;
    storageDir: string;
    reportDir?: string;
    maxRetainedBatches: number;
}

function describeIssues(error: z.ZodError): string {
    return error.errors
        .map(issue => `${issue.path.join('.') || 'value'}: ${issue.message}`)
        .join('; ');
}

/**
 * Validate pipeline knobs before a batch is scheduled.
 */
export function validatePipelineConfig(candidate: PipelineConfig): PipelineConfig {
    const parsed = pipelineConfigSchema.safeParse(candidate);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid pipeline configuration: ${describeIssues(parsed.error)}`, {
            issues: parsed.error.errors
        });
    }
    return parsed.data;
}

/**
 * Read settings from the environment. Called once at start-up; no hot-reload.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid environment: ${describeIssues(parsed.error)}`, {
            issues: parsed.error.errors
        });
    }

    const values = parsed.data;
    return {
        inference: {
            baseUrl: values.INFERENCE_BASE_URL,
            apiKey: values.INFERENCE_API_KEY,
            model: values.INFERENCE_MODEL,
            temperature: values.LLM_TEMPERATURE,
            maxTokens: values.LLM_MAX_TOKENS
        },
        pipeline: validatePipelineConfig({
            maxConcurrent: values.MAX_CONCURRENT,
            retryAttempts: values.RETRY_ATTEMPTS,
            timeoutMs: values.INFERENCE_TIMEOUT_MS,
            retryBaseDelayMs: values.RETRY_BASE_DELAY_MS,
            retryMaxDelayMs: values.RETRY_MAX_DELAY_MS,
            backoffMultiplier: values.RETRY_BACKOFF_MULTIPLIER
        }),
        port: values.PORT,
        storageDir: values.STORAGE_DIR,
        reportDir: values.REPORT_DIR,
        maxRetainedBatches: values.MAX_RETAINED_BATCHES
    };
}

let settings: Settings | null = null;

export function getSettings(): Settings {
    if (!settings) {
        settings = loadSettings();
    }
    return settings;
}
