import OpenAI, { APIConnectionError, APIConnectionTimeoutError, APIError } from 'openai';
import { logger, ILogger } from '../config/logger';
import { getSettings, InferenceSettings } from '../config/settings';
import {
    PROMPT_TEMPLATES,
    PromptTemplate,
    PromptTemplateId,
    TemplateInputs,
    TemplateOutput
} from '../prompts/templates';
import { ModelFailure, Result, fail, ok } from '../types/errors';
import { parseModelResponse } from '../utils/response-parser';

export interface CompletionRequest {
    model: string;
    system: string;
    prompt: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
}

/**
 * Wire-level access to the inference service. Kept narrow so tests can
 * substitute an in-process fake for the OpenAI SDK.
 */
export interface IInferenceTransport {
    complete(request: CompletionRequest): Promise<string | null>;
    listModels(timeoutMs: number): Promise<string[]>;
}

export interface IModelClient {
    readonly model: string;
    invoke<K extends PromptTemplateId>(
        template: K,
        inputs: TemplateInputs<K>,
        timeoutMs: number
    ): Promise<Result<TemplateOutput<K>, ModelFailure>>;
    checkAvailability(timeoutMs: number): Promise<Result<void, ModelFailure>>;
}

type TemplateRegistry = { [K in PromptTemplateId]: PromptTemplate<K> };

/**
 * Transport over the OpenAI SDK pointed at an OpenAI-compatible server
 * (Ollama serves one under /v1). SDK retries are off: retry policy lives in
 * the stage executor.
 */
export function createOpenAITransport(client: OpenAI): IInferenceTransport {
    return {
        async complete(request: CompletionRequest): Promise<string | null> {
            const response = await client.chat.completions.create({
                model: request.model,
                messages: [
                    { role: 'system', content: request.system },
                    { role: 'user', content: request.prompt }
                ],
                temperature: request.temperature,
                max_tokens: request.maxTokens,
                response_format: { type: 'json_object' },
                stream: false
            }, {
                timeout: request.timeoutMs,
                maxRetries: 0
            });

            return response.choices[0]?.message?.content ?? null;
        },

        async listModels(timeoutMs: number): Promise<string[]> {
            const ids: string[] = [];
            for await (const model of client.models.list({ timeout: timeoutMs, maxRetries: 0 })) {
                ids.push(model.id);
            }
            return ids;
        }
    };
}

const UNREACHABLE_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN', 'EHOSTUNREACH', 'EPIPE']);

function errorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

/**
 * Map whatever the transport threw onto the model failure taxonomy.
 */
export function classifyTransportError(error: unknown): ModelFailure {
    const message = error instanceof Error ? error.message : String(error);

    // Timeout first: the SDK's timeout error is a connection error subclass
    if (error instanceof APIConnectionTimeoutError) {
        return { kind: 'Timeout', message };
    }
    if (error instanceof APIConnectionError) {
        return { kind: 'Unreachable', message };
    }
    if (error instanceof APIError) {
        const status = error.status;
        if (status === 408) {
            return { kind: 'Timeout', message };
        }
        if (status === undefined || status === 429 || status >= 500) {
            return { kind: 'Unreachable', message };
        }
        return { kind: 'InvalidResponse', message };
    }

    const code = errorCode(error);
    if (code === 'ETIMEDOUT' || (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError'))) {
        return { kind: 'Timeout', message };
    }
    if (code && UNREACHABLE_CODES.has(code)) {
        return { kind: 'Unreachable', message };
    }
    if (message.toLowerCase().includes('timeout') || message.toLowerCase().includes('timed out')) {
        return { kind: 'Timeout', message };
    }

    return { kind: 'Unreachable', message };
}

/**
 * Model Client
 *
 * Sends one prompt-template request to the inference service and returns
 * a schema-validated value or a typed failure. Performs no retries and
 * keeps no per-candidate state between calls.
 */
export class ModelClientService implements IModelClient {
    constructor(
        private transport: IInferenceTransport,
        private logger: ILogger,
        readonly model: string,
        private temperature: number = 0.1,
        private maxTokens: number = 2000,
        private templates: TemplateRegistry = PROMPT_TEMPLATES
    ) { }

    /**
     * Factory method for production use
     */
    static create(settings: InferenceSettings = getSettings().inference): ModelClientService {
        const client = new OpenAI({
            apiKey: settings.apiKey,
            baseURL: settings.baseUrl
        });

        return new ModelClientService(
            createOpenAITransport(client),
            logger,
            settings.model,
            settings.temperature,
            settings.maxTokens
        );
    }

    async invoke<K extends PromptTemplateId>(
        templateId: K,
        inputs: TemplateInputs<K>,
        timeoutMs: number
    ): Promise<Result<TemplateOutput<K>, ModelFailure>> {
        const template: PromptTemplate<K> = this.templates[templateId];

        this.logger.debug({
            template: templateId,
            model: this.model,
            timeoutMs
        }, 'Sending inference request');

        let content: string | null;
        try {
            content = await this.transport.complete({
                model: this.model,
                system: template.system,
                prompt: template.render(inputs),
                temperature: this.temperature,
                maxTokens: this.maxTokens,
                timeoutMs
            });
        } catch (error) {
            const failure = classifyTransportError(error);
            this.logger.warn({
                template: templateId,
                kind: failure.kind,
                error: failure.message
            }, 'Inference request failed');
            return { ok: false, error: failure };
        }

        const parsed = parseModelResponse(content, template.schema);
        if (!parsed.ok) {
            this.logger.warn({
                template: templateId,
                kind: parsed.error.kind,
                error: parsed.error.message,
                contentLength: content?.length ?? 0
            }, 'Inference response rejected');
            return parsed;
        }

        this.logger.debug({
            template: templateId,
            contentLength: content?.length ?? 0
        }, 'Inference response validated');

        return parsed;
    }

    /**
     * Confirm the endpoint answers and offers the configured model.
     */
    async checkAvailability(timeoutMs: number): Promise<Result<void, ModelFailure>> {
        let models: string[];
        try {
            models = await this.transport.listModels(timeoutMs);
        } catch (error) {
            const failure = classifyTransportError(error);
            this.logger.error({
                model: this.model,
                kind: failure.kind,
                error: failure.message
            }, 'Inference service availability check failed');
            return { ok: false, error: { kind: 'Unreachable', message: failure.message } };
        }

        const wanted = this.model.includes(':') ? [this.model] : [this.model, `${this.model}:latest`];
        if (!models.some(id => wanted.includes(id))) {
            this.logger.error({
                model: this.model,
                available: models
            }, 'Configured model is not offered by the inference service');
            return fail('InvalidResponse', `Model ${this.model} is not available; offered: ${models.join(', ') || 'none'}`);
        }

        this.logger.info({ model: this.model }, 'Inference service reachable and model available');
        return ok(undefined);
    }
}

// Singleton instance
let modelClient: ModelClientService | null = null;

export function getModelClient(): ModelClientService {
    if (!modelClient) {
        modelClient = ModelClientService.create();
    }
    return modelClient;
}
