import { describe, it, expect } from 'vitest';
import { loadSettings, validatePipelineConfig } from '../../../src/config/settings';
import { ConfigurationError } from '../../../src/types/errors';
import { testConfig } from '../../helpers/fakes';

describe('settings', () => {
    describe('loadSettings', () => {
        it('should apply defaults for a bare environment', () => {
            const settings = loadSettings({});

            expect(settings).toEqual({
                inference: {
                    baseUrl: 'http://localhost:11434/v1',
                    apiKey: 'ollama',
                    model: 'llama3.1:8b',
                    temperature: 0.1,
                    maxTokens: 2000
                },
                pipeline: {
                    maxConcurrent: 3,
                    retryAttempts: 2,
                    timeoutMs: 30000,
                    retryBaseDelayMs: 1000,
                    retryMaxDelayMs: 10000,
                    backoffMultiplier: 2
                },
                port: 3000,
                storageDir: './storage',
                reportDir: undefined,
                maxRetainedBatches: 100
            });
        });

        it('should read values from the environment', () => {
            const settings = loadSettings({
                INFERENCE_BASE_URL: 'http://inference.internal:8080/v1',
                INFERENCE_MODEL: 'qwen2.5:7b',
                MAX_CONCURRENT: '6',
                RETRY_ATTEMPTS: '0',
                INFERENCE_TIMEOUT_MS: '5000',
                REPORT_DIR: './reports',
                MAX_RETAINED_BATCHES: '5'
            });

            expect(settings.inference.baseUrl).toBe('http://inference.internal:8080/v1');
            expect(settings.inference.model).toBe('qwen2.5:7b');
            expect(settings.pipeline).toMatchObject({ maxConcurrent: 6, retryAttempts: 0, timeoutMs: 5000 });
            expect(settings.reportDir).toBe('./reports');
            expect(settings.maxRetainedBatches).toBe(5);
        });

        it('should reject a pool size below one', () => {
            expect(() => loadSettings({ MAX_CONCURRENT: '0' })).toThrow(ConfigurationError);
            expect(() => loadSettings({ MAX_CONCURRENT: '0' })).toThrow(
                'Invalid pipeline configuration: maxConcurrent: Worker pool size must be at least 1'
            );
        });

        it('should reject a malformed base URL', () => {
            expect(() => loadSettings({ INFERENCE_BASE_URL: 'not a url' })).toThrow(/^Invalid environment: INFERENCE_BASE_URL/);
        });

        it('should reject non-numeric knobs', () => {
            expect(() => loadSettings({ RETRY_ATTEMPTS: 'twice' })).toThrow(ConfigurationError);
        });
    });

    describe('validatePipelineConfig', () => {
        it('should accept a valid configuration', () => {
            expect(validatePipelineConfig(testConfig())).toEqual(testConfig());
        });

        it('should reject negative retries and non-positive timeouts', () => {
            expect(() => validatePipelineConfig(testConfig({ retryAttempts: -1 }))).toThrow(
                'Invalid pipeline configuration: retryAttempts: Retry attempts cannot be negative'
            );
            expect(() => validatePipelineConfig(testConfig({ timeoutMs: 0 }))).toThrow(
                'Invalid pipeline configuration: timeoutMs: Per-call timeout must be positive'
            );
        });

        it('should carry the issues on the error', () => {
            try {
                validatePipelineConfig(testConfig({ maxConcurrent: 1.5 }));
                expect.unreachable('validation should have thrown');
            } catch (error) {
                expect(error).toBeInstanceOf(ConfigurationError);
                if (error instanceof ConfigurationError) {
                    expect(error.message).toBe('Invalid pipeline configuration: maxConcurrent: Worker pool size must be an integer');
                    expect(error.details).toHaveProperty('issues');
                }
            }
        });
    });
});
