import { describe, it, expect, beforeEach, vi } from 'vitest';
import { APIConnectionError, APIConnectionTimeoutError, APIError } from 'openai';
import { ModelClientService, classifyTransportError } from '../../../src/services/model-client.service';
import { createMockLogger } from '../../helpers/logger-mock';
import { FakeInferenceTransport, profileJson, questionsJson, scoreJson } from '../../helpers/fakes';

// Mock the logger
vi.mock('../../../src/config/logger', () => import('../../helpers/logger-mock'));

describe('ModelClientService', () => {
    let mockLogger: ReturnType<typeof createMockLogger>;

    beforeEach(() => {
        vi.clearAllMocks();
        mockLogger = createMockLogger();
    });

    describe('invoke', () => {
        it('should render the template and return the validated profile', async () => {
            const transport = new FakeInferenceTransport(() => profileJson('Ada'));
            const client = new ModelClientService(transport, mockLogger, 'test-model', 0.2, 512);

            const result = await client.invoke('profile-extraction', { candidateText: 'Ada Lovelace, engineer' }, 1500);

            expect(result.ok).toBe(true);
            if (result.ok) {
                expect(result.value.name).toBe('Ada');
                expect(result.value.skills).toEqual(['TypeScript', 'Node.js']);
            }

            expect(transport.calls).toHaveLength(1);
            const { request } = transport.calls[0];
            expect(request.model).toBe('test-model');
            expect(request.temperature).toBe(0.2);
            expect(request.maxTokens).toBe(512);
            expect(request.timeoutMs).toBe(1500);
            expect(request.prompt).toContain('Ada Lovelace, engineer');
        });

        it('should include the job description and profile in scoring prompts', async () => {
            const transport = new FakeInferenceTransport(() => scoreJson(88, 'hire'));
            const client = new ModelClientService(transport, mockLogger, 'test-model');

            const result = await client.invoke('scoring', {
                jobDescription: 'Senior backend engineer',
                candidateProfile: '{"name": "Ada"}'
            }, 1000);

            expect(result).toEqual({
                ok: true,
                value: {
                    score: 88,
                    recommendation: 'hire',
                    reasoning: 'Scored 88',
                    strengths: ['APIs'],
                    concerns: ['Limited leadership']
                }
            });
            expect(transport.calls[0].request.prompt).toContain('Senior backend engineer');
            expect(transport.calls[0].request.prompt).toContain('{"name": "Ada"}');
        });

        it('should return six questions for question generation', async () => {
            const transport = new FakeInferenceTransport(() => questionsJson());
            const client = new ModelClientService(transport, mockLogger, 'test-model');

            const result = await client.invoke('question-generation', { jobDescription: 'Platform engineer' }, 1000);

            expect(result.ok).toBe(true);
            if (result.ok) {
                expect(result.value).toHaveLength(6);
                expect(result.value[0]).toEqual({ level: 'Easy', text: 'What is a closure?', type: 'technical' });
            }
        });

        it('should report an out-of-range score as InvalidResponse', async () => {
            const transport = new FakeInferenceTransport(() => scoreJson(140));
            const client = new ModelClientService(transport, mockLogger, 'test-model');

            const result = await client.invoke('scoring', { jobDescription: 'JD', candidateProfile: 'CV' }, 1000);

            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.kind).toBe('InvalidResponse');
            }
            expect(mockLogger.warn).toHaveBeenCalledWith(
                expect.objectContaining({ template: 'scoring', kind: 'InvalidResponse' }),
                'Inference response rejected'
            );
        });

        it('should report a null completion as InvalidResponse', async () => {
            const transport = new FakeInferenceTransport(() => profileJson('Ada'));
            vi.spyOn(transport, 'complete').mockResolvedValue(null);
            const client = new ModelClientService(transport, mockLogger, 'test-model');

            const result = await client.invoke('profile-extraction', { candidateText: 'text' }, 1000);

            expect(result).toEqual({
                ok: false,
                error: { kind: 'InvalidResponse', message: 'Empty response from inference service' }
            });
        });

        it('should classify transport errors without throwing', async () => {
            const transport = new FakeInferenceTransport(() => {
                throw new APIConnectionTimeoutError();
            });
            const client = new ModelClientService(transport, mockLogger, 'test-model');

            const result = await client.invoke('profile-extraction', { candidateText: 'text' }, 10);

            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error.kind).toBe('Timeout');
            }
            expect(mockLogger.warn).toHaveBeenCalledWith(
                expect.objectContaining({ template: 'profile-extraction', kind: 'Timeout' }),
                'Inference request failed'
            );
        });
    });

    describe('checkAvailability', () => {
        it('should succeed when the model is offered', async () => {
            const transport = new FakeInferenceTransport(() => '{}');
            const client = new ModelClientService(transport, mockLogger, 'test-model');

            expect(await client.checkAvailability(1000)).toEqual({ ok: true, value: undefined });
        });

        it('should accept the :latest tag for an untagged model name', async () => {
            const transport = new FakeInferenceTransport(() => '{}');
            transport.models = ['llama3.1:latest'];
            const client = new ModelClientService(transport, mockLogger, 'llama3.1');

            expect((await client.checkAvailability(1000)).ok).toBe(true);
        });

        it('should fail when the model is missing', async () => {
            const transport = new FakeInferenceTransport(() => '{}');
            transport.models = ['mistral:latest', 'phi3:mini'];
            const client = new ModelClientService(transport, mockLogger, 'test-model');

            expect(await client.checkAvailability(1000)).toEqual({
                ok: false,
                error: {
                    kind: 'InvalidResponse',
                    message: 'Model test-model is not available; offered: mistral:latest, phi3:mini'
                }
            });
        });

        it('should report Unreachable when models cannot be listed', async () => {
            const transport = new FakeInferenceTransport(() => '{}');
            vi.spyOn(transport, 'listModels').mockRejectedValue(new APIConnectionError({ message: 'Connection error.' }));
            const client = new ModelClientService(transport, mockLogger, 'test-model');

            expect(await client.checkAvailability(1000)).toEqual({
                ok: false,
                error: { kind: 'Unreachable', message: 'Connection error.' }
            });
        });
    });
});

describe('classifyTransportError', () => {
    it('should map SDK connection errors', () => {
        expect(classifyTransportError(new APIConnectionTimeoutError()).kind).toBe('Timeout');
        expect(classifyTransportError(new APIConnectionError({ message: 'Connection error.' })).kind).toBe('Unreachable');
    });

    it('should map HTTP statuses', () => {
        expect(classifyTransportError(new APIError(503, undefined, 'Service Unavailable', undefined)).kind).toBe('Unreachable');
        expect(classifyTransportError(new APIError(429, undefined, 'Too Many Requests', undefined)).kind).toBe('Unreachable');
        expect(classifyTransportError(new APIError(408, undefined, 'Request Timeout', undefined)).kind).toBe('Timeout');
        expect(classifyTransportError(new APIError(400, undefined, 'Bad Request', undefined)).kind).toBe('InvalidResponse');
    });

    it('should map socket error codes and timeout messages', () => {
        const refused = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:11434'), { code: 'ECONNREFUSED' });
        const timedOut = Object.assign(new Error('socket hang'), { code: 'ETIMEDOUT' });

        expect(classifyTransportError(refused)).toEqual({
            kind: 'Unreachable',
            message: 'connect ECONNREFUSED 127.0.0.1:11434'
        });
        expect(classifyTransportError(timedOut).kind).toBe('Timeout');
        expect(classifyTransportError(new Error('Request timed out')).kind).toBe('Timeout');
        expect(classifyTransportError('boom')).toEqual({ kind: 'Unreachable', message: 'boom' });
    });
});
