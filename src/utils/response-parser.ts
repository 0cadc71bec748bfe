import type { z } from 'zod';
import { ModelFailure, Result, fail, ok } from '../types/errors';

const FENCED_BODY = /^```(?:json)?\s*\n?([\s\S]*?)\n?```$/i;

/**
 * Strip one Markdown code fence wrapping the whole response, if present.
 * Prose around the JSON is left in place so that parsing rejects it.
 */
export function unwrapCodeFence(text: string): string {
    const trimmed = text.trim();
    const match = FENCED_BODY.exec(trimmed);
    return match ? match[1].trim() : trimmed;
}

function describeIssues(error: z.ZodError): string {
    return error.errors
        .slice(0, 5)
        .map(issue => `${issue.path.join('.') || 'response'}: ${issue.message}`)
        .join('; ');
}

/**
 * Parse model text as JSON, then validate it against the expected schema.
 */
export function parseModelResponse<T>(
    text: string | null | undefined,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Result<T, ModelFailure> {
    if (!text || text.trim().length === 0) {
        return fail('InvalidResponse', 'Empty response from inference service');
    }

    let payload: unknown;
    try {
        payload = JSON.parse(unwrapCodeFence(text));
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        return fail('InvalidResponse', `Response is not valid JSON: ${reason}`);
    }

    const validated = schema.safeParse(payload);
    if (!validated.success) {
        return fail('InvalidResponse', `Response does not match schema: ${describeIssues(validated.error)}`);
    }

    return ok(validated.data);
}
