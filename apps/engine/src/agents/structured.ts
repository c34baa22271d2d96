/**
 * Structured LLM output helpers
 */

import { z } from 'zod';
import { MalformedUpstreamResponseError, StageError, toStageError } from '../errors';
import { LlmGateway } from '../providers/ai';
import { err, ok, Result } from '../pipeline/result';

/**
 * Extract and validate the JSON object embedded in a completion.
 * Handles markdown code fences and surrounding prose.
 */
export function parseStructured<T>(
    service: string,
    response: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T {
    const jsonMatch = response.match(/\{[\s\S]*\}/);
    if (!jsonMatch) {
        throw new MalformedUpstreamResponseError(service, 'no JSON object found');
    }

    let json: unknown;
    try {
        json = JSON.parse(jsonMatch[0]);
    } catch (error) {
        throw new MalformedUpstreamResponseError(
            service,
            error instanceof Error ? error.message : 'invalid JSON'
        );
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new MalformedUpstreamResponseError(
            service,
            issue ? `${issue.path.join('.') || 'root'}: ${issue.message}` : 'schema mismatch'
        );
    }

    return parsed.data;
}

/**
 * Ask the gateway for JSON and parse it, folding every failure into a StageError
 */
export async function requestStructured<T>(
    gateway: LlmGateway,
    service: string,
    prompt: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<Result<T, StageError>> {
    try {
        const response = await gateway.generateJson(prompt);
        return ok(parseStructured(service, response, schema));
    } catch (error) {
        return err(toStageError(error));
    }
}

/**
 * Clamp a score into [min, max] and round to one decimal
 */
export function clampScore(value: number, min = 0, max = 10): number {
    const clamped = Math.min(max, Math.max(min, value));
    return Math.round(clamped * 10) / 10;
}
