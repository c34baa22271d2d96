/**
 * Error taxonomy
 *
 * InvalidRequestError is the only error allowed to reach the user. The two
 * upstream errors are converted into stage fallbacks by the orchestrator.
 */

export class UpstreamUnavailableError extends Error {
    readonly service: string;

    constructor(service: string, message: string) {
        super(`${service} unavailable: ${message}`);
        this.name = 'UpstreamUnavailableError';
        this.service = service;
    }
}

export class MalformedUpstreamResponseError extends Error {
    readonly service: string;

    constructor(service: string, message: string) {
        super(`${service} returned a malformed response: ${message}`);
        this.name = 'MalformedUpstreamResponseError';
        this.service = service;
    }
}

export class InvalidRequestError extends Error {
    readonly field: string;

    constructor(field: string, message?: string) {
        super(message || `Missing required field: ${field}`);
        this.name = 'InvalidRequestError';
        this.field = field;
    }
}

export type StageErrorKind = 'upstream_unavailable' | 'malformed_response' | 'unexpected';

/**
 * Error value carried by a failed stage Result
 */
export interface StageError {
    kind: StageErrorKind;
    message: string;
}

/**
 * Map any thrown value onto a StageError
 */
export function toStageError(error: unknown): StageError {
    if (error instanceof UpstreamUnavailableError) {
        return { kind: 'upstream_unavailable', message: error.message };
    }
    if (error instanceof MalformedUpstreamResponseError) {
        return { kind: 'malformed_response', message: error.message };
    }
    return {
        kind: 'unexpected',
        message: error instanceof Error ? error.message : 'Unknown error',
    };
}

/**
 * Extract a log-friendly message from an unknown error
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error';
}
