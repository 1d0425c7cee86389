/**
 * Gateway Errors
 */

import type { HttpMethod } from './types';

/** Raised by strict calls when the service answers with a non-2xx status */
export class GatewayError extends Error {
    constructor(
        readonly method: HttpMethod,
        readonly url: string,
        readonly status: number,
        readonly body: unknown,
    ) {
        super(`${method} ${url} failed with ${status}: ${previewBody(body)}`);
        this.name = 'GatewayError';
    }
}

/** Raised when the client-credentials exchange is rejected */
export class AuthenticationError extends Error {
    constructor(readonly status: number, detail: string) {
        super(`Authentication failed (${status}): ${detail}`);
        this.name = 'AuthenticationError';
    }
}

/** First 200 chars of a response body, for error messages */
export function previewBody(body: unknown): string {
    const text = typeof body === 'string' ? body : JSON.stringify(body) ?? '';
    return text.slice(0, 200);
}
