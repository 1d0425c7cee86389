/**
 * Curl Echo
 *
 * Renders a request as a copyable curl command for --debug output.
 * The bearer token is replaced with a shell variable so it never reaches logs.
 */

import type { HttpMethod } from './types';

export const TOKEN_PLACEHOLDER = '$SHARESIGHT_TOKEN';

function shellQuote(value: string): string {
    return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function toCurl(method: HttpMethod, url: string, body?: unknown): string {
    const parts = [
        'curl', '-X', method, shellQuote(url),
        // double quotes so the shell expands the token variable
        '-H', `"Authorization: Bearer ${TOKEN_PLACEHOLDER}"`,
        '-H', shellQuote('Content-Type: application/json'),
    ];

    if (body !== undefined) {
        parts.push('-d', shellQuote(JSON.stringify(body)));
    }

    return parts.join(' ');
}
