/**
 * Credential & endpoint configuration
 *
 * Reads SHARESIGHT_* variables (already loaded from .env.local / .env by the
 * CLI) and lets command-line flags override them.
 */

import { z } from 'zod';

export const DEFAULT_API_URL = 'https://api.sharesight.com';

export interface RemoteConfig {
    clientId: string;
    clientSecret: string;
    apiUrl: string;
    tokenUrl: string;
}

const envSchema = z.object({
    SHARESIGHT_CLIENT_ID: z.string().min(1, 'SHARESIGHT_CLIENT_ID must be set'),
    SHARESIGHT_CLIENT_SECRET: z.string().min(1, 'SHARESIGHT_CLIENT_SECRET must be set'),
    SHARESIGHT_API_URL: z.string().url().default(DEFAULT_API_URL),
    SHARESIGHT_TOKEN_URL: z.string().url().optional(),
});

export function loadRemoteConfig(
    env: NodeJS.ProcessEnv,
    overrides: { clientId?: string; clientSecret?: string } = {},
): RemoteConfig {
    const parsed = envSchema.safeParse({
        ...env,
        SHARESIGHT_CLIENT_ID: overrides.clientId ?? env.SHARESIGHT_CLIENT_ID ?? '',
        SHARESIGHT_CLIENT_SECRET: overrides.clientSecret ?? env.SHARESIGHT_CLIENT_SECRET ?? '',
        SHARESIGHT_API_URL: env.SHARESIGHT_API_URL || undefined,
        SHARESIGHT_TOKEN_URL: env.SHARESIGHT_TOKEN_URL || undefined,
    });

    if (!parsed.success) {
        const problems = parsed.error.issues.map((issue) => issue.message);
        throw new Error(`Invalid configuration: ${problems.join('; ')}`);
    }

    const apiUrl = parsed.data.SHARESIGHT_API_URL.replace(/\/+$/, '');
    return {
        clientId: parsed.data.SHARESIGHT_CLIENT_ID,
        clientSecret: parsed.data.SHARESIGHT_CLIENT_SECRET,
        apiUrl,
        tokenUrl: parsed.data.SHARESIGHT_TOKEN_URL ?? `${apiUrl}/oauth2/token`,
    };
}
