/**
 * Import CLI Arguments
 *
 * Parses argv with util.parseArgs and validates the result with zod.
 */

import { parseArgs } from 'util';
import { z } from 'zod';
import { assertCompatibleOptions } from '../reconcile/engine';
import type { EngineOptions } from '../reconcile/types';

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

export const USAGE = `Usage: import-ledger --portfolio <name> --file <ledger.csv> --country <CC> [options]

Options:
  -p, --portfolio <name>       Portfolio to reconcile into (created if missing)
  -f, --file <path>            Ledger CSV file
  -c, --country <CC>           Two-letter country of domicile (sets the base currency)
  -r, --reset                  Reset the portfolio before importing
      --reset-mode <mode>      portfolio (delete and recreate, default) | holdings
      --min-date <YYYY-MM-DD>  Skip rows dated before this day
      --min-line <n>           Skip rows before this file line
      --max-line <n>           Skip rows after this file line
      --prices <path>          Custom instrument prices CSV (symbol,date,price)
      --seed-from <name>       Seed opening balances from another portfolio at --min-date
      --strict                 Abort when a payout or merge names an unknown holding
      --merge-order <order>    cancel-first (default) | buy-first
      --client-id <id>         Overrides SHARESIGHT_CLIENT_ID
      --client-secret <secret> Overrides SHARESIGHT_CLIENT_SECRET
  -d, --debug                  Echo every request as a curl command
  -h, --help                   Show this help`;

export interface ImportOptions {
    file: string;
    pricesFile?: string;
    debug: boolean;
    clientId?: string;
    clientSecret?: string;
    engine: Omit<EngineOptions, 'prices'>;
}

export type ParsedArgs =
    | { kind: 'help' }
    | { kind: 'run'; options: ImportOptions };

const lineNumber = z.string()
    .regex(/^\d+$/, 'must be a positive whole number')
    .transform(Number);

const argsSchema = z.object({
    portfolio: z.string({ required_error: '--portfolio is required' }).min(1, '--portfolio is required'),
    file: z.string({ required_error: '--file is required' }).min(1, '--file is required'),
    country: z.string({ required_error: '--country is required' })
        .regex(/^[A-Za-z]{2}$/, '--country must be a two-letter code')
        .transform((c) => c.toUpperCase()),
    reset: z.boolean().default(false),
    'reset-mode': z.enum(['holdings', 'portfolio']).default('portfolio'),
    'min-date': z.string().regex(/^\d{4}-\d{2}-\d{2}$/, '--min-date must be YYYY-MM-DD').optional(),
    'min-line': lineNumber.optional(),
    'max-line': lineNumber.optional(),
    prices: z.string().min(1).optional(),
    'seed-from': z.string().min(1).optional(),
    strict: z.boolean().default(false),
    'merge-order': z.enum(['cancel-first', 'buy-first']).default('cancel-first'),
    debug: z.boolean().default(false),
    'client-id': z.string().min(1).optional(),
    'client-secret': z.string().min(1).optional(),
});

function readArgv(argv: string[]) {
    try {
        return parseArgs({
            args: argv,
            strict: true,
            allowPositionals: false,
            options: {
                portfolio: { type: 'string', short: 'p' },
                file: { type: 'string', short: 'f' },
                country: { type: 'string', short: 'c' },
                reset: { type: 'boolean', short: 'r' },
                'reset-mode': { type: 'string' },
                'min-date': { type: 'string' },
                'min-line': { type: 'string' },
                'max-line': { type: 'string' },
                prices: { type: 'string' },
                'seed-from': { type: 'string' },
                strict: { type: 'boolean' },
                'merge-order': { type: 'string' },
                debug: { type: 'boolean', short: 'd' },
                'client-id': { type: 'string' },
                'client-secret': { type: 'string' },
                help: { type: 'boolean', short: 'h' },
            },
        }).values;
    } catch (err) {
        throw new UsageError(err instanceof Error ? err.message : String(err));
    }
}

export function parseImportArgs(argv: string[]): ParsedArgs {
    const values = readArgv(argv);
    if (values.help) return { kind: 'help' };

    const parsed = argsSchema.safeParse(values);
    if (!parsed.success) {
        const problems = parsed.error.issues.map((issue) => {
            const field = issue.path.join('.');
            return issue.message.startsWith('--') ? issue.message : `--${field}: ${issue.message}`;
        });
        throw new UsageError(problems.join('; '));
    }

    const args = parsed.data;
    const engine: ImportOptions['engine'] = {
        portfolioName: args.portfolio,
        countryCode: args.country,
        reset: args.reset ? args['reset-mode'] : 'none',
        minDate: args['min-date'],
        minLine: args['min-line'],
        maxLine: args['max-line'],
        strict: args.strict,
        mergeOrder: args['merge-order'],
        seedFrom: args['seed-from'],
    };
    // fail before the ledger is read or credentials are exchanged
    assertCompatibleOptions(engine);

    return {
        kind: 'run',
        options: {
            file: args.file,
            pricesFile: args.prices,
            debug: args.debug,
            clientId: args['client-id'],
            clientSecret: args['client-secret'],
            engine,
        },
    };
}
