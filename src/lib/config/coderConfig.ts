/**
 * Coder configuration - Zod schema, defaults and run-time option changes
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { CoderError } from '@/lib/core/errors';

// =============================================================================
// SCHEMA
// =============================================================================

const threshold = z.number().int().min(0);

export const coderConfigSchema = z.object({
    // Clause elision: internal, initial (B) and terminal (E) word-count ranges.
    // A max of 0 switches the pass off.
    commaMin: threshold.default(2),
    commaMax: threshold.default(8),
    commaBMin: threshold.default(0),
    commaBMax: threshold.default(0),
    commaEMin: threshold.default(0),
    commaEMax: threshold.default(0),

    requireDyad: z.boolean().default(true),
    // Uncoded phrases with fewer spaces than this are reported in quotes; 0 = off
    newActorLength: z.number().int().min(0).default(0),
    writeActorRoot: z.boolean().default(false),
    writeActorText: z.boolean().default(false),
    stopOnError: z.boolean().default(false),
    maxSentencesPerStory: z.number().int().positive().default(7),

    dictionaryDir: z.string().default('.'),
    verbFile: z.string().default('verbs.txt'),
    actorFiles: z.array(z.string()).min(1).default(['actors.txt']),
    agentFile: z.string().default('agents.txt'),
    discardFile: z.string().optional(),
    issueFile: z.string().optional(),
});

export type CoderConfig = z.infer<typeof coderConfigSchema>;
export type CoderConfigInput = z.input<typeof coderConfigSchema>;

// =============================================================================
// LOADING
// =============================================================================

export function resolveCoderConfig(input: CoderConfigInput | Record<string, unknown> = {}): CoderConfig {
    const parsed = coderConfigSchema.safeParse(input);
    if (!parsed.success) {
        const detail = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new CoderError(`Invalid coder configuration: ${detail}`, 'invalid_config', {
            issues: parsed.error.issues,
        });
    }
    return parsed.data;
}

export const DEFAULT_CODER_CONFIG: CoderConfig = resolveCoderConfig();

export function loadCoderConfig(path: string): CoderConfig {
    let raw: Record<string, unknown>;
    try {
        raw = JSON.parse(readFileSync(path, 'utf8'));
    } catch (error) {
        throw new CoderError(`Could not read coder configuration ${path}`, 'invalid_config', {
            path,
            cause: error instanceof Error ? error.message : String(error),
        });
    }
    const config = resolveCoderConfig(raw);
    console.info(`[CoderConfig] Loaded ${path}`);
    return config;
}

// =============================================================================
// RUN-TIME OPTION CHANGES
// =============================================================================

type CommaThreshold = 'commaMin' | 'commaMax' | 'commaBMin' | 'commaBMax' | 'commaEMin' | 'commaEMax';

const COMMA_OPTIONS: Record<string, CommaThreshold | undefined> = {
    comma_min: 'commaMin',
    comma_max: 'commaMax',
    comma_bmin: 'commaBMin',
    comma_bmax: 'commaBMax',
    comma_emin: 'commaEMin',
    comma_emax: 'commaEMax',
};

function parseInteger(value: string): number | null {
    const trimmed = value.trim();
    return /^-?\d+$/.test(trimmed) ? Number(trimmed) : null;
}

/**
 * Apply one named option change (as found in validation files) and return the
 * updated config. Unknown options and malformed values are logged and ignored.
 */
export function applyConfigOption(config: CoderConfig, option: string, value: string): CoderConfig {
    const name = option.trim().toLowerCase();
    console.info(`[CoderConfig] Changing ${name} to ${value}`);

    if (name === 'new_actor_length') {
        const length = parseInteger(value);
        if (length === null || length < 0) {
            console.warn('[CoderConfig] new_actor_length must be an integer; command ignored');
            return config;
        }
        return { ...config, newActorLength: length };
    }
    if (name === 'require_dyad') {
        return { ...config, requireDyad: !value.toLowerCase().includes('false') };
    }
    if (name === 'stop_on_error') {
        return { ...config, stopOnError: !value.toLowerCase().includes('false') };
    }
    if (name.startsWith('comma_')) {
        const key = COMMA_OPTIONS[name];
        if (!key) {
            console.warn('[CoderConfig] Unrecognized option beginning with comma_; command ignored');
            return config;
        }
        const count = parseInteger(value);
        if (count === null || count < 0) {
            console.warn('[CoderConfig] comma_* value must be an integer; command ignored');
            return config;
        }
        const updated: CoderConfig = { ...config };
        updated[key] = count;
        return updated;
    }

    console.warn(`[CoderConfig] Unrecognized option ${name}; command ignored`);
    return config;
}
