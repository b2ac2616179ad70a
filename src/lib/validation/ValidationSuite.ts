/**
 * ValidationSuite - runs coded-sentence records against expected triples
 *
 * A record file is a JSON array. Sentence records carry their expected
 * outcome; config records change an option for every record after them;
 * a stop record ends the run.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { applyConfigOption, DEFAULT_CODER_CONFIG, type CoderConfig } from '@/lib/config/coderConfig';
import { coderEventBus, type CoderEventBus } from '@/lib/core/CoderEventBus';
import { CoderError } from '@/lib/core/errors';
import { StoryCoder, type SentenceOutcome } from '@/lib/coding/StoryCoder';
import type { CoderDictionaries } from '@/lib/dictionaries/types';

// ==================== SCHEMAS ====================

const tripleSchema = z.tuple([z.string(), z.string(), z.string()]);

export const sentenceRecordSchema = z.object({
    kind: z.literal('sentence'),
    id: z.string().min(1),
    category: z.string().default(''),
    date: z.string().regex(/^\d{6}(\d{2})?$/, 'Date must be YYMMDD or YYYYMMDD'),
    text: z.string(),
    parse: z.string().optional(),
    /** Records marked invalid document known gaps; `validOnly` skips them */
    valid: z.boolean().default(true),
    expected: z.array(tripleSchema).default([]),
    noEvents: z.boolean().default(false),
    /** `sentencediscard`, `storydiscard` or a failure tag */
    error: z.string().optional(),
});

export const validationRecordSchema = z.discriminatedUnion('kind', [
    sentenceRecordSchema,
    z.object({ kind: z.literal('config'), option: z.string(), value: z.string() }),
    z.object({ kind: z.literal('stop') }),
]);

export type SentenceRecord = z.infer<typeof sentenceRecordSchema>;
export type ValidationRecord = z.infer<typeof validationRecordSchema>;
export type ValidationRecordInput = z.input<typeof validationRecordSchema>;
export type Triple = z.infer<typeof tripleSchema>;

export function parseValidationRecords(input: unknown): ValidationRecord[] {
    const parsed = z.array(validationRecordSchema).safeParse(input);
    if (!parsed.success) {
        const detail = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new CoderError(`Invalid validation records: ${detail}`, 'invalid_config', { issues: parsed.error.issues });
    }
    return parsed.data;
}

export function loadValidationRecords(path: string): ValidationRecord[] {
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, 'utf8'));
    } catch (error) {
        throw new CoderError(`Could not read validation records ${path}`, 'invalid_config', {
            path,
            cause: error instanceof Error ? error.message : String(error),
        });
    }
    return parseValidationRecords(raw);
}

// ==================== RUN ====================

export interface ValidationOptions {
    /** Only these categories, when given */
    include?: string[];
    exclude?: string[];
    validOnly?: boolean;
}

export interface RecordResult {
    id: string;
    category: string;
    passed: boolean;
    coded: Triple[];
    /** Coded triples that were not expected */
    unexpected: Triple[];
    /** Expected triples that were not coded */
    missing: Triple[];
    /** Discard kind or failure tag the record ended with */
    error?: string;
}

export interface ValidationReport {
    results: RecordResult[];
    passed: number;
    failed: number;
}

function outcomeError(outcome: SentenceOutcome | undefined): string | undefined {
    switch (outcome?.status) {
        case 'sentence-discard':
            return 'sentencediscard';
        case 'story-discard':
            return 'storydiscard';
        case 'skipped':
            return outcome.failure.tag;
        case 'no-parse':
            return 'noparse';
        default:
            return undefined;
    }
}

const tripleKey = (triple: Triple) => triple.join('\t');

export function compareRecord(record: SentenceRecord, outcome: SentenceOutcome | undefined): RecordResult {
    const coded: Triple[] =
        outcome?.status === 'coded'
            ? outcome.events.map((event): Triple => [event.source, event.target, event.eventCode])
            : [];
    const error = outcomeError(outcome);

    const codedKeys = new Set(coded.map(tripleKey));
    const expectedKeys = new Set(record.expected.map(tripleKey));
    const unexpected = coded.filter(triple => !expectedKeys.has(tripleKey(triple)));
    const missing = record.expected.filter(triple => !codedKeys.has(tripleKey(triple)));

    let passed: boolean;
    if (record.error !== undefined) {
        passed = error === record.error;
    } else if (record.noEvents) {
        passed = error === undefined && coded.length === 0;
    } else {
        passed = error === undefined && unexpected.length === 0 && missing.length === 0;
    }

    return { id: record.id, category: record.category, passed, coded, unexpected, missing, error };
}

export class ValidationSuite {
    constructor(
        private dictionaries: CoderDictionaries,
        private config: CoderConfig = DEFAULT_CODER_CONFIG,
        private bus: CoderEventBus = coderEventBus
    ) { }

    private selected(record: SentenceRecord, options: ValidationOptions): boolean {
        if (options.validOnly && !record.valid) return false;
        if (options.include && !options.include.includes(record.category)) return false;
        if (options.exclude?.includes(record.category)) return false;
        return true;
    }

    run(records: ValidationRecord[], options: ValidationOptions = {}): ValidationReport {
        let config = this.config;
        let coder = new StoryCoder(this.dictionaries, config, this.bus);
        const results: RecordResult[] = [];

        for (const record of records) {
            if (record.kind === 'stop') {
                console.info('[ValidationSuite] Stop record reached');
                break;
            }
            if (record.kind === 'config') {
                config = applyConfigOption(config, record.option, record.value);
                coder = new StoryCoder(this.dictionaries, config, this.bus);
                continue;
            }
            if (!this.selected(record, options)) continue;

            const story = coder.codeStory({
                id: record.id,
                date: record.date,
                sentences: [{ id: record.id, text: record.text, parse: record.parse }],
            });
            const result = compareRecord(record, story.sentences[0]);
            if (!result.passed) {
                console.warn(
                    `[ValidationSuite] ${record.id} failed: unexpected ${JSON.stringify(result.unexpected)}, ` +
                    `missing ${JSON.stringify(result.missing)}${result.error ? `, error ${result.error}` : ''}`
                );
            }
            results.push(result);
        }

        const passed = results.filter(result => result.passed).length;
        console.info(`[ValidationSuite] ${passed} of ${results.length} records passed`);
        return { results, passed, failed: results.length - passed };
    }
}
