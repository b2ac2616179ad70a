/**
 * Error model for the coder.
 *
 * Sentence-level problems are expected and frequent, so they travel as
 * values (`CodingResult`). `CoderError` is reserved for conditions that stop
 * a load or a batch.
 */

// ==================== FATAL ERRORS ====================

export type CoderErrorCode =
    | 'dictionary_missing'
    | 'invalid_config'
    | 'invalid_date'
    | 'stopped_on_error';

export class CoderError extends Error {
    constructor(
        message: string,
        public code: CoderErrorCode,
        public context?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'CoderError';
    }
}

// ==================== SENTENCE FAILURES ====================

export type FailureTag =
    | 'bad_input_parse'
    | 'empty_nplist'
    | 'bad_final_parse'
    | 'resolve_compounds'
    | 'get_NE_error'
    | 'dateline'
    | 'comma_balance'
    | 'sequence_bounds'
    | 'compound_expansion'
    | 'verb_phrase_end'
    | 'story_date';

export interface CodingFailure {
    tag: FailureTag;
    message: string;
    sentenceId?: string;
}

export type CodingResult<T> =
    | { success: true; value: T }
    | { success: false; failure: CodingFailure };

export function ok<T>(value: T): CodingResult<T> {
    return { success: true, value };
}

export function fail<T>(tag: FailureTag, message: string, sentenceId?: string): CodingResult<T> {
    return { success: false, failure: { tag, message, sentenceId } };
}
