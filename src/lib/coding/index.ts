export * from './types';
export { CodingContext } from './CodingContext';
export { resolveEntities, resolveWords, expandEmbeddedCompound, matchPhrase, composeCode } from './EntityResolver';
export { buildUpperSequence, buildLowerSequence } from './ContextSequences';
export { matchPatternSide } from './VerbPatternMatcher';
export { codeVerbs, defaultSource, defaultTarget, findPassiveVerb } from './VerbPatternEngine';
export { assembleEvents, buildEvents, expandSlashCodes, finalizeEvents, locatedCodes } from './EventAssembler';
export { SentenceCoder, type SentenceInput, type SentenceCoding } from './SentenceCoder';
export {
    StoryCoder,
    emptySummary,
    type Story,
    type StorySentence,
    type StoryResult,
    type SentenceOutcome,
    type CodingSummary,
} from './StoryCoder';
