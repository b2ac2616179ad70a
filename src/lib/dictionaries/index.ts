export * from './types';
export { readDictionaryLines, parsePhrase, WarningCollector } from './DictionaryReader';
export { makePlural, makeVerbForms } from './wordForms';
export { toOrdinalDate } from './ordinalDate';
export { compileVerbDictionary, compileUpperPattern, compileLowerPattern, primaryEntryFor, NULL_CODE } from './VerbDictionary';
export { compileActorDictionary, resolveActorCode, UNRESOLVED_CODE } from './ActorDictionary';
export { compileAgentDictionary, parseAgentCode } from './AgentDictionary';
export { compileDiscardList, checkDiscards, type DiscardCheck } from './DiscardList';
export { compileIssueList, expandIssueForms, findIssues } from './IssueList';
export { loadDictionaries } from './DictionaryLoader';
