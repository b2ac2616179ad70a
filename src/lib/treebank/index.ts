export * from './tokens';
export * from './parseTree';
export * from './TreeNormalizer';
export * from './ClauseElision';
