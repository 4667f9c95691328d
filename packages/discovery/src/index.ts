export const name = '@moonfmt/discovery';

export * from './types';
export { PathWalker } from './walker';
export { OverrideMatcher } from './overrides';
export { shouldFormat, matchesDefaultGlob } from './filter';
export { expandGlob, GlobSyntaxError } from './glob';
