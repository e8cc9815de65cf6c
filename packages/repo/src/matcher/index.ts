export * from './types';
export { PathMatcher, compileRules } from './matcher';
export { parseRule, findUnbalancedBracket } from './rules';
export * from './loader';
