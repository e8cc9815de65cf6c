export * from './command/parser';
export * from './runner/runner';
export * from './compiler/types';
export * from './compiler/template';
export { CommandCompiler } from './compiler/command';
export * from './diagnostics/missing';
