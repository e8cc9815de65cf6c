export const name = '@cyforge/cli';

export { createProgram, parseJobs, runCli, type CliDeps, type CliOptions } from './program';
export { OutputRenderer } from './output/renderer';
export type { BuildSummary, CleanSummary, ArtifactListing } from './output/renderer';
