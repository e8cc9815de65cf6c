import path from 'path';
import { listArtifacts } from '@cyforge/core';
import type { ArtifactListing } from '../output/renderer';
import type { CommandContext } from './context';

/** `--list` on its own: compiled modules already in the output directory. */
export async function listOutput(ctx: CommandContext, output?: string): Promise<ArtifactListing> {
  const outputDir = path.resolve(ctx.cwd, output ?? ctx.config.outputDir);
  return {
    outputDir,
    artifacts: await listArtifacts(outputDir, ctx.config.clean.artifactExtensions),
  };
}
