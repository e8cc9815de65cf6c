import type { CompilerConfig } from '@cyforge/shared';
import { hashContent } from '@cyforge/repo';

/**
 * Version string stored with every fingerprint: the compiler's own version plus a short
 * digest of the settings that change its output. Editing the command, its arguments or a
 * directive makes every stored fingerprint stale.
 */
export function toolchainFingerprint(
  version: string,
  config: Pick<CompilerConfig, 'command' | 'args' | 'directives'>,
): string {
  const directives = Object.keys(config.directives)
    .sort()
    .map((key) => [key, config.directives[key]]);
  const digest = hashContent(
    JSON.stringify({ command: config.command, args: config.args, directives }),
  ).slice(0, 12);
  return `${version}+${digest}`;
}
