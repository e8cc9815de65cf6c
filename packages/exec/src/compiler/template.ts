import type { DirectiveValue } from './types';

/**
 * Renders directives the way the compiler's `-X` option takes them: `name=value` pairs joined
 * by commas, booleans spelled `True` and `False`.
 */
export function formatDirectives(directives: Record<string, DirectiveValue>): string {
  return Object.entries(directives)
    .map(([name, value]) => `${name}=${formatValue(value)}`)
    .join(',');
}

function formatValue(value: DirectiveValue): string {
  if (typeof value === 'boolean') {
    return value ? 'True' : 'False';
  }
  return String(value);
}

/**
 * Substitutes `{name}` placeholders in every argument. Unknown placeholders stay as written.
 */
export function expandArgs(
  template: readonly string[],
  variables: Record<string, string>,
): string[] {
  return template.map((arg) =>
    arg.replace(/\{(\w+)\}/g, (placeholder, name: string) =>
      Object.prototype.hasOwnProperty.call(variables, name) ? variables[name] : placeholder,
    ),
  );
}
