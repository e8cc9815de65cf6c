export interface ParsedCommand {
  bin: string;
  args: string[];
  /** Leading `KEY=value` assignments, applied to the child's environment */
  env: Record<string, string>;
  raw: string;
}

/**
 * Splits a command line the way a POSIX shell would for simple words: whitespace separates,
 * single and double quotes group, backslash escapes the next character. No expansion happens.
 */
export function parseCommand(input: string): ParsedCommand {
  const tokens: string[] = [];
  let current = '';
  let inToken = false;
  let quote: "'" | '"' | null = null;
  let escape = false;

  const trimmed = input.trim();

  for (let i = 0; i < trimmed.length; i++) {
    const char = trimmed[i];

    if (escape) {
      current += char;
      escape = false;
    } else if (char === '\\' && quote !== "'") {
      escape = true;
      inToken = true;
    } else if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
    } else if (char === "'" || char === '"') {
      quote = char;
      inToken = true;
    } else if (/\s/.test(char)) {
      if (inToken) {
        tokens.push(current);
        current = '';
        inToken = false;
      }
    } else {
      current += char;
      inToken = true;
    }
  }

  if (inToken) {
    tokens.push(current);
  }

  const env: Record<string, string> = {};
  let cmdIndex = 0;
  while (cmdIndex < tokens.length) {
    const assignment = /^([a-zA-Z_][a-zA-Z0-9_]*)=(.*)$/s.exec(tokens[cmdIndex]);
    if (!assignment) break;
    env[assignment[1]] = assignment[2];
    cmdIndex++;
  }

  if (cmdIndex >= tokens.length) {
    return { bin: '', args: [], env, raw: input };
  }

  return {
    bin: tokens[cmdIndex],
    args: tokens.slice(cmdIndex + 1),
    env,
    raw: input,
  };
}
