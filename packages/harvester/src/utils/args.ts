type ParsedArgs = {
  command: string;
  options: Record<string, string>;
};

/**
 * Splits `argv` into a command and `--key=value` / `--key value` options.
 * A bare `--flag` reads as `'true'`. Only the first `=` separates key and
 * value.
 */
function parseArgs(argv: string[]): ParsedArgs {
  const [rawCommand, ...rest] = argv;
  const command = normalizeCommand(rawCommand);
  const options: Record<string, string> = {};

  for (let index = 0; index < rest.length; index += 1) {
    const arg = rest[index];
    if (!arg?.startsWith('--')) {
      continue;
    }

    const body = arg.slice(2);
    const separator = body.indexOf('=');
    const key = separator === -1 ? body : body.slice(0, separator);
    if (!key) {
      continue;
    }

    if (separator !== -1) {
      options[key] = body.slice(separator + 1);
      continue;
    }

    const next = rest[index + 1];
    if (next && !next.startsWith('--')) {
      options[key] = next;
      index += 1;
      continue;
    }

    options[key] = 'true';
  }

  return { command, options };
}

function normalizeCommand(command?: string): string {
  if (!command || command === '--help' || command === '-h') {
    return 'help';
  }

  return command;
}

export { parseArgs };
export type { ParsedArgs };
