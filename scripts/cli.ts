import { ConfigError, reportError } from './errors.js';

export interface ParsedArgs {
  positionals: string[];
  options: Record<string, string>;
  flags: Set<string>;
}

/**
 * Split argv into positionals, `--name value` options and bare `--flag`s.
 * Only names listed in `valueOptions` consume the following argument.
 */
export function parseArgs(argv: string[], valueOptions: string[] = []): ParsedArgs {
  const positionals: string[] = [];
  const options: Record<string, string> = {};
  const flags = new Set<string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    if (eq !== -1) {
      options[name] = arg.slice(eq + 1);
    } else if (valueOptions.includes(name)) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new ConfigError(`Option --${name} needs a value`);
      }
      options[name] = value;
      i++;
    } else {
      flags.add(name);
    }
  }

  return { positionals, options, flags };
}

/** Entry-point wrapper: setup failures exit 1 with a one-line message. */
export function runMain(main: () => Promise<void>, context: string): void {
  main().catch((e) => {
    if (e instanceof ConfigError) {
      console.error(`ERROR: ${e.message}`);
    } else {
      reportError(e, { context });
      console.error('Fatal error:', e);
    }
    process.exit(1);
  });
}
