/**
 * Command-line argument parsing for the packrat CLI.
 */

export interface ParsedArgs {
  command: string;
  files: string[];
  options: {
    level?: number;
    exclude: string[];
    password?: string;
    noHash?: boolean;
    noParallel?: boolean;
    noVerify?: boolean;
    stats?: boolean;
    config?: string;
    user?: boolean;
    show?: boolean;
    force?: boolean;
    verbose?: boolean;
    quiet?: boolean;
    help?: boolean;
    version?: boolean;
  };
  /** Problems found while parsing, e.g. a flag missing its value */
  errors: string[];
}

export function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = {
    command: '',
    files: [],
    options: { exclude: [] },
    errors: [],
  };

  let i = 0;

  // Consumes the next argument only when it is a value, not another flag
  const takeValue = (flag: string): string | undefined => {
    const value = args[i + 1];
    if (value === undefined || value.startsWith('-')) {
      result.errors.push(`Option ${flag} requires a value`);
      return undefined;
    }
    i++;
    return value;
  };

  while (i < args.length) {
    const arg = args[i]!;

    if (arg === '-l' || arg === '--level') {
      const value = takeValue(arg);
      if (value !== undefined) {
        const level = Number(value);
        if (Number.isInteger(level)) {
          result.options.level = level;
        } else {
          result.errors.push(`Invalid level: ${value}`);
        }
      }
    } else if (arg === '-e' || arg === '--exclude') {
      const value = takeValue(arg);
      if (value !== undefined) result.options.exclude.push(value);
    } else if (arg === '-p' || arg === '--password') {
      const value = takeValue(arg);
      if (value !== undefined) result.options.password = value;
    } else if (arg === '-c' || arg === '--config') {
      const value = takeValue(arg);
      if (value !== undefined) result.options.config = value;
    } else if (arg === '--no-hash') {
      result.options.noHash = true;
    } else if (arg === '--no-parallel') {
      result.options.noParallel = true;
    } else if (arg === '--no-verify') {
      result.options.noVerify = true;
    } else if (arg === '-s' || arg === '--stats') {
      result.options.stats = true;
    } else if (arg === '--user') {
      result.options.user = true;
    } else if (arg === '--show') {
      result.options.show = true;
    } else if (arg === '-f' || arg === '--force') {
      result.options.force = true;
    } else if (arg === '-v' || arg === '--verbose') {
      result.options.verbose = true;
    } else if (arg === '-q' || arg === '--quiet') {
      result.options.quiet = true;
    } else if (arg === '-h' || arg === '--help') {
      result.options.help = true;
    } else if (arg === '-V' || arg === '--version') {
      result.options.version = true;
    } else if (arg.startsWith('-') && arg !== '-') {
      result.errors.push(`Unknown option: ${arg}`);
    } else if (!result.command) {
      // First positional argument is the command
      result.command = arg;
    } else {
      result.files.push(arg);
    }

    i++;
  }

  return result;
}
