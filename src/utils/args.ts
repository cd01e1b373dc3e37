export interface CliOptions {
  help: boolean;
  verbose: boolean;
  json: boolean;
  noFallback: boolean;
  model?: string;
  host?: string;
  query: string;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { help: false, verbose: false, json: false, noFallback: false, query: '' };
  const words: string[] = [];

  const valueFor = (flag: string, index: number): string => {
    const value = args[index + 1];
    if (value === undefined || value.startsWith('-')) {
      throw new CliUsageError(`${flag} needs a value`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg === '--verbose' || arg === '-v') {
      options.verbose = true;
    } else if (arg === '--json') {
      options.json = true;
    } else if (arg === '--no-fallback') {
      options.noFallback = true;
    } else if (arg === '--model' || arg === '-m') {
      options.model = valueFor(arg, i);
      i++;
    } else if (arg === '--host') {
      options.host = valueFor(arg, i);
      i++;
    } else if (arg === '--') {
      words.push(...args.slice(i + 1));
      break;
    } else if (arg.startsWith('-')) {
      throw new CliUsageError(`Unknown option: ${arg}`);
    } else {
      words.push(arg);
    }
  }

  options.query = words.join(' ');
  return options;
}
