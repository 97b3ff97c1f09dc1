import { CRAWL_MODES, type CrawlMode } from './core/types';

// ================================================
// ARGUMENT PARSING
// ================================================

export interface CliArgs {
  /** Positional arguments: an optional site key followed by URLs */
  positionals: string[];
  mode?: CrawlMode;
  output?: string;
  maxItems?: number;
  headful: boolean;
  list: boolean;
  test: boolean;
  help: boolean;
  errors: string[];
}

function isCrawlMode(value: string): value is CrawlMode {
  return CRAWL_MODES.some((mode) => mode === value);
}

function optionValue(arg: string): string {
  return arg.slice(arg.indexOf('=') + 1);
}

export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    positionals: [],
    headful: false,
    list: false,
    test: false,
    help: false,
    errors: [],
  };

  for (const arg of args) {
    if (arg === '--list' || arg === '-l') {
      result.list = true;
    } else if (arg === '--test' || arg === '-t') {
      result.test = true;
    } else if (arg === '--headful') {
      result.headful = true;
    } else if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg.startsWith('--mode=')) {
      const mode = optionValue(arg);
      if (isCrawlMode(mode)) {
        result.mode = mode;
      } else {
        result.errors.push(
          `Unknown mode '${mode}', expected one of ${CRAWL_MODES.join(', ')}`
        );
      }
    } else if (arg.startsWith('--output=')) {
      result.output = optionValue(arg);
    } else if (arg.startsWith('--max-items=')) {
      const value = Number(optionValue(arg));
      if (Number.isInteger(value) && value > 0) {
        result.maxItems = value;
      } else {
        result.errors.push(`--max-items needs a positive integer, got '${optionValue(arg)}'`);
      }
    } else if (arg.startsWith('-')) {
      result.errors.push(`Unknown option '${arg}'`);
    } else {
      result.positionals.push(arg);
    }
  }

  return result;
}

export interface CrawlTarget {
  site: string;
  urls: string[];
}

/**
 * The first positional names the site when it is a registered key;
 * everything else is a URL.
 */
export function resolveTarget(
  positionals: string[],
  isSite: (key: string) => boolean,
  defaultSite: string
): CrawlTarget {
  const [first, ...rest] = positionals;
  if (first !== undefined && isSite(first)) {
    return { site: first, urls: rest };
  }
  return { site: defaultSite, urls: positionals };
}
