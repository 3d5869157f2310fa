/**
 * Parsed CLI options.
 */
export interface CLIOptions {
  /** Alternative .env file */
  envFile?: string;
  help?: boolean;
  /** Arguments that were not recognised */
  unknown: string[];
}

/**
 * Parses command line arguments. The scraper normally runs without any;
 * the target comes from SITE_URL.
 */
export class CLIInputParser {
  /**
   * @param args - Arguments array (usually process.argv.slice(2))
   */
  static parse(args: string[]): CLIOptions {
    const options: CLIOptions = { unknown: [] };

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];

      if (arg === '--help' || arg === '-h') {
        options.help = true;
        return options;
      }

      if (arg === '--env-file') {
        const next = args[i + 1];
        if (next !== undefined && !next.startsWith('-')) {
          options.envFile = next;
          i++;
        } else {
          options.unknown.push(arg);
        }
      } else if (arg.startsWith('--env-file=')) {
        options.envFile = arg.substring('--env-file='.length);
      } else {
        options.unknown.push(arg);
      }
    }

    return options;
  }

  static getHelpText(): string {
    return `
Console Error Scraper

Loads SITE_URL in Chromium, accepts the cookie consent banner, and writes the
console errors, warnings and page errors it captured to
console_error/site_url/<domain>.json.

Usage:
  console-error-scraper [options]

Options:
  --env-file <path>    Read configuration from this file instead of ./.env
  --help, -h           Show this help message

Environment:
  SITE_URL             Site to audit (required). https:// is added when missing.
  OUTPUT_DIR           Report directory (default: console_error/site_url)
  HEADLESS             Set to false to watch the browser
  LOG_LEVEL            debug | info | warn | error
`;
  }
}
