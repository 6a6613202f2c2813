/**
 * Interface for parsed CLI options.
 */
export interface CLIOptions {
  config?: string;
  url?: string;
  output?: string;
  help?: boolean;
}

const VALUE_FLAGS: Record<string, 'config' | 'url' | 'output'> = {
  '--config': 'config',
  '-c': 'config',
  '--url': 'url',
  '--output': 'output',
  '-o': 'output',
};

/**
 * Handles parsing of command line arguments.
 */
export class CLIInputParser {
  /**
   * Parse command line arguments.
   * @param args - Arguments array (usually process.argv.slice(2))
   */
  static parse(args: string[]): CLIOptions {
    const options: CLIOptions = {};

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];

      if (arg === '--help' || arg === '-h') {
        options.help = true;
        return options;
      }

      const [flag, inlineValue] = arg.startsWith('--') ? CLIInputParser.splitInline(arg) : [arg];
      const key = VALUE_FLAGS[flag];
      if (key) {
        if (inlineValue !== undefined) {
          options[key] = inlineValue;
          continue;
        }
        const next = args[i + 1];
        // '-' alone is a value: standard output for --output
        if (next !== undefined && (next === '-' || !next.startsWith('-'))) {
          options[key] = next;
          i++;
        }
      } else if (!arg.startsWith('-') && !options.url) {
        // Positional argument is the target URL
        options.url = arg;
      }
    }

    return options;
  }

  private static splitInline(arg: string): [string, string?] {
    const index = arg.indexOf('=');
    return index === -1 ? [arg] : [arg.slice(0, index), arg.slice(index + 1)];
  }

  /**
   * Generate help text for the CLI.
   */
  static getHelpText(): string {
    return `
page-harvest

Drive a headless browser through scripted jobs and print one JSON result.

Usage:
  page-harvest [options] [url]

Options:
  --url <url>            Target URL for the default job (also TARGET_URL)
  --config, -c <file>    JSON job file (also HARVEST_CONFIG)
  --output, -o <path>    Write the result to a file; '-' means stdout (also OUTPUT_PATH)
  --help, -h             Show this help message

Exit codes:
  0  success
  1  browser engine could not start
  2  run failed (navigation, extraction, configuration, cancellation)
  3  result could not be written

Examples:
  page-harvest https://example.com
  page-harvest --config jobs.json --output result.json
`;
  }
}
