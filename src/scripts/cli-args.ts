/**
 * Command line flags of the conformance runner.
 */

export interface CliOptions {
  host?: string;
  port?: string;
  password?: string;
  parallel: boolean;
  only?: string[];
  help: boolean;
}

export const USAGE = `Usage: irc-conformance [options]

Options:
  --host <host>          Server host (default: $IRC_HOST or localhost)
  --port <port>          Server port (default: $IRC_PORT or 6667)
  --password <password>  Server password sent with PASS (default: $IRC_PASSWORD)
  --parallel             Run the suites concurrently
  --only <names>         Comma-separated scenarios to run ('name' or 'suite/name')
  --help                 Show this help`;

const VALUE_FLAGS = new Set(['--host', '--port', '--password', '--only']);

/**
 * @throws Error on an unknown flag or a flag missing its value
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { parallel: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const [flag, inline] = arg.startsWith('--') && arg.includes('=') ? splitOnce(arg) : [arg, undefined];

    if (flag === '--parallel') {
      options.parallel = true;
      continue;
    }
    if (flag === '--help' || flag === '-h') {
      options.help = true;
      continue;
    }
    if (!VALUE_FLAGS.has(flag)) {
      throw new Error(`Unknown option '${arg}'`);
    }

    const value = inline ?? argv[++i];
    if (value === undefined || value === '') {
      throw new Error(`Option ${flag} needs a value`);
    }
    switch (flag) {
      case '--host':
        options.host = value;
        break;
      case '--port':
        options.port = value;
        break;
      case '--password':
        options.password = value;
        break;
      case '--only':
        options.only = value.split(',').map(name => name.trim()).filter(Boolean);
        break;
    }
  }
  return options;
}

function splitOnce(arg: string): [string, string] {
  const index = arg.indexOf('=');
  return [arg.slice(0, index), arg.slice(index + 1)];
}
