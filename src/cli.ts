import { ConfigError } from './utils/errors.js';

export const DEFAULT_CONFIG_PATH = 'config.yaml';

export const USAGE = `Usage: slideshow [--config] <path>

Builds a promo slideshow video from a spreadsheet and an images folder.

Options:
  -c, --config <path>  run configuration file (default: ${DEFAULT_CONFIG_PATH})
  -h, --help           show this help`;

export type CliCommand =
  | { kind: 'run'; configPath: string }
  | { kind: 'help' };

/** Parse the arguments after the script name. */
export function parseCliArgs(args: readonly string[]): CliCommand {
  let configPath: string | undefined;

  const setPath = (value: string | undefined, flag: string) => {
    if (!value) throw new ConfigError(`${flag} needs a file path`);
    if (configPath) throw new ConfigError(`Only one configuration file may be given (got "${configPath}" and "${value}")`);
    configPath = value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (arg === '-h' || arg === '--help') return { kind: 'help' };
    if (arg === '-c' || arg === '--config') {
      setPath(args[++i], arg);
    } else if (arg.startsWith('--config=')) {
      setPath(arg.slice('--config='.length), '--config');
    } else if (arg.startsWith('-')) {
      throw new ConfigError(`Unknown option: ${arg}`);
    } else {
      setPath(arg, 'config');
    }
  }

  return { kind: 'run', configPath: configPath ?? DEFAULT_CONFIG_PATH };
}
