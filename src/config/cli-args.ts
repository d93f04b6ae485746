import {err, ok, type Result} from 'neverthrow';
import {isUnitCategory} from '../utils/catalog';
import type {CliOverrides} from './app-config';

export type CliArgs = {
  overrides: CliOverrides;
  configPath?: string;
  showVersion: boolean;
};

export const USAGE = 'Usage: sysdeck [--user] [--type <service|timer|socket|target|path>] [--config <path>] [-v|--version]';

/** Accepts `--flag value` and `--flag=value`. */
export function parseCliArgs(argv: readonly string[]): Result<CliArgs, string> {
  const parsed: CliArgs = {overrides: {}, showVersion: false};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const [flag, inline] = arg.startsWith('--') && arg.includes('=')
      ? [arg.slice(0, arg.indexOf('=')), arg.slice(arg.indexOf('=') + 1)]
      : [arg, undefined];

    const value = (): string | undefined => inline ?? argv[++i];

    switch (flag) {
      case '--user':
        parsed.overrides.user = true;
        break;
      case '-v':
      case '--version':
        parsed.showVersion = true;
        break;
      case '--type': {
        const category = value();
        if (category === undefined || !isUnitCategory(category)) {
          return err(`Invalid --type: ${category ?? '(missing)'}`);
        }
        parsed.overrides.category = category;
        break;
      }
      case '--config': {
        const path = value();
        if (!path) return err('--config needs a path');
        parsed.configPath = path;
        break;
      }
      default:
        return err(`Unknown argument: ${arg}`);
    }
  }

  return ok(parsed);
}
