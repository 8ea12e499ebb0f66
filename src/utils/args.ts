import { ConfigError } from '../errors/index.js';

export type FlagKind = 'string' | 'boolean';

export type FlagTable = Readonly<Record<string, FlagKind>>;

export type CliArgs = Record<string, string | boolean>;

function parseBoolean(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

function kindOf(flags: FlagTable, name: string): FlagKind | undefined {
  return Object.prototype.hasOwnProperty.call(flags, name) ? flags[name] : undefined;
}

/**
 * Parses `--name value` and `--name=value` against a fixed flag table.
 * Boolean flags never consume the next token; `--name=false` turns one off.
 * A repeated flag keeps its last value.
 */
export function parseCliArgs(tokens: readonly string[], flags: FlagTable): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token.startsWith('--') || token.length === 2) {
      throw new ConfigError(`Unexpected argument "${token}"`);
    }

    const body = token.slice(2);
    const eq = body.indexOf('=');
    const name = eq === -1 ? body : body.slice(0, eq);
    const inline = eq === -1 ? undefined : body.slice(eq + 1);
    const kind = kindOf(flags, name);

    if (kind === undefined) {
      throw new ConfigError(`Unknown flag --${name}`);
    }

    if (kind === 'boolean') {
      if (inline === undefined) {
        result[name] = true;
        continue;
      }
      const parsed = parseBoolean(inline);
      if (parsed === undefined) {
        throw new ConfigError(`--${name} expects a boolean, received "${inline}"`);
      }
      result[name] = parsed;
      continue;
    }

    let value = inline;
    if (value === undefined) {
      const next = tokens[i + 1];
      if (next !== undefined && !next.startsWith('--')) {
        value = next;
        i++;
      }
    }
    if (!value) {
      throw new ConfigError(`--${name} requires a value`);
    }
    result[name] = value;
  }

  return result;
}

export function getStringArg(args: CliArgs, key: string): string | undefined {
  const value = args[key];
  return typeof value === 'string' ? value : undefined;
}

export function resolveBooleanFlag(
  cliValue: string | boolean | undefined,
  envValue: string | undefined,
  fallback: boolean
): boolean {
  if (typeof cliValue === 'boolean') return cliValue;
  if (typeof envValue === 'string') {
    const parsed = parseBoolean(envValue);
    if (parsed !== undefined) return parsed;
  }
  return fallback;
}
