/**
 * Argument parsing for the screen CLI.
 */

import type { ScreenRequest } from './builder';

export interface ScreenCliArgs {
  request: ScreenRequest;
  useCache: boolean;
  write: boolean;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parsePositiveInt(flag: string, value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`${flag} expects a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Accepts `--flag=value` and `--flag value`. Anything that is not a flag is
 * a symbol to screen.
 */
export function parseScreenArgs(argv: readonly string[]): ScreenCliArgs {
  const request: ScreenRequest = {};
  const symbols: string[] = [];
  let useCache = true;
  let write = true;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      symbols.push(...splitList(arg.toUpperCase()));
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq >= 0 ? arg.slice(0, eq) : arg;
    const takeValue = (): string => {
      if (eq >= 0) return arg.slice(eq + 1);
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new Error(`${flag} expects a value`);
      }
      i++;
      return next;
    };

    switch (flag) {
      case '--sectors':
        request.sectors = splitList(takeValue());
        break;
      case '--exchanges':
        request.exchanges = splitList(takeValue()).map((e) => e.toUpperCase());
        break;
      case '--names':
        request.namesPerSector = parsePositiveInt(flag, takeValue());
        break;
      case '--stack':
        request.stackCap = parsePositiveInt(flag, takeValue());
        break;
      case '--verify-sectors':
        request.verifySectors = true;
        break;
      case '--no-cache':
        useCache = false;
        break;
      case '--no-write':
        write = false;
        break;
      default:
        throw new Error(`Unknown option ${flag}`);
    }
  }

  if (symbols.length > 0) {
    request.symbols = symbols;
  }
  return { request, useCache, write };
}
