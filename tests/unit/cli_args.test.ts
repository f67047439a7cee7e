import { describe, expect, it } from 'vitest';
import { parseScreenArgs } from '@/run/cli_args';

describe('parseScreenArgs', () => {
  it('defaults to a full screen with cache and write enabled', () => {
    expect(parseScreenArgs([])).toEqual({ request: {}, useCache: true, write: true });
  });

  it('reads flags in both spellings', () => {
    expect(
      parseScreenArgs([
        '--sectors=Defence, Energy',
        '--exchanges',
        'nyse,nasdaq',
        '--names',
        '3',
        '--stack=8',
        '--verify-sectors',
        '--no-cache',
        '--no-write',
      ])
    ).toEqual({
      request: {
        sectors: ['Defence', 'Energy'],
        exchanges: ['NYSE', 'NASDAQ'],
        namesPerSector: 3,
        stackCap: 8,
        verifySectors: true,
      },
      useCache: false,
      write: false,
    });
  });

  it('treats positional arguments as symbols', () => {
    expect(parseScreenArgs(['lmt,noc', 'xom']).request).toEqual({
      symbols: ['LMT', 'NOC', 'XOM'],
    });
  });

  it('rejects bad input', () => {
    expect(() => parseScreenArgs(['--stack', '0'])).toThrow(
      '--stack expects a positive integer, got "0"'
    );
    expect(() => parseScreenArgs(['--names'])).toThrow('--names expects a value');
    expect(() => parseScreenArgs(['--sectors', '--no-cache'])).toThrow('--sectors expects a value');
    expect(() => parseScreenArgs(['--verbose'])).toThrow('Unknown option --verbose');
  });
});
