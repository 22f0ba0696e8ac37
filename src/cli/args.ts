/**
 * Command-line flags
 *
 * Flags are a convenience layer over the environment: each one is copied into
 * the matching variable before the application boots, so validation and
 * defaults stay in env.validation.ts.
 */

import { parseArgs } from 'node:util';

const FLAG_TO_ENV = [
  ['interface', 'INTERFACE'],
  ['prefix-length', 'PREFIX_LENGTH'],
  ['polling-interval', 'POLLING_INTERVAL'],
  ['file', 'STATE_FILE'],
  ['port', 'PORT'],
  ['host', 'HOST'],
] as const;

export interface CliArgs {
  help: boolean;
  /** Environment variables set by flags */
  env: Record<string, string>;
}

export const USAGE = `Usage: ifwatch [options]

Options:
  -i, --interface <name>          Interface name (default: eth0)
  -p, --prefix-length <bits>      IPv6 network prefix length used when masking the
                                  interface's first assigned address (default: 64)
  -d, --polling-interval <secs>   Polling interval in seconds (default: 10)
  -f, --file <path>               Persist state in this file (default: interface.state)
      --port <port>               HTTP port (default: 9101)
      --host <host>               HTTP bind address (default: 0.0.0.0)
  -h, --help                      Show this help
`;

/**
 * Parse process arguments (without the node binary and script path).
 * Throws on unknown flags or missing values.
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      interface: { type: 'string', short: 'i' },
      'prefix-length': { type: 'string', short: 'p' },
      'polling-interval': { type: 'string', short: 'd' },
      file: { type: 'string', short: 'f' },
      port: { type: 'string' },
      host: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
    allowPositionals: false,
  });

  const env: Record<string, string> = {};
  for (const [flag, variable] of FLAG_TO_ENV) {
    const value = values[flag];
    if (value !== undefined) {
      env[variable] = value;
    }
  }

  return { help: values.help ?? false, env };
}
