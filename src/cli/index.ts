import { readFile } from 'node:fs/promises';
import { createRequire } from 'node:module';
import { rootCertificates } from 'node:tls';

import { Command, CommanderError } from 'commander';
import { z } from 'zod';

import { DEFAULT_DIAL_TIMEOUT_MS } from '../constants.js';
import { createClient } from '../core/client.js';
import { UndiciTransport } from '../transport/undici.js';
import { createColors, supportsColor, type Colors } from '../utils/colors.js';
import { StreamLogger, debugEnabled, type OutputStream } from '../utils/logger.js';
import { formatFailure, formatResult } from './format.js';
import { cliOptionsSchema, describeOptionIssues } from './options.js';

export interface CliIo {
  stdout: OutputStream;
  stderr: OutputStream;
  env?: NodeJS.ProcessEnv;
}

const manifestSchema = z.object({ version: z.string() });

function readVersion(): string {
  const require = createRequire(import.meta.url);
  return manifestSchema.parse(require('../../package.json')).version;
}

/**
 * Bundled roots plus the caller's authority; a bare `ca` would replace the roots
 */
export function trustedAuthorities(extra: string): string[] {
  return [...rootCertificates, extra];
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

async function execute(
  url: string,
  address: string | undefined,
  rawOptions: Record<string, unknown>,
  io: CliIo,
  env: NodeJS.ProcessEnv,
  colors: Colors
): Promise<number> {
  const parsed = cliOptionsSchema.safeParse(rawOptions);
  if (!parsed.success) {
    for (const line of describeOptionIssues(parsed.error)) {
      io.stderr.write(colors.red(`error: ${line}`) + '\n');
    }
    return 1;
  }
  const options = parsed.data;

  let ca: string | undefined;
  if (options.ca !== undefined) {
    try {
      ca = await readFile(options.ca, 'utf8');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      io.stderr.write(colors.red(`reading CA file failed: ${message}`) + '\n');
      return 1;
    }
  }

  const logger = options.verbose || debugEnabled(env)
    ? new StreamLogger({ stream: io.stderr, level: 'debug', env })
    : undefined;

  const transport = new UndiciTransport({
    connectTimeout: options.connectTimeout,
    http2: options.http2,
    tls: ca === undefined ? undefined : { ca: trustedAuthorities(ca) },
    onDial: (info) => logger?.debug({ ...info }, 'dialing'),
  });
  const client = createClient({
    transport,
    logger,
    headers: options.header,
    closeIdleConnections: true,
  });
  const signal = options.timeout === undefined ? undefined : AbortSignal.timeout(options.timeout);

  try {
    const result = await client.fetch(url, { override: address, signal });
    io.stdout.write(formatResult(result, createColors(supportsColor(io.stdout, env))));
    return 0;
  } catch (error) {
    io.stderr.write(formatFailure(error, colors) + '\n');
    return 1;
  } finally {
    await transport.close();
  }
}

/**
 * Run the command line against user arguments (argv without node and script).
 *
 * @returns process exit code
 */
export async function runCli(
  argv: readonly string[],
  io: CliIo = { stdout: process.stdout, stderr: process.stderr }
): Promise<number> {
  const env = io.env ?? process.env;
  const colors = createColors(supportsColor(io.stderr, env));
  let exitCode = 0;

  const program = new Command()
    .name('dialfetch')
    .description('GET a URL over a connection to a chosen address, keeping the URL host for Host and TLS')
    .version(readVersion())
    .argument('<url>', 'http or https URL to fetch')
    .argument('[address]', 'host or IP to connect to instead of the URL host')
    .option('--connect-timeout <ms>', 'bound on opening the connection', String(DEFAULT_DIAL_TIMEOUT_MS))
    .option('--timeout <ms>', 'bound on the whole fetch')
    .option('--no-http2', 'do not offer HTTP/2 on TLS connections')
    .option('--ca <file>', 'extra PEM certificate authority to trust')
    .option('-H, --header <header>', 'request header "Name: value", repeatable', collect, [])
    .option('-v, --verbose', 'log dialing and connection details to stderr', false)
    .addHelpText('after', `
${colors.bold(colors.yellow('Examples:'))}
  ${colors.green('$ dialfetch https://example.com/')}
  ${colors.green('$ dialfetch https://example.com/ 203.0.113.7')}
  ${colors.green('$ dialfetch -H "Accept: text/plain" http://service.internal:8080/health 10.0.0.12')}
`)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => {
        io.stdout.write(str);
      },
      writeErr: (str) => {
        io.stderr.write(str);
      },
    })
    .action(async (url: string, address: string | undefined, options: Record<string, unknown>) => {
      exitCode = await execute(url, address, options, io, env, colors);
    });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }
  return exitCode;
}
