import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { readFileSync } from 'fs';
import { join } from 'path';

import {
  CONNECTION_TIMEOUT_MS,
  DEFAULT_MANAGEMENT_ADDRESS,
  DEFAULT_MANAGEMENT_URL,
  DEFAULT_TLS_ALPN_ADDRESS,
  VALIDATION_TIMEOUT_MS,
} from '../lib/constants/defaults.js';
import { handleError } from './utils/errors.js';
import { handleServeCommand } from './commands/serve.js';
import { handleAddCommand } from './commands/add.js';
import { handleDelCommand } from './commands/del.js';
import { handleCheckCommand } from './commands/check.js';

const TEST_ENV = 'TLS_ALPN_CLI_TEST';

function readPackageVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', '..', 'package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

function parseMilliseconds(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new InvalidArgumentError('Expected a positive number of milliseconds.');
  }
  return ms;
}

/** Build a Commander program instance for the tls-alpn-testsrv CLI. */
export function createCli(): Command {
  const program = new Command();

  program
    .name('tls-alpn-testsrv')
    .description('TLS-ALPN-01 challenge test server for ACME issuance pipelines')
    .version(readPackageVersion());

  // In test mode override default exit (help, errors) to throw instead of process.exit
  if (process.env[TEST_ENV]) {
    program.exitOverride();
  }

  // Helper deciding whether to exit (skip during tests)
  function exitOnError() {
    if (process.env[TEST_ENV]) return; // allow tests to assert thrown errors
    process.exit(1);
  }

  program
    .command('serve')
    .description('Run the TLS-ALPN-01 challenge server and its management API')
    .option('--tlsalpn01 <address>', 'TLS-ALPN-01 listen address', DEFAULT_TLS_ALPN_ADDRESS)
    .option('--management <address>', 'Management API listen address', DEFAULT_MANAGEMENT_ADDRESS)
    .option('--no-management', 'Run without the management API')
    .option('--timeout <ms>', 'Per-connection inactivity timeout', parseMilliseconds, CONNECTION_TIMEOUT_MS)
    .action(async (opts: { tlsalpn01: string; management: string | false; timeout: number }) => {
      try {
        await handleServeCommand({
          tlsalpn01: opts.tlsalpn01,
          management: opts.management,
          timeout: opts.timeout,
        });
      } catch (e) {
        handleError(e);
        exitOnError();
      }
    });

  program
    .command('add')
    .description('Register a TLS-ALPN-01 challenge on a running server')
    .argument('<host>', 'Hostname the challenge is for')
    .argument('<keyAuthorization>', 'Key authorization to prove')
    .option('-s, --server <url>', 'Management API base URL', DEFAULT_MANAGEMENT_URL)
    .action(async (host: string, keyAuthorization: string, opts: { server: string }) => {
      try {
        await handleAddCommand({ host, keyAuthorization, server: opts.server });
      } catch (e) {
        handleError(e);
        exitOnError();
      }
    });

  program
    .command('del')
    .description('Remove a TLS-ALPN-01 challenge from a running server')
    .argument('<host>', 'Hostname to remove')
    .option('-s, --server <url>', 'Management API base URL', DEFAULT_MANAGEMENT_URL)
    .action(async (host: string, opts: { server: string }) => {
      try {
        await handleDelCommand({ host, server: opts.server });
      } catch (e) {
        handleError(e);
        exitOnError();
      }
    });

  program
    .command('check')
    .description('Validate a TLS-ALPN-01 responder the way a CA would')
    .argument('<domain>', 'Domain to validate (sent as SNI)')
    .argument('<keyAuthorization>', 'Expected key authorization')
    .option('-c, --connect <address>', 'host:port to dial instead of <domain>:443')
    .option('--timeout <ms>', 'Handshake timeout', parseMilliseconds, VALIDATION_TIMEOUT_MS)
    .action(async (domain: string, keyAuthorization: string, opts: { connect?: string; timeout: number }) => {
      try {
        const ok = await handleCheckCommand({
          domain,
          keyAuthorization,
          ...(opts.connect ? { connect: opts.connect } : {}),
          timeout: opts.timeout,
        });
        if (!ok) exitOnError();
      } catch (e) {
        handleError(e);
        exitOnError();
      }
    });

  return program;
}

/** For tests: parse arguments and return the program (no automatic exit). */
export async function runCli(argv: string[]): Promise<Command> {
  const program = createCli();
  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err: unknown) {
    const ignorable = ['commander.helpDisplayed', 'commander.version'];
    if (process.env[TEST_ENV] && err instanceof CommanderError && ignorable.includes(err.code)) {
      // help and version output are not failures
    } else {
      throw err;
    }
  }
  return program;
}
