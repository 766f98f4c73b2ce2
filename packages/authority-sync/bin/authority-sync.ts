#!/usr/bin/env tsx
/**
 * Authority Sync CLI Entry Point
 *
 * Batch reconciliation of name-authority changes into a knowledge base.
 *
 * @module authority-sync-cli
 */

import { Command } from 'commander';
import { config as loadDotenv } from 'dotenv';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import {
  applyLogSettings,
  loadConfig,
  type LoadConfigOptions,
  type SyncConfig,
} from '../src/cli/lib/config.js';
import { EXIT_CODES } from '../src/cli/lib/exit-codes.js';
import { registerRunCommand } from '../src/cli/commands/run.js';
import { registerLedgerCommands } from '../src/cli/commands/ledger/index.js';
import { registerReportsCommands } from '../src/cli/commands/reports/index.js';
import { errorMessage } from '../src/core/errors.js';
import { setLogLevel } from '../src/core/utils/logger.js';

// ============================================================================
// CLI Setup
// ============================================================================

interface GlobalOptions {
  readonly verbose?: boolean;
  readonly quiet?: boolean;
  readonly json?: boolean;
  readonly dryRun?: boolean;
  readonly config?: string;
  readonly timeout?: string;
}

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return typeof packageJson.version === 'string' ? packageJson.version : '0.0.0';
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('authority-sync')
    .description('Reconcile name-authority changes into a knowledge base')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable debug logging')
    .option('-q, --quiet', 'Log warnings and errors only')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--dry-run', 'Compute decisions and report without writing')
    .option('--config <path>', 'Path to config file (default: .authority-syncrc)')
    .option('--timeout <ms>', 'HTTP timeout in milliseconds')
    .hook('preAction', (thisCommand) => {
      const options = thisCommand.opts<GlobalOptions>();
      if (options.verbose) setLogLevel('debug');
      else if (options.quiet) setLogLevel('warn');
    });

  const resolveConfig = (extra: LoadConfigOptions['overrides'] = {}): SyncConfig => {
    const options = program.opts<GlobalOptions>();
    const config = loadConfig({
      ...(options.config !== undefined ? { configPath: options.config } : {}),
      overrides: {
        ...(options.verbose !== undefined ? { verbose: options.verbose } : {}),
        ...(options.json !== undefined ? { json: options.json } : {}),
        ...(options.dryRun !== undefined ? { dryRun: options.dryRun } : {}),
        ...(options.timeout !== undefined ? { timeout: Number(options.timeout) } : {}),
        ...extra,
      },
    });
    applyLogSettings(config);
    return config;
  };

  registerRunCommand(program, (overrides) => resolveConfig(overrides));
  registerLedgerCommands(program, () => resolveConfig());
  registerReportsCommands(program, () => resolveConfig());

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  loadDotenv();

  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(EXIT_CODES.LEDGER_FATAL);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.LEDGER_FATAL);
});
