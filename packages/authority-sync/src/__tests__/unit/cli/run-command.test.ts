/**
 * Run Command Tests
 *
 * Only the paths that stop before any network access.
 */

import { describe, it, expect, vi } from 'vitest';
import Database from 'better-sqlite3';
import { tmpdir } from 'node:os';
import {
  createReviewSources,
  createRunCoordinator,
  executeRun,
  runOverrides,
} from '../../../cli/commands/run.js';
import { loadConfig } from '../../../cli/lib/config.js';
import { EXIT_CODES } from '../../../cli/lib/exit-codes.js';
import { initializeLedgerSchema } from '../../../persistence/ledger.js';
import { RecordExtractor } from '../../../extraction/record-extractor.js';
import { WikibaseGateway } from '../../../reconciliation/wikibase-gateway.js';
import { RunCoordinator } from '../../../services/run-coordinator.js';

describe('runOverrides', () => {
  it('should map command options onto config overrides', () => {
    expect(runOverrides({ maxPages: '3', ledger: 'l.db', reportDir: 'out' })).toEqual({
      maxPages: 3,
      ledgerPath: 'l.db',
      reportDir: 'out',
    });
    expect(runOverrides({})).toEqual({});
  });

  it('should turn annotation off only for --no-annotate', () => {
    expect(runOverrides({ annotate: false })).toEqual({ annotate: false });
    expect(runOverrides({ annotate: true })).toEqual({});
  });
});

describe('executeRun', () => {
  it('should refuse a live run without an access token', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const config = loadConfig({ cwd: tmpdir(), env: {} });

    await expect(executeRun(config)).resolves.toBe(EXIT_CODES.CONFIG_ERROR);
    expect(errorSpy).toHaveBeenCalledWith(
      'Configuration error: KB_ACCESS_TOKEN is required unless --dry-run is set'
    );
  });
});

describe('createRunCoordinator', () => {
  it('should wire a coordinator around an open ledger', () => {
    const db = new Database(':memory:');
    initializeLedgerSchema(db);
    const config = loadConfig({ cwd: tmpdir(), env: { KB_ACCESS_TOKEN: 'test-secret' } });

    expect(createRunCoordinator(config, db)).toBeInstanceOf(RunCoordinator);
    db.close();
  });
});

describe('createReviewSources', () => {
  it('should look entities up in the knowledge base and headings in authority records', () => {
    const sources = createReviewSources(loadConfig({ cwd: tmpdir(), env: {} }));

    expect(sources.entities).toBeInstanceOf(WikibaseGateway);
    expect(sources.authorities).toBeInstanceOf(RecordExtractor);
  });
});
