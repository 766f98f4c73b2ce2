/**
 * CLI Configuration Tests
 *
 * Each test gets its own temp directory as the config search root and an
 * explicit environment, so nothing from the host leaks in.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError } from '../../../core/errors.js';
import { applyLogSettings, DEFAULT_CONFIG, loadConfig, lockStaleAfterMs } from '../../../cli/lib/config.js';
import { setLogLevel } from '../../../core/utils/logger.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'authority-sync-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeRc(content: string, name = '.authority-syncrc'): string {
    const path = join(dir, name);
    writeFileSync(path, content);
    return path;
  }

  it('should fall back to defaults with paths under the working directory', () => {
    const config = loadConfig({ cwd: dir, env: {} });

    expect(config.configPath).toBeNull();
    expect(config.feed.baseUrl).toBe(DEFAULT_CONFIG.feed.baseUrl);
    expect(config.feed.maxPages).toBe(50);
    expect(config.http.retries).toBe(3);
    expect(config.paths.ledger).toBe(join(dir, 'data', 'ledger.sqlite3'));
    expect(config.paths.reports).toBe(join(dir, 'data', 'reports'));
    expect(config.knowledgeBase.accessToken).toBeUndefined();
    expect(config.dryRun).toBe(false);
  });

  it('should read a YAML config file and resolve paths against its directory', () => {
    const rcPath = writeRc(['feed:', '  max_pages: 5', 'paths:', '  ledger: state/ledger.db', ''].join('\n'));
    const nested = join(dir, 'nested', 'deeper');
    mkdirSync(nested, { recursive: true });

    const config = loadConfig({ cwd: nested, env: {} });

    expect(config.configPath).toBe(rcPath);
    expect(config.feed.maxPages).toBe(5);
    expect(config.paths.ledger).toBe(join(dir, 'state', 'ledger.db'));
  });

  it('should read a JSON config file named explicitly', () => {
    writeRc(JSON.stringify({ http: { timeout: 1500 }, dry_run: true }), 'sync.json');

    const config = loadConfig({ cwd: dir, env: {}, configPath: 'sync.json' });

    expect(config.http.timeoutMs).toBe(1500);
    expect(config.dryRun).toBe(true);
  });

  it('should let the environment override the file and flags override both', () => {
    writeRc('feed:\n  max_pages: 5\n');
    const env = { AUTHORITY_SYNC_MAX_PAGES: '7', AUTHORITY_SYNC_DRY_RUN: 'true' };

    expect(loadConfig({ cwd: dir, env }).feed.maxPages).toBe(7);
    expect(loadConfig({ cwd: dir, env }).dryRun).toBe(true);

    const flagged = loadConfig({ cwd: dir, env, overrides: { maxPages: 9, dryRun: false } });
    expect(flagged.feed.maxPages).toBe(9);
    expect(flagged.dryRun).toBe(false);
  });

  it('should annotate reports by default and honour the review section', () => {
    expect(loadConfig({ cwd: dir, env: {} }).review).toEqual({ annotate: true, labelLanguage: 'en' });

    writeRc('review:\n  annotate: false\n  label_language: de\n');
    expect(loadConfig({ cwd: dir, env: {} }).review).toEqual({ annotate: false, labelLanguage: 'de' });
    expect(loadConfig({ cwd: dir, env: { AUTHORITY_SYNC_ANNOTATE: 'true' } }).review.annotate).toBe(true);
    expect(
      loadConfig({ cwd: dir, env: { AUTHORITY_SYNC_ANNOTATE: 'true' }, overrides: { annotate: false } }).review
        .annotate
    ).toBe(false);
  });

  it('should take the access token from KB_ACCESS_TOKEN', () => {
    const config = loadConfig({ cwd: dir, env: { KB_ACCESS_TOKEN: 'test-secret' } });

    expect(config.knowledgeBase.accessToken).toBe('test-secret');
  });

  it('should ignore empty environment values', () => {
    const config = loadConfig({ cwd: dir, env: { AUTHORITY_SYNC_MAX_PAGES: '', KB_ACCESS_TOKEN: '' } });

    expect(config.feed.maxPages).toBe(50);
    expect(config.knowledgeBase.accessToken).toBeUndefined();
  });

  it('should reject a non-numeric environment value', () => {
    expect(() => loadConfig({ cwd: dir, env: { AUTHORITY_SYNC_MAX_PAGES: 'many' } })).toThrow(ConfigError);
    expect(() => loadConfig({ cwd: dir, env: { AUTHORITY_SYNC_MAX_PAGES: 'many' } })).toThrow(
      /^Invalid configuration: feed\.maxPages: /
    );
  });

  it('should reject a non-http feed URL', () => {
    expect(() => loadConfig({ cwd: dir, env: { AUTHORITY_SYNC_FEED_URL: 'ftp://feed.example.org/' } })).toThrow(
      'Invalid configuration: feed.baseUrl: must be an http(s) URL'
    );
  });

  it('should reject unknown keys in the config file', () => {
    writeRc('feed:\n  max_pages: 5\nunknown_key: 1\n');

    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(/Unrecognized key/);
  });

  it('should report a config file that does not parse', () => {
    writeRc('feed: [unclosed\n');

    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(/^Cannot read config file /);
  });

  it('should fail when an explicit config file is missing', () => {
    expect(() => loadConfig({ cwd: dir, env: {}, configPath: 'absent.yaml' })).toThrow(
      `Config file not found: ${join(dir, 'absent.yaml')}`
    );
  });
});

describe('lockStaleAfterMs', () => {
  it('should convert the configured hours', () => {
    const config = loadConfig({ cwd: tmpdir(), env: { AUTHORITY_SYNC_LOCK_STALE_HOURS: '2' } });

    expect(lockStaleAfterMs(config)).toBe(2 * 60 * 60 * 1000);
  });
});

describe('applyLogSettings', () => {
  afterEach(() => {
    setLogLevel(process.env.LOG_LEVEL === undefined ? 'error' : null);
  });

  it('should take verbose from AUTHORITY_SYNC_VERBOSE', () => {
    expect(loadConfig({ cwd: tmpdir(), env: { AUTHORITY_SYNC_VERBOSE: '1' } }).verbose).toBe(true);
    expect(loadConfig({ cwd: tmpdir(), env: {} }).verbose).toBe(false);
  });

  it('should turn on debug logging when verbose', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    setLogLevel('error');

    applyLogSettings(loadConfig({ cwd: tmpdir(), env: { AUTHORITY_SYNC_VERBOSE: 'true' } }));

    expect(debug).toHaveBeenCalledTimes(1);
    expect(String(debug.mock.calls[0]?.[0])).toContain('Configuration loaded');
  });

  it('should leave the log level alone when not verbose', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    setLogLevel('error');

    applyLogSettings(loadConfig({ cwd: tmpdir(), env: {} }));

    expect(debug).not.toHaveBeenCalled();
  });
});
