/**
 * Run Coordinator Tests
 *
 * End-to-end runs over in-process collaborators: ledger marking rules,
 * per-tuple failure isolation, aborts and the run lock.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { FeedWalker } from '../../../acquisition/feed-walker.js';
import { CONFLICT_REASONS, NO_ACTION_REASONS } from '../../../core/constants.js';
import { LedgerWriteError, RunLockedError } from '../../../core/errors.js';
import type { ActivityTuple } from '../../../core/types.js';
import { RecordExtractor } from '../../../extraction/record-extractor.js';
import type { Ledger } from '../../../persistence/ledger.js';
import { SqliteLedger, initializeLedgerSchema } from '../../../persistence/ledger.js';
import { RunLock } from '../../../persistence/run-lock.js';
import { EntityMerger } from '../../../reconciliation/entity-merger.js';
import { RunCoordinator } from '../../../services/run-coordinator.js';
import {
  FakeFeedSource,
  FakeRecordSource,
  InMemoryKnowledgeBase,
  fixedClock,
  tuple,
  type MarcFixture,
} from '../../utils/fakes.js';

const now = fixedClock('2024-05-02T15:30:00.000Z');

const newClaim = tuple('no2023000111', '2024-05-01', '2024-05-02');
const headingChange = tuple('n79021164', '2024-05-01', '2024-05-02');
const conflict = tuple('n123', '2024-04-30', '2024-05-01');
const noReference = tuple('n555', '2024-04-30', '2024-05-01');
const unavailable = tuple('n777', '2024-04-29', '2024-04-30');

const records: MarcFixture[] = [
  { authorityId: 'no2023000111', heading: 'Smith, John', sourceUrls: ['https://www.wikidata.org/wiki/Q1001'] },
  { authorityId: 'n79021164', heading: 'Doe, Jane, 1950-2024', crossReferences: ['Q2'] },
  { authorityId: 'n123', heading: 'Someone, New', crossReferences: ['Q6'] },
  { authorityId: 'n555', heading: 'Nobody, A.' },
];

function knowledgeBase(): InMemoryKnowledgeBase {
  return new InMemoryKnowledgeBase()
    .withEntity('Q1001')
    .withEntity('Q2', [{ value: 'n79021164', namedAs: ['Doe, Jane'], references: [{ statedIn: 'Q36578', retrieved: '2019-01-01' }] }])
    .withEntity('Q6', [{ value: 'n456' }, { value: 'n789' }]);
}

describe('RunCoordinator', () => {
  let db: Database.Database;
  let ledger: SqliteLedger;

  beforeEach(() => {
    db = new Database(':memory:');
    initializeLedgerSchema(db);
    ledger = new SqliteLedger(db);
  });

  afterEach(() => {
    db.close();
  });

  function coordinator(options: {
    pages: ActivityTuple[][];
    source?: FakeFeedSource;
    recordSource?: FakeRecordSource;
    kb?: InMemoryKnowledgeBase;
    dryRun?: boolean;
    markLedger?: Pick<Ledger, 'markCompleted'>;
    lock?: RunLock;
  }) {
    const source = options.source ?? new FakeFeedSource(options.pages);
    const recordSource = options.recordSource ?? FakeRecordSource.of(records);
    const kb = options.kb ?? knowledgeBase();

    const run = new RunCoordinator({
      walker: new FeedWalker(source, ledger),
      extractor: new RecordExtractor(recordSource),
      merger: new EntityMerger(kb, { now, dryRun: options.dryRun }),
      ledger: options.markLedger ?? ledger,
      lock: options.lock,
      dryRun: options.dryRun,
      now,
      runId: 'run-test',
    });

    return { run, source, recordSource, kb };
  }

  it('should report one decision per tuple in feed order and mark settled tuples', async () => {
    const { run } = coordinator({
      pages: [[newClaim, headingChange, conflict, noReference, unavailable], []],
    });

    const report = await run.run();

    expect(report.runId).toBe('run-test');
    expect(report.startedAt).toBe('2024-05-02T15:30:00.000Z');
    expect(report.pagesWalked).toBe(2);
    expect(report.abort).toBeUndefined();
    expect(report.entries.map((entry) => [entry.tuple.authorityId, entry.entityId, entry.outcome.kind])).toEqual([
      ['no2023000111', 'Q1001', 'claim_added'],
      ['n79021164', 'Q2', 'qualifier_updated'],
      ['n123', 'Q6', 'conflict_flagged'],
      ['n555', undefined, 'no_action'],
      ['n777', undefined, 'fetch_error'],
    ]);
    expect(report.counts).toEqual({
      no_action: 1,
      qualifier_updated: 1,
      claim_added: 1,
      conflict_flagged: 1,
      fetch_error: 1,
    });

    expect(report.entries[3]?.outcome).toEqual({ kind: 'no_action', reason: NO_ACTION_REASONS.noReference });
    expect(report.entries[4]?.outcome).toEqual({
      kind: 'fetch_error',
      errorCode: 'record_unavailable',
      message: `Record ${unavailable.recordRef} unavailable: HTTP 404`,
    });

    expect(await ledger.has(newClaim.uniqueId)).toBe(true);
    expect(await ledger.has(headingChange.uniqueId)).toBe(true);
    expect(await ledger.has(conflict.uniqueId)).toBe(true);
    expect(await ledger.has(noReference.uniqueId)).toBe(true);
    expect(await ledger.has(unavailable.uniqueId)).toBe(false);
  });

  it('should retry only the failed tuple on the next run', async () => {
    const kb = knowledgeBase();
    const pages = [[newClaim, headingChange, unavailable], []];

    await coordinator({ pages, kb }).run.run();
    const second = await coordinator({ pages, kb }).run.run();

    expect(second.entries.map((entry) => entry.tuple.uniqueId)).toEqual([unavailable.uniqueId]);
    expect(kb.writes).toHaveLength(2);
  });

  it('should apply nothing twice when the feed repeats a tuple', async () => {
    const { run, kb, recordSource } = coordinator({ pages: [[newClaim], [newClaim], []] });

    const report = await run.run();

    expect(report.entries).toHaveLength(1);
    expect(recordSource.fetched).toEqual([newClaim.recordRef]);
    expect(kb.writes).toHaveLength(1);
  });

  it('should flag a record with several knowledge-base ids without touching any entity', async () => {
    const ambiguous = tuple('n900', '2024-05-01', '2024-05-02');
    const recordSource = FakeRecordSource.of([
      { authorityId: 'n900', heading: 'Twin, A.', crossReferences: ['Q20', 'Q3'] },
    ]);
    const { run, kb } = coordinator({ pages: [[ambiguous]], recordSource });

    const report = await run.run();

    expect(report.entries[0]?.outcome).toEqual({
      kind: 'conflict_flagged',
      reason: CONFLICT_REASONS.multipleCandidates,
      existingValues: ['Q20', 'Q3'],
    });
    expect(kb.fetched).toEqual([]);
    expect(await ledger.has(ambiguous.uniqueId)).toBe(true);
  });

  it('should not mark a tuple whose write was rejected', async () => {
    const kb = knowledgeBase().rejectWrites('Q1001');
    const { run } = coordinator({ pages: [[newClaim, headingChange]], kb });

    const report = await run.run();

    expect(report.entries[0]).toEqual({
      tuple: newClaim,
      entityId: 'Q1001',
      outcome: {
        kind: 'fetch_error',
        errorCode: 'entity_write',
        message: 'Write to Q1001 failed: permissiondenied: editing is blocked',
      },
    });
    expect(report.entries[1]?.outcome.kind).toBe('qualifier_updated');
    expect(await ledger.has(newClaim.uniqueId)).toBe(false);
    expect(await ledger.has(headingChange.uniqueId)).toBe(true);
  });

  it('should not mark a tuple whose entity could not be fetched', async () => {
    const kb = knowledgeBase().markUnavailable('Q2');
    const { run } = coordinator({ pages: [[headingChange]], kb });

    const report = await run.run();

    expect(report.entries[0]?.outcome).toMatchObject({ kind: 'fetch_error', errorCode: 'entity_unavailable' });
    expect(await ledger.has(headingChange.uniqueId)).toBe(false);
  });

  it('should abort without marking anything when the feed fails', async () => {
    const source = new FakeFeedSource([[newClaim], [headingChange]]).failPage(2);
    const { run, recordSource } = coordinator({ pages: [], source });

    const report = await run.run();

    expect(report.abort).toEqual({
      errorCode: 'feed_fetch',
      message: 'Feed page 2: HTTP 503',
      fatal: false,
    });
    expect(report.entries).toEqual([]);
    expect(recordSource.fetched).toEqual([]);
    expect((await ledger.stats()).total).toBe(0);
  });

  it('should stop the run on a ledger write failure', async () => {
    let marks = 0;
    const failingLedger: Pick<Ledger, 'markCompleted'> = {
      async markCompleted(uniqueId: string): Promise<void> {
        marks += 1;
        if (marks === 2) {
          throw new LedgerWriteError(uniqueId, 'disk I/O error');
        }
      },
    };
    const { run, recordSource } = coordinator({
      pages: [[newClaim, headingChange, noReference]],
      markLedger: failingLedger,
    });

    const report = await run.run();

    expect(report.abort).toEqual({
      errorCode: 'ledger_write',
      message: `Ledger write for ${headingChange.uniqueId} failed: disk I/O error`,
      fatal: true,
    });
    expect(report.entries).toHaveLength(2);
    expect(recordSource.fetched).toHaveLength(2);
  });

  it('should compute decisions without writes or ledger marks in dry run', async () => {
    const { run, kb } = coordinator({ pages: [[newClaim, headingChange]], dryRun: true });

    const report = await run.run();

    expect(report.dryRun).toBe(true);
    expect(report.entries.map((entry) => entry.outcome.kind)).toEqual(['claim_added', 'qualifier_updated']);
    expect(kb.writes).toEqual([]);
    expect((await ledger.stats()).total).toBe(0);
  });

  it('should refuse to run while another run holds the lock', async () => {
    const lock = new RunLock(db, { now });
    lock.acquire('other-run');
    const { run, source } = coordinator({ pages: [[newClaim]], lock });

    await expect(run.run()).rejects.toBeInstanceOf(RunLockedError);
    expect(source.fetchedPages).toEqual([]);
  });

  it('should release the lock when the run ends', async () => {
    const lock = new RunLock(db, { now });
    const { run } = coordinator({ pages: [[newClaim]], lock });

    await run.run();

    expect(lock.holder()).toBeNull();
  });

  it('should freeze the report', async () => {
    const { run } = coordinator({ pages: [[newClaim]] });

    const report = await run.run();

    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.entries)).toBe(true);
  });
});
