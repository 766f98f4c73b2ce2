/**
 * Report Archive Tests
 *
 * Reports are published into a temp directory and read back.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { formatRecentActions } from '../../../cli/commands/reports/recent.js';
import { listRecentActions, parseReportLog, recentReportFiles } from '../../../reporting/report-archive.js';
import { renderXmlReport } from '../../../reporting/report-builder.js';
import { ReportPublisher } from '../../../reporting/report-publisher.js';
import { RunReportAccumulator } from '../../../services/run-report.js';
import { tuple } from '../../utils/fakes.js';
import { emptyReport, mixedReport } from '../../utils/reports.js';

const now = new Date('2024-05-10T12:00:00.000Z');

function oldReport() {
  const report = new RunReportAccumulator('run-old', new Date('2024-04-01T09:00:00.000Z'), false);
  report.record({
    tuple: tuple('n1', '2024-03-30', '2024-03-31'),
    entityId: 'Q1',
    outcome: { kind: 'qualifier_updated', new: 'Old, Heading' },
  });
  return report.finalize(new Date('2024-04-01T09:05:00.000Z'));
}

describe('parseReportLog', () => {
  it('should read the actions of a rendered log in order', () => {
    expect(parseReportLog(renderXmlReport(mixedReport()))).toEqual([
      { runId: 'run-1', startedAt: '2024-05-02T15:30:00.000Z', authorityId: 'no2023000111', entityId: 'Q1001', action: 'ADD_CLAIM' },
      { runId: 'run-1', startedAt: '2024-05-02T15:30:00.000Z', authorityId: 'n79021164', entityId: 'Q2', action: 'NAMED_AS_CHANGE' },
      { runId: 'run-1', startedAt: '2024-05-02T15:30:00.000Z', authorityId: 'n123', entityId: 'Q6', action: 'NEED_REVIEW' },
      { runId: 'run-1', startedAt: '2024-05-02T15:30:00.000Z', authorityId: 'n777', entityId: '', action: 'ERROR' },
    ]);
  });

  it('should read a log without entries', () => {
    expect(parseReportLog(renderXmlReport(emptyReport()))).toEqual([]);
  });

  it('should reject a document that is not an activity log', () => {
    expect(() => parseReportLog('<html><body/></html>')).toThrow('not an activity log');
  });
});

describe('listRecentActions', () => {
  let dir: string;

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), 'authority-sync-archive-'));
    const publisher = new ReportPublisher(dir);
    await publisher.publish(mixedReport());
    await publisher.publish(oldReport());
    writeFileSync(join(dir, '2024-05-03T000000Z-broken.xml'), '<html/>');
    writeFileSync(join(dir, 'notes.txt'), 'not a report');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should select report files by the start date in their names', async () => {
    await expect(recentReportFiles(dir, { daysBack: 14, now })).resolves.toEqual([
      '2024-05-02T153000Z-run-1.xml',
      '2024-05-03T000000Z-broken.xml',
    ]);
    await expect(recentReportFiles(dir, { daysBack: 60, now })).resolves.toEqual([
      '2024-04-01T090000Z-run-old.xml',
      '2024-05-02T153000Z-run-1.xml',
      '2024-05-03T000000Z-broken.xml',
    ]);
  });

  it('should collect actions of recent runs and skip unreadable files', async () => {
    const actions = await listRecentActions(dir, { daysBack: 14, now });

    expect(actions.map((entry) => `${entry.action} ${entry.authorityId}`)).toEqual([
      'ADD_CLAIM no2023000111',
      'NAMED_AS_CHANGE n79021164',
      'NEED_REVIEW n123',
      'ERROR n777',
    ]);
  });

  it('should filter by action label', async () => {
    const actions = await listRecentActions(dir, { daysBack: 60, now, action: 'NAMED_AS_ADDED' });

    expect(actions).toEqual([
      { runId: 'run-old', startedAt: '2024-04-01T09:00:00.000Z', authorityId: 'n1', entityId: 'Q1', action: 'NAMED_AS_ADDED' },
    ]);
  });

  it('should find nothing in a directory that does not exist', async () => {
    await expect(listRecentActions(join(dir, 'missing'), { now })).resolves.toEqual([]);
  });
});

describe('formatRecentActions', () => {
  it('should print one aligned line per action and a count', () => {
    const actions = parseReportLog(renderXmlReport(mixedReport())).slice(2);

    expect(formatRecentActions(actions)).toBe(
      [
        '2024-05-02  NEED_REVIEW     n123           Q6',
        '2024-05-02  ERROR           n777           -',
        '',
        '2 action(s)',
      ].join('\n')
    );
  });

  it('should say when nothing was logged', () => {
    expect(formatRecentActions([])).toBe('No logged actions.');
  });
});
