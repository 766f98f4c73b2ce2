/**
 * Report archive
 *
 * Reads back the XML activity logs the publisher wrote, so recent actions
 * across several runs can be reviewed together. Only file names of the
 * publisher's shape (`<start-stamp>-<runId>.xml`) are read; the start date in
 * the name selects the window.
 */

import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import { errorMessage } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'report-archive' });

const REPORT_FILE = /^(\d{4}-\d{2}-\d{2})T\d{6}Z-.+\.xml$/;

const DAY_MS = 24 * 60 * 60 * 1000;

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  isArray: (name) => name === 'log:logDetail',
});

const LogDetailSchema = z.object({
  lccn: z.string(),
  qid: z.string(),
  action: z.string(),
});

const ReportLogSchema = z.object({
  'log:log': z.object({
    runId: z.string(),
    startedAt: z.string(),
    'log:logDetail': z.array(LogDetailSchema).optional(),
  }),
});

/**
 * One logged action of an archived run
 */
export interface ArchivedAction {
  readonly runId: string;
  readonly startedAt: string;
  readonly authorityId: string;
  /** Empty when no entity was identified */
  readonly entityId: string;
  readonly action: string;
}

export interface RecentActionsOptions {
  /** Days back from `now`, counting whole UTC days (default: 14) */
  readonly daysBack?: number;
  /** Only this action label, e.g. NEED_REVIEW */
  readonly action?: string;
  readonly now?: Date;
}

/**
 * Actions of one XML activity log, in log order
 *
 * @throws {Error} If the document is not an activity log
 */
export function parseReportLog(xml: string): ArchivedAction[] {
  const document: unknown = parser.parse(xml);
  const parsed = ReportLogSchema.safeParse(document);
  if (!parsed.success) {
    throw new Error('not an activity log');
  }

  const { runId, startedAt } = parsed.data['log:log'];
  return (parsed.data['log:log']['log:logDetail'] ?? []).map((detail) => ({
    runId,
    startedAt,
    authorityId: detail.lccn,
    entityId: detail.qid,
    action: detail.action,
  }));
}

/**
 * Report files in `reportDir` whose start date falls in the window, oldest first
 */
export async function recentReportFiles(
  reportDir: string,
  options: Pick<RecentActionsOptions, 'daysBack' | 'now'> = {}
): Promise<string[]> {
  const now = options.now ?? new Date();
  const cutoff = new Date(now.getTime() - (options.daysBack ?? 14) * DAY_MS).toISOString().slice(0, 10);

  let names: string[];
  try {
    names = await readdir(reportDir);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  return names
    .filter((name) => {
      const match = REPORT_FILE.exec(name);
      return match?.[1] !== undefined && match[1] >= cutoff;
    })
    .sort();
}

/**
 * Actions logged by recent runs, oldest run first
 *
 * A file that cannot be read as an activity log is skipped with a warning.
 */
export async function listRecentActions(
  reportDir: string,
  options: RecentActionsOptions = {}
): Promise<ArchivedAction[]> {
  const actions: ArchivedAction[] = [];

  for (const name of await recentReportFiles(reportDir, options)) {
    let logged: ArchivedAction[];
    try {
      logged = parseReportLog(await readFile(join(reportDir, name), 'utf-8'));
    } catch (error) {
      log.warn('Skipping unreadable report', { file: name, error: errorMessage(error) });
      continue;
    }
    actions.push(...logged.filter((entry) => options.action === undefined || entry.action === options.action));
  }

  return actions;
}
