/**
 * Report Builder
 *
 * Renders a finalized RunReport for publication:
 * - an XML activity log, one `<log:logDetail>` per report entry
 *   (lccn, qid, action, old, new, reason) under a `<log:summary>` of counts;
 *   annotated entries also carry wiki-label, wiki-instanceOf, lc-label,
 *   lc-type and constraint
 * - a Markdown summary for human review: counts per decision kind, every
 *   conflict with its existing values, every failure
 *
 * Depends on the report only.
 */

import { XMLBuilder } from 'fast-xml-parser';
import type { ReportEntry, ReportOutcome, ReviewAnnotations, RunReport } from '../core/types.js';
import { REPORT_OUTCOME_KINDS } from '../services/run-report.js';

export const LOG_NAMESPACE = 'info:lc/lds-id/log';

/**
 * Action label written to the log for each outcome
 */
export function actionLabel(outcome: ReportOutcome): string {
  switch (outcome.kind) {
    case 'no_action':
      return 'NO_ACTION';
    case 'qualifier_updated':
      return outcome.old === undefined ? 'NAMED_AS_ADDED' : 'NAMED_AS_CHANGE';
    case 'claim_added':
      return 'ADD_CLAIM';
    case 'conflict_flagged':
      return 'NEED_REVIEW';
    case 'fetch_error':
      return 'ERROR';
  }
}

interface DetailFields {
  readonly old: string;
  readonly new: string;
  readonly reason: string;
}

function detailFields(outcome: ReportOutcome): DetailFields {
  switch (outcome.kind) {
    case 'no_action':
      return { old: '', new: '', reason: outcome.reason };
    case 'qualifier_updated':
      return { old: outcome.old ?? '', new: outcome.new, reason: '' };
    case 'claim_added':
      return { old: '', new: outcome.qualifier, reason: '' };
    case 'conflict_flagged':
      return { old: outcome.existingValues.join(' '), new: '', reason: outcome.reason };
    case 'fetch_error':
      return { old: '', new: '', reason: `${outcome.errorCode}: ${outcome.message}` };
  }
}

const xmlBuilder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  format: true,
  indentBy: '  ',
  suppressEmptyNode: true,
  suppressBooleanAttributes: false,
});

function reviewAttributes(review: ReviewAnnotations): Record<string, string> {
  return {
    '@_wiki-label': review.entity?.label ?? '',
    '@_wiki-instanceOf': review.entity?.instanceOf.join(', ') ?? '',
    '@_lc-label': review.authority?.label ?? '',
    '@_lc-type': review.authority?.type ?? '',
    '@_constraint': review.constraint ?? '',
  };
}

function logDetail(entry: ReportEntry): Record<string, string> {
  const fields = detailFields(entry.outcome);
  return {
    '@_lccn': entry.tuple.authorityId,
    '@_qid': entry.entityId ?? '',
    '@_action': actionLabel(entry.outcome),
    '@_old': fields.old,
    '@_new': fields.new,
    '@_reason': fields.reason,
    '@_updated': entry.tuple.updateDate,
    '@_published': entry.tuple.publishedDate,
    ...(entry.review ? reviewAttributes(entry.review) : {}),
  };
}

/**
 * XML activity log for one run
 */
export function renderXmlReport(report: RunReport): string {
  const summary: Record<string, string> = {
    '@_pagesWalked': String(report.pagesWalked),
    '@_total': String(report.entries.length),
  };
  for (const kind of REPORT_OUTCOME_KINDS) {
    summary[`@_${kind}`] = String(report.counts[kind]);
  }
  if (report.abort) {
    summary['@_aborted'] = report.abort.errorCode;
    summary['@_abortMessage'] = report.abort.message;
    summary['@_fatal'] = String(report.abort.fatal);
  }

  const document = {
    'log:log': {
      '@_xmlns:log': LOG_NAMESPACE,
      '@_runId': report.runId,
      '@_startedAt': report.startedAt,
      '@_finishedAt': report.finishedAt,
      '@_dryRun': String(report.dryRun),
      'log:summary': summary,
      'log:logDetail': report.entries.map(logDetail),
    },
  };

  const body: unknown = xmlBuilder.build(document);
  return `<?xml version="1.0" encoding="UTF-8"?>\n${String(body)}`;
}

// ============================================================================
// Markdown
// ============================================================================

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

/**
 * Markdown summary for human review
 */
export function renderMarkdownReport(report: RunReport): string {
  const lines: string[] = [
    `# Authority sync run ${report.startedAt.slice(0, 10)}`,
    '',
    `- Run: \`${report.runId}\``,
    `- Started: ${report.startedAt}`,
    `- Finished: ${report.finishedAt}`,
    `- Feed pages walked: ${report.pagesWalked}`,
    `- Tuples processed: ${report.entries.length}`,
  ];

  if (report.dryRun) {
    lines.push('- Dry run: no knowledge-base writes, no ledger marks');
  }

  if (report.abort) {
    lines.push(
      `- **Run aborted** (${report.abort.errorCode}${report.abort.fatal ? ', fatal' : ''}): ${report.abort.message}`
    );
  }

  lines.push('', '## Outcomes', '', '| Outcome | Count |', '| --- | ---: |');
  for (const kind of REPORT_OUTCOME_KINDS) {
    lines.push(`| ${kind} | ${report.counts[kind]} |`);
  }

  const changes = report.entries.filter(
    (entry) => entry.outcome.kind === 'claim_added' || entry.outcome.kind === 'qualifier_updated'
  );
  if (changes.length > 0) {
    lines.push('', '## Changes', '', '| Authority id | Entity | Action | Old | New |', '| --- | --- | --- | --- | --- |');
    for (const entry of changes) {
      const fields = detailFields(entry.outcome);
      lines.push(
        `| ${entry.tuple.authorityId} | ${entry.entityId ?? ''} | ${actionLabel(entry.outcome)} | ${escapeCell(fields.old)} | ${escapeCell(fields.new)} |`
      );
    }
  }

  const conflicts = report.entries.filter((entry) => entry.outcome.kind === 'conflict_flagged');
  lines.push('', '## Conflicts needing review', '');
  if (conflicts.length === 0) {
    lines.push('None.');
  } else {
    lines.push('| Authority id | Entity | Reason | Existing values |', '| --- | --- | --- | --- |');
    for (const entry of conflicts) {
      if (entry.outcome.kind !== 'conflict_flagged') continue;
      lines.push(
        `| ${entry.tuple.authorityId} | ${entry.entityId ?? ''} | ${escapeCell(entry.outcome.reason)} | ${escapeCell(entry.outcome.existingValues.join(', '))} |`
      );
    }
  }

  const failures = report.entries.filter((entry) => entry.outcome.kind === 'fetch_error');
  lines.push('', '## Failures (retried next run)', '');
  if (failures.length === 0) {
    lines.push('None.');
  } else {
    lines.push('| Authority id | Entity | Error | Message |', '| --- | --- | --- | --- |');
    for (const entry of failures) {
      if (entry.outcome.kind !== 'fetch_error') continue;
      lines.push(
        `| ${entry.tuple.authorityId} | ${entry.entityId ?? ''} | ${entry.outcome.errorCode} | ${escapeCell(entry.outcome.message)} |`
      );
    }
  }

  return `${lines.join('\n')}\n`;
}
