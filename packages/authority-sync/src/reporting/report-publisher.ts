/**
 * Report publisher
 *
 * Writes the rendered run report under a name unique to the run:
 * `<outputDir>/<start-stamp>-<runId>.xml` and `.md`, where the stamp is the
 * run's UTC start time (`2024-05-02T153000Z`). Names sort chronologically;
 * earlier runs' reports are never replaced.
 */

import { join } from 'node:path';
import type { RunReport } from '../core/types.js';
import { atomicWriteFile } from '../core/utils/atomic-write.js';
import { createLogger } from '../core/utils/logger.js';
import { renderMarkdownReport, renderXmlReport } from './report-builder.js';

const log = createLogger({ module: 'report-publisher' });

export interface PublishedReport {
  readonly xmlPath: string;
  readonly markdownPath: string;
}

/**
 * File name stem for a run's reports
 *
 * @example
 * reportBaseName({ startedAt: '2024-05-02T15:30:00.000Z', runId: 'run-1' });
 * // '2024-05-02T153000Z-run-1'
 */
export function reportBaseName(report: Pick<RunReport, 'startedAt' | 'runId'>): string {
  const stamp = report.startedAt.replace(/\.\d+Z$/, 'Z').replace(/:/g, '');
  const runId = report.runId.replace(/[^A-Za-z0-9_-]/g, '_');
  return `${stamp}-${runId}`;
}

export class ReportPublisher {
  constructor(private readonly outputDir: string) {}

  pathsFor(report: RunReport): PublishedReport {
    const base = reportBaseName(report);
    return {
      xmlPath: join(this.outputDir, `${base}.xml`),
      markdownPath: join(this.outputDir, `${base}.md`),
    };
  }

  async publish(report: RunReport): Promise<PublishedReport> {
    const paths = this.pathsFor(report);

    await atomicWriteFile(paths.xmlPath, renderXmlReport(report));
    await atomicWriteFile(paths.markdownPath, renderMarkdownReport(report));

    log.info('Report published', { runId: report.runId, ...paths });
    return paths;
  }
}
