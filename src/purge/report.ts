import type { PurgeReport } from './types.js';

export function formatReport(report: PurgeReport): string {
  const pages = `${report.pages} page${report.pages === 1 ? '' : 's'}`;
  const line =
    `Summary: ${report.deletedOk} deleted, ${report.deleteFailed} failed, ` +
    `${report.kept} kept, ${report.skippedDryRun} skipped (dry run) across ${pages}`;
  return report.cancelled ? `${line} (interrupted)` : line;
}
