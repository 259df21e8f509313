import type { SequenceResult, TestReport, TestResult, TestStatus, TestSummary } from './types';

const SEVERITY: Record<TestStatus, number> = { skipped: 0, passed: 1, failed: 2, error: 3 };

/** Move a result to a worse status; a better one never overrides. */
export function escalate(result: TestResult, status: TestStatus, error?: string): void {
  if (SEVERITY[status] <= SEVERITY[result.status]) return;
  result.status = status;
  if (error !== undefined) result.error = error;
}

export function summarize(
  results: readonly TestResult[],
  sequences: readonly SequenceResult[],
  startTime: Date,
  endTime: Date
): TestSummary {
  const summary: TestSummary = {
    total: results.length,
    passed: 0,
    failed: 0,
    skipped: 0,
    errors: 0,
    durationMs: endTime.getTime() - startTime.getTime(),
    startTime,
    endTime,
    snapshotsTotal: 0,
    snapshotsCreated: 0,
    snapshotsUpdated: 0,
    schemaValidated: 0,
    schemaFailed: 0,
    sequencesTotal: sequences.length,
    sequencesPassed: sequences.filter((s) => s.success).length,
    sequencesFailed: sequences.filter((s) => !s.success).length,
  };

  for (const result of results) {
    switch (result.status) {
      case 'passed':
        summary.passed++;
        break;
      case 'failed':
        summary.failed++;
        break;
      case 'skipped':
        summary.skipped++;
        break;
      case 'error':
        summary.errors++;
        break;
    }
    if (result.snapshot) {
      summary.snapshotsTotal++;
      if (result.snapshot.created) summary.snapshotsCreated++;
      if (result.snapshot.updated) summary.snapshotsUpdated++;
    }
    if (result.schema) {
      summary.schemaValidated++;
      if (!result.schema.valid) summary.schemaFailed++;
    }
  }
  return summary;
}

/** 1 when any test failed or errored, or any sequence did not succeed; else 0. */
export function exitCode(report: TestReport): number {
  if (report.summary.failed > 0 || report.summary.errors > 0) return 1;
  return report.sequences.some((s) => !s.success) ? 1 : 0;
}
