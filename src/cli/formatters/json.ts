import type { CommitAnalysis } from '../../model/analysis.js';
import type { CommitDescriptor } from '../../git/types.js';
import { commitSubject } from '../../git/types.js';

export function formatAnalysesJson(analyses: readonly CommitAnalysis[]): string {
  const totals = analyses.reduce(
    (acc, a) => ({
      insertions: acc.insertions + a.totals.insertions,
      deletions: acc.deletions + a.totals.deletions,
      breaking: acc.breaking + (a.breaking ? 1 : 0),
    }),
    { insertions: 0, deletions: 0, breaking: 0 },
  );

  return JSON.stringify({
    summary: {
      commits: analyses.length,
      ...totals,
    },
    commits: analyses,
  }, null, 2);
}

export function formatPendingJson(descriptors: readonly CommitDescriptor[]): string {
  return JSON.stringify({
    pending: descriptors.map(d => ({
      id: d.id,
      author: d.author,
      timestamp: d.timestamp,
      subject: commitSubject(d.message),
      files: d.files.length,
    })),
  }, null, 2);
}
