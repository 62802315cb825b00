import { SummarizationUnavailableError, errorMessage } from '../errors.js';

export interface SummaryRequest {
  commitId: string;
  message: string;
  /** Unified diff, already capped to the configured line budget. */
  diff: string;
  insertions: number;
  deletions: number;
  files: string[];
}

export interface AiSummary {
  summary: string;
  intent: string;
  model: string;
}

/**
 * External summarization service. Implementations must honour `signal`
 * and reject when it aborts.
 */
export interface Summarizer {
  readonly name: string;
  summarize(request: SummaryRequest, signal: AbortSignal): Promise<AiSummary>;
}

export type SummaryResult =
  | { source: 'ai'; summary: string; rationale: string; model: string }
  | { source: 'heuristic'; summary: string; rationale: string };

/** Keeps the first `maxLines` lines of a diff and notes how many were dropped. */
export function capDiff(diff: string, maxLines: number): string {
  const lines = diff.split('\n');
  if (lines.length <= maxLines) return diff;
  const kept = lines.slice(0, maxLines);
  kept.push(`... (${lines.length - maxLines} more lines truncated)`);
  return kept.join('\n');
}

/**
 * Calls the summarizer with a deadline. Any failure, including an empty
 * reply, surfaces as SummarizationUnavailableError.
 */
export async function summarizeWithTimeout(
  summarizer: Summarizer,
  request: SummaryRequest,
  timeoutMs: number,
): Promise<AiSummary> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Reject first so the race reports the timeout, not the abort.
      reject(new SummarizationUnavailableError(`${summarizer.name} timed out after ${timeoutMs}ms`));
      controller.abort();
    }, timeoutMs);
  });

  try {
    const result = await Promise.race([summarizer.summarize(request, controller.signal), deadline]);
    if (!result.summary.trim()) {
      throw new SummarizationUnavailableError(`${summarizer.name} returned an empty summary`);
    }
    return { ...result, summary: result.summary.trim(), intent: result.intent.trim() };
  } catch (err) {
    if (err instanceof SummarizationUnavailableError) throw err;
    throw new SummarizationUnavailableError(`${summarizer.name}: ${errorMessage(err)}`);
  } finally {
    clearTimeout(timer);
  }
}
