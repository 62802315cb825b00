import type { SummaryRequest } from './summarizer.js';

export function buildPrompt(request: SummaryRequest): string {
  return `Summarize this git commit for a changelog.

Commit message:
${request.message}

Files changed: ${request.files.slice(0, 10).join(', ')}${request.files.length > 10 ? ` (+${request.files.length - 10} more)` : ''}
Stats: +${request.insertions}/-${request.deletions}

Diff:
${request.diff}

Reply with exactly two lines and nothing else:
SUMMARY: <one sentence, at most 80 characters, starting with a verb>
INTENT: <why the change was made, one sentence>`;
}

const PREFIXES = ['commit message:', 'message:', '> ', '• ', '- '];

function clean(value: string): string {
  let text = value.trim();
  for (const prefix of PREFIXES) {
    if (text.toLowerCase().startsWith(prefix)) text = text.slice(prefix.length).trim();
  }
  return text.replace(/^["'`]+|["'`]+$/g, '').trim();
}

/**
 * Reads the SUMMARY/INTENT reply. A reply without the labels is taken as a
 * bare summary on its first line.
 */
export function parseReply(text: string): { summary: string; intent: string } {
  let summary = '';
  let intent = '';

  for (const line of text.split('\n')) {
    const m = /^\s*\**\s*(summary|intent)\s*\**\s*:\s*\**\s*(.*)$/i.exec(line);
    if (!m) continue;
    if (m[1].toLowerCase() === 'summary' && !summary) summary = clean(m[2]);
    else if (m[1].toLowerCase() === 'intent' && !intent) intent = clean(m[2]);
  }

  if (!summary) {
    const first = text.split('\n').find(l => l.trim() !== '');
    summary = first ? clean(first) : '';
  }

  return { summary, intent };
}
