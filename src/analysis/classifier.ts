import type { Category } from '../model/analysis.js';
import { CATEGORY_PRIORITY } from '../model/analysis.js';
import { isDocFile, isTestFile } from '../utils/path.js';

/** What kinds of files a commit touched. */
export interface ChangeShape {
  files: number;
  testFiles: number;
  docFiles: number;
}

// Whole words with their common inflections, so "fixes" counts but "fixtures" does not.
const KEYWORDS: Array<[Category, string[]]> = [
  ['fix', ['fix(?:e[sd]|ing)?', 'bugs?', 'bugfix(?:es)?', 'patch(?:e[sd]|ing)?', 'hotfix(?:e[sd])?', 'resolv(?:e[sd]?|ing)']],
  ['feature', ['add(?:s|ed|ing)?', 'feat(?:ure)?s?', 'implement(?:s|ed|ing)?', 'new', 'creat(?:e[sd]?|ing)', 'introduc(?:e[sd]?|ing)']],
  [
    'refactor',
    [
      'refactor(?:s|ed|ing)?', 'clean(?:s|ed|ing)?\\s+up', 'cleanup', 'consolidat(?:e[sd]?|ing)',
      'reorgani[sz](?:e[sd]?|ing)', 'restructur(?:e[sd]?|ing)', 'simplif(?:y|ies|ied|ying)',
    ],
  ],
  ['docs', ['docs?', 'documentation', 'document(?:s|ed|ing)?', 'readme', 'comments?']],
];

const MATCHERS: Array<[Category, RegExp]> = KEYWORDS.map(
  ([category, words]): [Category, RegExp] => [category, new RegExp(`\\b(?:${words.join('|')})\\b`, 'i')],
);

export function shapeOf(paths: readonly string[]): ChangeShape {
  return {
    files: paths.length,
    testFiles: paths.filter(isTestFile).length,
    docFiles: paths.filter(isDocFile).length,
  };
}

/** Every keyword family the message matches, strongest first. */
export function matchCategories(message: string): Category[] {
  const matched = new Set(MATCHERS.filter(([, regex]) => regex.test(message)).map(([category]) => category));
  return CATEGORY_PRIORITY.filter(category => matched.has(category));
}

/**
 * Assigns one category to a commit. Keyword families are ranked
 * fix > feature > refactor > docs > other. A commit that only touches tests
 * is not a feature; one that only touches documentation is docs.
 */
export function classifyCommit(message: string, shape?: ChangeShape): Category {
  const [category = 'other'] = matchCategories(message);

  if (shape && shape.files > 0) {
    if (shape.testFiles === shape.files && (category === 'feature' || category === 'other')) {
      return 'refactor';
    }
    if (shape.docFiles === shape.files && category === 'other') {
      return 'docs';
    }
  }

  return category;
}
