/** Words that open statements which look like declarations to a pattern. */
export const CONTROL_KEYWORDS = new Set([
  'if', 'else', 'elif', 'for', 'foreach', 'while', 'do', 'switch', 'case', 'when', 'match',
  'catch', 'try', 'finally', 'return', 'throw', 'new', 'delete', 'typeof', 'sizeof',
  'await', 'yield', 'using', 'lock', 'synchronized', 'with', 'function', 'loop',
  'unless', 'until', 'defer', 'go', 'select', 'in', 'of', 'class', 'interface', 'struct',
]);

/** Statement openers that never start a declaration line. */
export const STATEMENT_PREFIX = /^\s*(?:return|new|throw|await|else|yield|case|if|for|while|switch)\b/;
