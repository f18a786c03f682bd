import stopwordList from './data/stopwords.json';

const STOPWORDS = new Set<string>(stopwordList);

const QUESTION_START =
  /^(what|when|where|who|whom|which|why|how|is|are|was|were|do|does|did|can|could|should|would|will|may)\b/i;

export function normalizeForMatch(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[’']/g, '')
    .replace(/[^a-z0-9#@.+-]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/** Lowercased word tokens with punctuation stripped. */
export function tokenize(text: string): string[] {
  return normalizeForMatch(text)
    .split(' ')
    .map((token) => token.replace(/^[^a-z0-9]+|[^a-z0-9]+$/g, ''))
    .filter((token) => token.length > 0);
}

export function isStopword(token: string): boolean {
  return STOPWORDS.has(token);
}

export function contentTokens(text: string): string[] {
  return tokenize(text).filter((token) => !isStopword(token));
}

export function isQuestionShaped(text: string): boolean {
  const trimmed = text.trim();
  return trimmed.endsWith('?') || QUESTION_START.test(trimmed);
}

/** True when the whole utterance (ignoring trailing punctuation) is one of the phrases. */
export function matchesPhrase(text: string, phrases: readonly string[]): boolean {
  const normalized = tokenize(text).join(' ');
  return phrases.some((phrase) => tokenize(phrase).join(' ') === normalized);
}

/** True when the utterance starts with one of the phrases as whole words. */
export function startsWithPhrase(text: string, phrases: readonly string[]): boolean {
  const normalized = tokenize(text).join(' ');
  return phrases.some((phrase) => {
    const p = tokenize(phrase).join(' ');
    return normalized === p || normalized.startsWith(`${p} `);
  });
}

function longestCommonSubsequence(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  if (m === 0 || n === 0) return 0;
  let prev = new Array<number>(n + 1).fill(0);
  let curr = new Array<number>(n + 1).fill(0);
  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      curr[j] = a[i - 1] === b[j - 1] ? prev[j - 1] + 1 : Math.max(prev[j], curr[j - 1]);
    }
    [prev, curr] = [curr, prev];
  }
  return prev[n];
}

/**
 * Normalized insert/delete edit similarity in [0,1]:
 * 1 - indelDistance / (|a| + |b|), where indelDistance = |a| + |b| - 2 * LCS.
 */
export function indelRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * longestCommonSubsequence(a, b)) / total;
}
