import { IntentLabel } from '@helpdesk/shared-kernel';
import phrases from '../data/intent-phrases.json';
import { contentTokens, indelRatio } from '../text';
import type { ComplaintIntent, FuzzyCandidate, FuzzyMatch } from '../types';

export const DEFAULT_FUZZY_THRESHOLD = 0.7;

interface CatalogEntry {
  intent: ComplaintIntent;
  phrase: string;
  tokens: string[];
}

function uniqueTokens(text: string): string[] {
  return [...new Set(contentTokens(text))];
}

function entriesFor(intent: ComplaintIntent, list: readonly string[]): CatalogEntry[] {
  return list.map((phrase) => ({ intent, phrase, tokens: uniqueTokens(phrase) }));
}

const CATALOG: CatalogEntry[] = [
  ...entriesFor(IntentLabel.FILE_COMPLAINT, phrases.FileComplaint),
  ...entriesFor(IntentLabel.RETRIEVE_COMPLAINT, phrases.RetrieveComplaint),
];

/**
 * Token-set similarity over content tokens (stopwords removed).
 *
 * Compares the sorted intersection against intersection + each side's remainder and keeps the
 * best normalized indel ratio. A phrase whose tokens all occur in the utterance scores 1; an
 * utterance that is only a fragment of a phrase does not.
 */
export function tokenSetSimilarity(utteranceTokens: readonly string[], phraseTokens: readonly string[]): number {
  const a = new Set(utteranceTokens);
  const b = new Set(phraseTokens);
  if (a.size === 0 || b.size === 0) return 0;

  const intersection = [...a].filter((t) => b.has(t)).sort();
  const diffAB = [...a].filter((t) => !b.has(t)).sort();
  const diffBA = [...b].filter((t) => !a.has(t)).sort();

  if (intersection.length > 0 && diffBA.length === 0) return 1;

  const sect = intersection.join(' ');
  const combinedAB = [sect, diffAB.join(' ')].filter(Boolean).join(' ');
  const combinedBA = [sect, diffBA.join(' ')].filter(Boolean).join(' ');

  const scores = [indelRatio(combinedAB, combinedBA)];
  if (sect) {
    scores.push(indelRatio(sect, combinedBA));
    if (diffAB.length > 0) scores.push(indelRatio(sect, combinedAB));
  }
  return Math.max(...scores);
}

export function matchFuzzy(utterance: string, threshold = DEFAULT_FUZZY_THRESHOLD): FuzzyMatch {
  const tokens = uniqueTokens(utterance);
  const bestByIntent = new Map<ComplaintIntent, FuzzyCandidate>();

  for (const entry of CATALOG) {
    const score = tokenSetSimilarity(tokens, entry.tokens);
    const current = bestByIntent.get(entry.intent);
    if (!current || score > current.score) {
      bestByIntent.set(entry.intent, { intent: entry.intent, phrase: entry.phrase, score });
    }
  }

  const candidates = [...bestByIntent.values()].sort((x, y) => y.score - x.score);
  const best = candidates[0];
  return {
    matched: best !== undefined && best.score > 0 && best.score >= threshold,
    best,
    candidates,
  };
}
