import vocabulary from './data/domain-vocabulary.json';
import { matchesPhrase, startsWithPhrase } from './text';

export function isNegative(utterance: string): boolean {
  return startsWithPhrase(utterance, vocabulary.negative);
}

export function isAffirmative(utterance: string): boolean {
  return !isNegative(utterance) && startsWithPhrase(utterance, vocabulary.affirmative);
}

/** "cancel", "never mind"... said on their own. */
export function isCancel(utterance: string): boolean {
  return matchesPhrase(utterance, vocabulary.cancel);
}

export function isResetCommand(utterance: string): boolean {
  return matchesPhrase(utterance, vocabulary.reset);
}
