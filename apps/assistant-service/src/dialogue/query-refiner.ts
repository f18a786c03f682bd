import { IntentLabel } from '@helpdesk/shared-kernel';
import { isStopword } from './text';
import type { ConversationTurn } from './types';

const TOPIC_PHRASE = /\b(?:about|on|regarding|for|of)\s+(.+?)\s*[?.!]*$/i;
const ELLIPSIS = /^\s*(?:(?:what|how)\s+about|and)\s+(.+?)\s*[?.!]*\s*$/i;
const SUBJECT_PRONOUN = /\b(it|they|them)\b/gi;
const POSSESSIVE_PRONOUN = /\b(its|their)\b/gi;
const TRAILING_DEMONSTRATIVE = /\b(?:this|that)(\s*[?.!]*\s*)$/i;

interface Topic {
  text: string;
  /** Position of the topic inside the query it came from. */
  index: number;
}

function findTopic(query: string): Topic | undefined {
  const phrase = TOPIC_PHRASE.exec(query);
  if (phrase?.[1]) return { text: phrase[1], index: phrase.index + phrase[0].indexOf(phrase[1]) };

  const words = [...query.matchAll(/[A-Za-z0-9][A-Za-z0-9'-]*/g)];
  for (let i = words.length - 1; i >= 0; i--) {
    const word = words[i];
    if (word.index !== undefined && !isStopword(word[0].toLowerCase())) {
      return { text: word[0], index: word.index };
    }
  }
  return undefined;
}

function lastDocumentQuery(history: readonly ConversationTurn[]): string | undefined {
  for (let i = history.length - 1; i >= 0; i--) {
    const turn = history[i];
    if (turn.intent === IntentLabel.DOCUMENT_QUERY && turn.retrievalQuery) return turn.retrievalQuery;
  }
  return undefined;
}

function resolveAnaphora(utterance: string, topic: string): string {
  return utterance
    .replace(SUBJECT_PRONOUN, topic)
    .replace(POSSESSIVE_PRONOUN, `${topic}'s`)
    .replace(TRAILING_DEMONSTRATIVE, (_match, tail: string) => `${topic}${tail}`);
}

/**
 * Rewrites a follow-up question into a standalone retrieval query using the latest document
 * question in the window. Returns the utterance unchanged when refinement is off, when there is
 * no earlier document question, or when nothing in the utterance refers back.
 */
export function refineQuery(utterance: string, history: readonly ConversationTurn[], enabled: boolean): string {
  if (!enabled) return utterance;

  const previous = lastDocumentQuery(history);
  if (!previous) return utterance;

  const topic = findTopic(previous);
  if (!topic) return utterance;

  const ellipsis = ELLIPSIS.exec(utterance);
  if (ellipsis?.[1]) {
    return previous.slice(0, topic.index) + ellipsis[1] + previous.slice(topic.index + topic.text.length);
  }

  return resolveAnaphora(utterance, topic.text);
}
