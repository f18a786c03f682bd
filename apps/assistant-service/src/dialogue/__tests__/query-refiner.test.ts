import { IntentLabel } from '@helpdesk/shared-kernel';
import { refineQuery } from '../query-refiner';
import type { ConversationTurn } from '../types';

function documentTurn(query: string): ConversationTurn {
  return {
    utterance: query,
    response: 'answer',
    intent: IntentLabel.DOCUMENT_QUERY,
    confidence: 0.9,
    retrievalQuery: query,
    timestamp: 0,
  };
}

const complaintTurn: ConversationTurn = {
  utterance: 'I want to file a complaint',
  response: 'Please describe your complaint in detail.',
  intent: IntentLabel.FILE_COMPLAINT,
  confidence: 1,
  timestamp: 1,
};

const history = Object.freeze([documentTurn('what does the manual say about returns?'), complaintTurn]);

describe('refineQuery', () => {
  test('is a no-op when disabled', () => {
    expect(refineQuery('how long do they take?', history, false)).toBe('how long do they take?');
  });

  test('is a no-op without an earlier document question', () => {
    expect(refineQuery('how long do they take?', [complaintTurn], true)).toBe('how long do they take?');
    expect(refineQuery('what does the manual say about returns?', [], true)).toBe(
      'what does the manual say about returns?',
    );
  });

  test('replaces pronouns with the previous topic, skipping complaint turns', () => {
    expect(refineQuery('how long do they take?', history, true)).toBe('how long do returns take?');
  });

  test('resolves a trailing demonstrative', () => {
    expect(refineQuery('how do I request that?', history, true)).toBe('how do I request returns?');
  });

  test('expands an elliptical follow-up from the previous query', () => {
    expect(refineQuery('What about exchanges?', history, true)).toBe('what does the manual say about exchanges?');
  });

  test('falls back to the last content word as the topic', () => {
    expect(refineQuery('does it cover water damage?', [documentTurn('How long is the warranty?')], true)).toBe(
      'does warranty cover water damage?',
    );
  });

  test('leaves self-contained questions alone', () => {
    expect(refineQuery('Is shipping free?', history, true)).toBe('Is shipping free?');
  });
});
