import { IntentLabel } from '@helpdesk/shared-kernel';
import { matchFuzzy, tokenSetSimilarity } from '../fuzzy-matcher';

describe('tokenSetSimilarity', () => {
  test('scores 1 when every phrase token occurs in the utterance', () => {
    expect(tokenSetSimilarity(['file', 'complaint', 'today'], ['file', 'complaint'])).toBe(1);
  });

  test('does not give a phrase fragment a full score', () => {
    // "complaint" against "complaint file": 2 * 9 / (9 + 14)
    expect(tokenSetSimilarity(['complaint'], ['file', 'complaint'])).toBeCloseTo(18 / 23, 10);
  });

  test('is 0 when either side is empty', () => {
    expect(tokenSetSimilarity([], ['file'])).toBe(0);
    expect(tokenSetSimilarity(['file'], [])).toBe(0);
  });
});

describe('matchFuzzy', () => {
  test('matches a reworded filing request', () => {
    const result = matchFuzzy('I am not satisfied with my purchase at all');

    expect(result.matched).toBe(true);
    expect(result.best).toEqual({
      intent: IntentLabel.FILE_COMPLAINT,
      phrase: 'not satisfied with my purchase',
      score: 1,
    });
  });

  test('reports one candidate per intent, best first', () => {
    const result = matchFuzzy('complaint');

    expect(result.candidates).toHaveLength(2);
    expect(result.candidates[0].score).toBeCloseTo(18 / 23, 10);
    expect(result.candidates[1].score).toBeCloseTo(18 / 23, 10);
  });

  test('respects the threshold', () => {
    expect(matchFuzzy('complaint', 0.8).matched).toBe(false);
    expect(matchFuzzy('complaint', 0.7).matched).toBe(true);
  });

  test('does not match unrelated text', () => {
    expect(matchFuzzy('what does the manual say about returns?').matched).toBe(false);
  });
});
