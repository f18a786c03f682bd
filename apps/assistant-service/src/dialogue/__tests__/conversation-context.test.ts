import { ComplaintSlotName, IntentLabel } from '@helpdesk/shared-kernel';
import { ConversationContext } from '../conversation-context';
import { SessionStore } from '../session-store';
import { DEFAULT_SLOT_ORDER } from '../slots';
import type { ConversationTurn } from '../types';

function turn(utterance: string, timestamp = 0): ConversationTurn {
  return { utterance, response: 'ok', intent: IntentLabel.DOCUMENT_QUERY, confidence: 0.9, timestamp };
}

describe('ConversationContext', () => {
  test('evicts the oldest turns past capacity', () => {
    const context = new ConversationContext('s1', 3, true);
    ['one', 'two', 'three', 'four', 'five'].forEach((u) => context.appendTurn(turn(u)));

    expect(context.getHistory().map((t) => t.utterance)).toEqual(['three', 'four', 'five']);
    expect(context.getHistory(2).map((t) => t.utterance)).toEqual(['four', 'five']);
    expect(context.getHistory(0)).toEqual([]);
  });

  test('updateSlot writes into the active draft only', () => {
    const context = new ConversationContext('s1', 3, true);
    context.updateSlot(ComplaintSlotName.NAME, 'Jane');
    expect(context.getDraft()).toBeUndefined();

    context.setState({ kind: 'collecting_complaint', cursor: 0, draft: { order: DEFAULT_SLOT_ORDER, values: {} } });
    context.updateSlot(ComplaintSlotName.NAME, 'Jane');

    expect(context.getDraft()?.values).toEqual({ name: 'Jane' });
  });

  test('reset is idempotent and keeps the refinement toggle', () => {
    const context = new ConversationContext('s1', 3, true);
    context.setRefinement(false);
    context.appendTurn(turn('hello'));
    context.setState({ kind: 'awaiting_complaint_id' });

    context.reset();
    const once = { state: context.getState(), history: context.getHistory(), draft: context.getDraft() };
    context.reset();

    expect({ state: context.getState(), history: context.getHistory(), draft: context.getDraft() }).toEqual(once);
    expect(once.state).toEqual({ kind: 'idle' });
    expect(once.history).toEqual([]);
    expect(context.isRefinementEnabled()).toBe(false);
  });
});

describe('SessionStore', () => {
  test('keeps sessions apart', () => {
    const store = new SessionStore({ ttlMs: 1000, historyWindow: 4, refinementDefault: true });
    store.getOrCreate('a').appendTurn(turn('for a'));

    expect(store.getOrCreate('b').getHistory()).toEqual([]);
    expect(store.getOrCreate('a').getHistory()).toHaveLength(1);
  });

  test('expires idle sessions and slides the expiry on access', () => {
    let now = 0;
    const store = new SessionStore({ ttlMs: 1000, historyWindow: 4, refinementDefault: true, now: () => now });
    const first = store.getOrCreate('a');

    now = 900;
    expect(store.get('a')).toBe(first);
    now = 1800;
    expect(store.get('a')).toBe(first);
    now = 2800;
    expect(store.get('a')).toBeUndefined();
    expect(store.size()).toBe(0);
  });
});
