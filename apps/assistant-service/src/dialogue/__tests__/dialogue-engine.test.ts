import { AppError, IntentLabel } from '@helpdesk/shared-kernel';
import { DialogueEngine, RESET_REPLY } from '../dialogue-engine';
import { buildDialogueSettings } from '../settings';
import type { DialogueAction } from '../types';

function replyText(action: DialogueAction): string {
  if (action.type !== 'reply') throw new Error(`expected a reply, got ${action.type}`);
  return action.text;
}

function fileComplaint(engine: DialogueEngine, sessionId: string): void {
  engine.handleTurn(sessionId, 'I want to file a complaint');
  engine.handleTurn(sessionId, 'my order #12345 never arrived');
  engine.handleTurn(sessionId, 'Jane Doe');
  engine.handleTurn(sessionId, '555-123-4567');
  engine.handleTurn(sessionId, 'jane@example.com');
}

describe('DialogueEngine', () => {
  let engine: DialogueEngine;

  beforeEach(() => {
    engine = new DialogueEngine({ now: () => 1_700_000_000_000 });
  });

  test('a filing request asks for the first slot', () => {
    const decision = engine.handleTurn('s1', 'I want to file a complaint');

    expect(decision.classification.label).toBe(IntentLabel.FILE_COMPLAINT);
    expect(decision.state).toMatchObject({ kind: 'collecting_complaint', cursor: 0 });
    expect(replyText(decision.action)).toBe(
      "To file your complaint, I'll need some information. Please describe your complaint in detail.",
    );
  });

  test('files a complaint end to end', () => {
    fileComplaint(engine, 's1');
    expect(engine.describe('s1')).toMatchObject({ state: 'confirm_pending' });

    const decision = engine.handleTurn('s1', 'yes');
    expect(decision.action).toEqual({
      type: 'submit_complaint',
      fields: {
        description: 'my order #12345 never arrived',
        name: 'Jane Doe',
        phone: '5551234567',
        email: 'jane@example.com',
      },
    });

    const completion = engine.completeTurn('s1', { type: 'complaint_submitted', complaintId: 'CMP-1001' });
    expect(completion.reply).toBe("Your complaint has been registered with ID: CMP-1001. You'll hear back from us soon.");
    expect(completion.state).toEqual({ kind: 'idle' });
    expect(engine.describe('s1').draft).toBeUndefined();
  });

  test('a failed submit can be retried with yes', () => {
    fileComplaint(engine, 's1');
    engine.handleTurn('s1', 'yes');
    engine.completeTurn('s1', { type: 'backend_failure', message: 'complaint service timed out' });

    expect(engine.describe('s1')).toMatchObject({ state: 'confirm_pending', draft: { name: 'Jane Doe' } });
    expect(engine.handleTurn('s1', 'yes').action.type).toBe('submit_complaint');
  });

  test('a lookup with an id skips asking for it', () => {
    const decision = engine.handleTurn('s1', 'check complaint ABC-999');

    expect(decision.action).toEqual({ type: 'fetch_complaint', id: 'ABC-999' });
    expect(engine.pendingAction('s1')).toEqual({ type: 'fetch_complaint', id: 'ABC-999' });
  });

  test('a first document question is passed through unchanged', () => {
    const decision = engine.handleTurn('s1', 'what does the manual say about returns?');

    expect(decision.classification.label).toBe(IntentLabel.DOCUMENT_QUERY);
    expect(decision.action).toEqual({ type: 'retrieve_documents', query: 'what does the manual say about returns?' });
  });

  test('follow-up questions are refined from the window', () => {
    engine.handleTurn('s1', 'what does the manual say about returns?');
    engine.completeTurn('s1', { type: 'documents_answered', answer: 'Returns are accepted within 30 days.' });

    expect(engine.handleTurn('s1', 'how long do they take?').action).toEqual({
      type: 'retrieve_documents',
      query: 'how long do returns take?',
    });
  });

  test('refinement can be switched off per session', () => {
    engine.handleTurn('s1', 'what does the manual say about returns?');
    engine.completeTurn('s1', { type: 'documents_answered', answer: 'Within 30 days.' });
    engine.setRefinement('s1', false);

    expect(engine.handleTurn('s1', 'how long do they take?').action).toEqual({
      type: 'retrieve_documents',
      query: 'how long do they take?',
    });
  });

  test('a document question mid-filing drops the draft', () => {
    engine.handleTurn('s1', 'I want to file a complaint');
    engine.handleTurn('s1', 'my order #12345 never arrived');
    engine.handleTurn('s1', 'Jane Doe');

    const decision = engine.handleTurn('s1', 'what does the manual say about returns?');

    expect(decision.abandoned).toBe(true);
    expect(decision.action.type).toBe('retrieve_documents');
    expect(engine.describe('s1')).toMatchObject({ state: 'idle', draft: undefined });
  });

  test('"start over" resets the session', () => {
    engine.handleTurn('s1', 'I want to file a complaint');
    const decision = engine.handleTurn('s1', 'start over');

    expect(decision.reset).toBe(true);
    expect(decision.action).toEqual({ type: 'reply', text: RESET_REPLY });
    expect(engine.describe('s1')).toMatchObject({ state: 'idle', history: [] });
  });

  test('reset twice equals reset once', () => {
    engine.handleTurn('s1', 'I want to file a complaint');
    engine.reset('s1');
    const once = engine.describe('s1');
    engine.reset('s1');

    expect(engine.describe('s1')).toEqual(once);
  });

  test('a new turn is refused while an action awaits its outcome', () => {
    engine.handleTurn('s1', 'check complaint ABC-999');

    expect(() => engine.handleTurn('s1', 'hello')).toThrow(AppError);
  });

  test('completing without a pending action is an error', () => {
    expect(() => engine.completeTurn('s1', { type: 'documents_answered', answer: 'x' })).toThrow(/no action awaiting/);
  });

  test('records reply turns in a bounded window', () => {
    const small = new DialogueEngine({ settings: buildDialogueSettings({ historyWindow: 2 }) });
    small.handleTurn('s1', 'complaint');
    small.handleTurn('s1', 'I want to file a complaint');
    small.handleTurn('s1', 'late delivery');

    expect(small.history('s1').map((t) => t.utterance)).toEqual(['I want to file a complaint', 'late delivery']);
  });

  test('sessions do not share state', () => {
    engine.handleTurn('a', 'I want to file a complaint');

    expect(engine.describe('b').state).toBe('idle');
  });

  test('describing an unknown session does not create it', () => {
    expect(engine.describe('ghost')).toEqual({ sessionId: 'ghost', state: 'idle', refineQuery: true, history: [] });
    expect(engine.activeSessions()).toBe(0);

    engine.setRefinement('ghost', false);
    expect(engine.activeSessions()).toBe(1);
  });
});
