import { ComplaintSlotName, IntentLabel } from '@helpdesk/shared-kernel';
import { classify, entitiesOf } from '../intent-classifier';
import { DEFAULT_SLOT_ORDER } from '../slots';
import { IDLE, type DialogueState } from '../types';

function collectingAt(cursor: number): DialogueState {
  return { kind: 'collecting_complaint', cursor, draft: { order: DEFAULT_SLOT_ORDER, values: {} } };
}

describe('classify', () => {
  test('an exact pattern wins with confidence 1', () => {
    expect(classify('I want to file a complaint', IDLE)).toMatchObject({
      label: IntentLabel.FILE_COMPLAINT,
      confidence: 1,
      source: 'pattern',
      template: 'file_a_complaint',
    });
  });

  test('an exact pattern wins even while a slot is pending', () => {
    const result = classify('check complaint ABC-999', collectingAt(0));

    expect(result.label).toBe(IntentLabel.RETRIEVE_COMPLAINT);
    expect(result.confidence).toBe(1);
    expect(entitiesOf(result).complaintId).toBe('ABC-999');
  });

  test('a plausible answer to the pending slot is a slot value', () => {
    const result = classify('my order #12345 never arrived', collectingAt(0));

    expect(result).toMatchObject({ label: IntentLabel.PROVIDE_SLOT_VALUE, confidence: 0.9, source: 'context' });
    expect(result.slots).toContainEqual({ name: 'orderReference', value: '12345' });
  });

  test('a question does not fill a phone slot', () => {
    const cursor = DEFAULT_SLOT_ORDER.indexOf(ComplaintSlotName.PHONE);

    expect(classify('what does the manual say about returns?', collectingAt(cursor))).toMatchObject({
      label: IntentLabel.DOCUMENT_QUERY,
      confidence: 0.9,
    });
  });

  test('yes and no answer a pending confirmation', () => {
    const state: DialogueState = { kind: 'confirm_pending', draft: { order: DEFAULT_SLOT_ORDER, values: {} } };

    expect(classify('yes please', state).label).toBe(IntentLabel.PROVIDE_SLOT_VALUE);
    expect(classify('no', state).label).toBe(IntentLabel.PROVIDE_SLOT_VALUE);
  });

  test('a bare id answers a pending id request', () => {
    const result = classify('CMP-12345', { kind: 'awaiting_complaint_id' });

    expect(result.label).toBe(IntentLabel.PROVIDE_SLOT_VALUE);
    expect(result.slots).toEqual([{ name: 'complaintId', value: 'CMP-12345' }]);
  });

  test('a fuzzy match above the threshold carries its score', () => {
    expect(classify('I am not satisfied with my purchase at all', IDLE)).toMatchObject({
      label: IntentLabel.FILE_COMPLAINT,
      confidence: 1,
      source: 'fuzzy',
    });
  });

  test('falls back to the keyword hint', () => {
    expect(classify('I submitted a grievance yesterday', IDLE)).toMatchObject({
      label: IntentLabel.FILE_COMPLAINT,
      confidence: 0.6,
      source: 'nlp',
    });
  });

  test('a tie between intents with no hint is unknown', () => {
    expect(classify('complaint', IDLE)).toMatchObject({ label: IntentLabel.UNKNOWN, confidence: 0.3 });
  });

  test.each(['What is covered by the COVID-19 policy?', 'How do I reset router RT-AC68U?', 'What is the warranty on model X1000B?'])(
    'product codes do not turn %p into a complaint request',
    (utterance) => {
      expect(classify(utterance, IDLE)).toMatchObject({ label: IntentLabel.DOCUMENT_QUERY, confidence: 0.9 });
    },
  );

  test('a code-shaped token still answers a pending complaint id', () => {
    const result = classify('it is RT-AC68U', { kind: 'awaiting_complaint_id' });

    expect(result.label).toBe(IntentLabel.PROVIDE_SLOT_VALUE);
    expect(entitiesOf(result).complaintId).toBe('RT-AC68U');
  });

  test('questions without domain vocabulary are document queries', () => {
    expect(classify('what does the manual say about returns?', IDLE)).toMatchObject({
      label: IntentLabel.DOCUMENT_QUERY,
      confidence: 0.9,
      source: 'fallback',
    });
    expect(classify('tell me about shipping costs', IDLE)).toMatchObject({
      label: IntentLabel.DOCUMENT_QUERY,
      confidence: 0.6,
    });
  });
});
