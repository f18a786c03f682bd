import { AppError, ComplaintSlotName, IntentLabel, SlotKind } from '@helpdesk/shared-kernel';
import { isAffirmative, isCancel, isNegative } from './commands';
import { formatComplaintDetails, formatDraftSummary } from './complaint-format';
import { templateResidue } from './extractors/pattern-matcher';
import { entitiesOf } from './intent-classifier';
import { isValidEmail, isValidPersonName, isValidPhone, normalizePhone, SLOT_CATALOG, validateSlotValue } from './slots';
import { contentTokens } from './text';
import {
  IDLE,
  type ActionOutcome,
  type Classification,
  type ComplaintDraft,
  type ComplaintIntent,
  type DialogueAction,
  type DialogueState,
  type ExtractedEntities,
  type SlotValues,
} from './types';

export interface TransitionSettings {
  topicSwitchThreshold: number;
  slotOrder: readonly ComplaintSlotName[];
}

export interface Transition {
  state: DialogueState;
  action: DialogueAction;
  /** An in-progress flow was dropped for a new topic or a cancel. */
  abandoned: boolean;
}

export interface OutcomeResult {
  state: DialogueState;
  reply: string;
}

export const REPLIES = {
  clarify:
    'I\'m not sure what you\'d like to do. You can ask a question about our documents, say "file a complaint", ' +
    'or say "check complaint" followed by your complaint ID.',
  empty: 'Please type a message so I can help you.',
  startFiling: "To file your complaint, I'll need some information. ",
  alreadyFiling: "We're already filing your complaint. ",
  askComplaintId: 'Sure. Please provide your complaint ID.',
  invalidComplaintId: "I couldn't identify a complaint ID in your message. Please provide a valid complaint ID.",
  cancelled: "Okay, I've cancelled that. What else can I help you with?",
  discarded: "Okay, I've discarded your complaint. Is there anything else I can help you with?",
  confirmAgain: 'Please answer yes to submit your complaint or no to discard it.',
} as const;

function reply(text: string): DialogueAction {
  return { type: 'reply', text };
}

function firstUnfilled(draft: ComplaintDraft): number {
  return draft.order.findIndex((name) => !draft.values[name]);
}

/** The complaint intent a non-idle state belongs to. */
function flowIntent(state: DialogueState): ComplaintIntent | undefined {
  switch (state.kind) {
    case 'collecting_complaint':
    case 'confirm_pending':
      return IntentLabel.FILE_COMPLAINT;
    case 'awaiting_complaint_id':
      return IntentLabel.RETRIEVE_COMPLAINT;
    case 'idle':
      return undefined;
  }
}

export function isTopicSwitch(state: DialogueState, classification: Classification, threshold: number): boolean {
  const current = flowIntent(state);
  if (current === undefined || classification.confidence < threshold) return false;
  if (classification.label === IntentLabel.DOCUMENT_QUERY) return true;
  return (
    (classification.label === IntentLabel.FILE_COMPLAINT || classification.label === IntentLabel.RETRIEVE_COMPLAINT) &&
    classification.label !== current
  );
}

function prefill(order: readonly ComplaintSlotName[], entities: ExtractedEntities): SlotValues {
  const values: SlotValues = {};
  for (const name of order) {
    if (name === ComplaintSlotName.PHONE && entities.phone && isValidPhone(entities.phone)) {
      values[name] = normalizePhone(entities.phone);
    }
    if (name === ComplaintSlotName.EMAIL && entities.email && isValidEmail(entities.email)) {
      values[name] = entities.email;
    }
    if (name === ComplaintSlotName.NAME && entities.personName && isValidPersonName(entities.personName)) {
      values[name] = entities.personName;
    }
  }
  return values;
}

/** Moves to the first unfilled slot, or to confirmation when every slot has a value. */
function advance(draft: ComplaintDraft, lead: string): Transition {
  const cursor = firstUnfilled(draft);
  const name = draft.order[cursor];
  if (cursor === -1 || name === undefined) {
    return { state: { kind: 'confirm_pending', draft }, action: reply(formatDraftSummary(draft)), abandoned: false };
  }
  return {
    state: { kind: 'collecting_complaint', cursor, draft },
    action: reply(`${lead}${SLOT_CATALOG[name].prompt}`),
    abandoned: false,
  };
}

function fromIdle(classification: Classification, utterance: string, settings: TransitionSettings): Transition {
  const entities = entitiesOf(classification);

  switch (classification.label) {
    case IntentLabel.FILE_COMPLAINT: {
      const draft: ComplaintDraft = { order: settings.slotOrder, values: prefill(settings.slotOrder, entities) };
      return advance(draft, REPLIES.startFiling);
    }
    case IntentLabel.RETRIEVE_COMPLAINT:
      if (entities.complaintId) {
        return { state: IDLE, action: { type: 'fetch_complaint', id: entities.complaintId }, abandoned: false };
      }
      return { state: { kind: 'awaiting_complaint_id' }, action: reply(REPLIES.askComplaintId), abandoned: false };
    case IntentLabel.DOCUMENT_QUERY:
      if (!utterance.trim()) return { state: IDLE, action: reply(REPLIES.empty), abandoned: false };
      return { state: IDLE, action: { type: 'retrieve_documents', query: utterance.trim() }, abandoned: false };
    case IntentLabel.PROVIDE_SLOT_VALUE:
    case IntentLabel.UNKNOWN:
      return { state: IDLE, action: reply(REPLIES.clarify), abandoned: false };
  }
}

/** A filing request that also describes the problem, beyond the filing phrase itself. */
function carriesDetails(utterance: string): boolean {
  return contentTokens(templateResidue(utterance)).length >= 2;
}

function whileCollecting(
  state: Extract<DialogueState, { kind: 'collecting_complaint' }>,
  classification: Classification,
  utterance: string,
): Transition {
  const name = state.draft.order[state.cursor];
  if (name === undefined) return advance(state.draft, '');
  const slot = SLOT_CATALOG[name];

  if (
    classification.label === IntentLabel.FILE_COMPLAINT &&
    (slot.kind !== SlotKind.FREE_TEXT || !carriesDetails(utterance))
  ) {
    return { state, action: reply(`${REPLIES.alreadyFiling}${slot.prompt}`), abandoned: false };
  }

  const result = validateSlotValue(slot, utterance, entitiesOf(classification));
  if (!result.valid) return { state, action: reply(result.error), abandoned: false };

  const draft: ComplaintDraft = { order: state.draft.order, values: { ...state.draft.values, [name]: result.value } };
  return advance(draft, 'Thank you. ');
}

function whileConfirming(
  state: Extract<DialogueState, { kind: 'confirm_pending' }>,
  utterance: string,
): Transition {
  if (isNegative(utterance)) return { state: IDLE, action: reply(REPLIES.discarded), abandoned: true };
  if (isAffirmative(utterance)) {
    return { state, action: { type: 'submit_complaint', fields: { ...state.draft.values } }, abandoned: false };
  }
  return { state, action: reply(REPLIES.confirmAgain), abandoned: false };
}

function whileAwaitingId(
  state: Extract<DialogueState, { kind: 'awaiting_complaint_id' }>,
  classification: Classification,
  utterance: string,
): Transition {
  const id = entitiesOf(classification).complaintId;
  if (id) return { state: IDLE, action: { type: 'fetch_complaint', id }, abandoned: false };
  if (state.retryId && isAffirmative(utterance)) {
    return { state: IDLE, action: { type: 'fetch_complaint', id: state.retryId }, abandoned: false };
  }
  return { state, action: reply(REPLIES.invalidComplaintId), abandoned: false };
}

/**
 * One dialogue step. Pure: the caller stores the returned state. Content problems (bad slot
 * values, missing IDs, unclear intent) become replies, never exceptions.
 */
export function transition(
  state: DialogueState,
  classification: Classification,
  utterance: string,
  settings: TransitionSettings,
): Transition {
  if (state.kind !== 'idle' && isCancel(utterance)) {
    return { state: IDLE, action: reply(REPLIES.cancelled), abandoned: true };
  }

  if (isTopicSwitch(state, classification, settings.topicSwitchThreshold)) {
    return { ...fromIdle(classification, utterance, settings), abandoned: true };
  }

  switch (state.kind) {
    case 'idle':
      return fromIdle(classification, utterance, settings);
    case 'collecting_complaint':
      return whileCollecting(state, classification, utterance);
    case 'confirm_pending':
      return whileConfirming(state, utterance);
    case 'awaiting_complaint_id':
      return whileAwaitingId(state, classification, utterance);
  }
}

function mismatch(action: DialogueAction, outcome: ActionOutcome): AppError {
  return new AppError(409, 'OUTCOME_MISMATCH', `Outcome '${outcome.type}' does not answer action '${action.type}'`);
}

/**
 * Applies a collaborator result to the state the action was issued from. Failures keep what the
 * user already entered so answering "yes" retries.
 */
export function applyOutcome(state: DialogueState, action: DialogueAction, outcome: ActionOutcome): OutcomeResult {
  switch (action.type) {
    case 'submit_complaint':
      if (outcome.type === 'complaint_submitted') {
        return {
          state: IDLE,
          reply: `Your complaint has been registered with ID: ${outcome.complaintId}. You'll hear back from us soon.`,
        };
      }
      if (outcome.type === 'backend_failure') {
        return {
          state,
          reply:
            `There was an issue registering your complaint: ${outcome.message}. ` +
            'Your details are saved; answer yes to try again or no to discard them.',
        };
      }
      throw mismatch(action, outcome);

    case 'fetch_complaint':
      if (outcome.type === 'complaint_found') return { state: IDLE, reply: formatComplaintDetails(outcome.record) };
      if (outcome.type === 'complaint_not_found') {
        return {
          state: IDLE,
          reply: `I couldn't find any complaint with ID: ${outcome.id}. Please verify the ID and try again.`,
        };
      }
      if (outcome.type === 'backend_failure') {
        return {
          state: { kind: 'awaiting_complaint_id', retryId: action.id },
          reply:
            `I couldn't look up complaint ${action.id} right now (${outcome.message}). ` +
            'Answer yes to try again, or send a different complaint ID.',
        };
      }
      throw mismatch(action, outcome);

    case 'retrieve_documents':
      if (outcome.type === 'documents_answered') return { state, reply: outcome.answer };
      if (outcome.type === 'backend_failure') {
        return { state, reply: `I couldn't search the documents right now (${outcome.message}). Please try again shortly.` };
      }
      throw mismatch(action, outcome);

    case 'reply':
      throw mismatch(action, outcome);
  }
}
