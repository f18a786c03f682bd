import { IntentLabel } from '@helpdesk/shared-kernel';
import { isAffirmative, isNegative } from './commands';
import { DEFAULT_FUZZY_THRESHOLD, matchFuzzy } from './extractors/fuzzy-matcher';
import { extractNlp } from './extractors/nlp-extractor';
import { matchPatterns } from './extractors/pattern-matcher';
import { isPlausibleFor, SLOT_CATALOG } from './slots';
import { isQuestionShaped, tokenize } from './text';
import type {
  Classification,
  ComplaintIntent,
  DialogueState,
  ExtractedEntities,
  FuzzyMatch,
  NlpExtraction,
  SlotCandidate,
} from './types';

export const PATTERN_CONFIDENCE = 1.0;
export const SLOT_CONFIDENCE = 0.9;
export const NLP_CONFIDENCE = 0.6;
export const QUESTION_CONFIDENCE = 0.9;
export const STATEMENT_CONFIDENCE = 0.6;
export const UNKNOWN_CONFIDENCE = 0.3;

export interface ClassifierOptions {
  fuzzyThreshold?: number;
}

function toSlotCandidates(entities: ExtractedEntities): SlotCandidate[] {
  const slots: SlotCandidate[] = [];
  if (entities.complaintId) slots.push({ name: 'complaintId', value: entities.complaintId });
  if (entities.email) slots.push({ name: 'email', value: entities.email });
  if (entities.phone) slots.push({ name: 'phone', value: entities.phone });
  if (entities.personName) slots.push({ name: 'personName', value: entities.personName });
  if (entities.orderReference) slots.push({ name: 'orderReference', value: entities.orderReference });
  return slots;
}

/** Rebuilds the entity view of a classification's slot candidates. */
export function entitiesOf(classification: Classification): ExtractedEntities {
  const entities: ExtractedEntities = {};
  for (const slot of classification.slots) entities[slot.name] = slot.value;
  return entities;
}

function fillsPendingSlot(state: DialogueState, utterance: string, nlp: NlpExtraction): boolean {
  switch (state.kind) {
    case 'idle':
      return false;
    case 'collecting_complaint': {
      const name = state.draft.order[state.cursor];
      return name !== undefined && isPlausibleFor(SLOT_CATALOG[name].kind, utterance, nlp.hasDomainSignal);
    }
    case 'confirm_pending':
      return isAffirmative(utterance) || isNegative(utterance);
    case 'awaiting_complaint_id':
      return (
        nlp.entities.complaintId !== undefined ||
        tokenize(utterance).length === 1 ||
        (state.retryId !== undefined && isAffirmative(utterance))
      );
  }
}

/**
 * Picks the fuzzy intent. Two intents tied on score are resolved by the NLP hint; without one
 * the fuzzy signal is dropped as ambiguous.
 */
function resolveFuzzy(fuzzy: FuzzyMatch, hint: ComplaintIntent | undefined): { intent: ComplaintIntent; score: number } | undefined {
  const [best, runnerUp] = fuzzy.candidates;
  if (!fuzzy.matched || !best) return undefined;
  if (runnerUp && runnerUp.score === best.score) {
    return hint === undefined ? undefined : { intent: hint, score: best.score };
  }
  return { intent: best.intent, score: best.score };
}

/**
 * Fuses the three extractor results with the dialogue state. Pure.
 *
 * Precedence: pattern, pending slot, fuzzy, NLP hint, then the DocumentQuery/Unknown fallback.
 */
export function classify(utterance: string, state: DialogueState, options: ClassifierOptions = {}): Classification {
  const pattern = matchPatterns(utterance);
  const nlp = extractNlp(utterance);
  const slots = toSlotCandidates(nlp.entities);

  if (pattern.matched && pattern.intent) {
    return { label: pattern.intent, confidence: PATTERN_CONFIDENCE, slots, source: 'pattern', template: pattern.template };
  }

  if (fillsPendingSlot(state, utterance, nlp)) {
    return { label: IntentLabel.PROVIDE_SLOT_VALUE, confidence: SLOT_CONFIDENCE, slots, source: 'context' };
  }

  const fuzzy = resolveFuzzy(matchFuzzy(utterance, options.fuzzyThreshold ?? DEFAULT_FUZZY_THRESHOLD), nlp.intentHint);
  if (fuzzy) {
    return { label: fuzzy.intent, confidence: fuzzy.score, slots, source: 'fuzzy' };
  }

  if (nlp.intentHint) {
    return { label: nlp.intentHint, confidence: NLP_CONFIDENCE, slots, source: 'nlp' };
  }

  if (!nlp.hasDomainSignal) {
    return {
      label: IntentLabel.DOCUMENT_QUERY,
      confidence: isQuestionShaped(utterance) ? QUESTION_CONFIDENCE : STATEMENT_CONFIDENCE,
      slots,
      source: 'fallback',
    };
  }
  return { label: IntentLabel.UNKNOWN, confidence: UNKNOWN_CONFIDENCE, slots, source: 'fallback' };
}
