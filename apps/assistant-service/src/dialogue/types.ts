import type { ComplaintRecordDto, ComplaintSlotName, IntentLabel } from '@helpdesk/shared-kernel';

export type ComplaintIntent = IntentLabel.FILE_COMPLAINT | IntentLabel.RETRIEVE_COMPLAINT;

// ─── Extractor results ─────────────────────────────
export interface PatternMatch {
  matched: boolean;
  intent?: ComplaintIntent;
  template?: string;
}

export interface FuzzyCandidate {
  intent: ComplaintIntent;
  phrase: string;
  score: number;
}

export interface FuzzyMatch {
  matched: boolean;
  best?: FuzzyCandidate;
  /** Best candidate per intent, highest score first. */
  candidates: FuzzyCandidate[];
}

export interface ExtractedEntities {
  complaintId?: string;
  email?: string;
  phone?: string;
  personName?: string;
  orderReference?: string;
}

export interface NlpExtraction {
  keywords: string[];
  verbs: string[];
  intentHint?: ComplaintIntent;
  entities: ExtractedEntities;
  /** A complaint-domain keyword or a complaint ID was found. */
  hasDomainSignal: boolean;
}

// ─── Classification ────────────────────────────────
export type SignalSource = 'pattern' | 'context' | 'fuzzy' | 'nlp' | 'fallback';

export interface SlotCandidate {
  name: 'complaintId' | 'email' | 'phone' | 'personName' | 'orderReference';
  value: string;
}

export interface Classification {
  label: IntentLabel;
  confidence: number;
  slots: SlotCandidate[];
  source: SignalSource;
  template?: string;
}

// ─── Dialogue state ────────────────────────────────
export type SlotValues = Partial<Record<ComplaintSlotName, string>>;

export interface ComplaintDraft {
  readonly order: readonly ComplaintSlotName[];
  readonly values: Readonly<SlotValues>;
}

export type DialogueState =
  | { readonly kind: 'idle' }
  | { readonly kind: 'collecting_complaint'; readonly cursor: number; readonly draft: ComplaintDraft }
  | { readonly kind: 'confirm_pending'; readonly draft: ComplaintDraft }
  | { readonly kind: 'awaiting_complaint_id'; readonly retryId?: string };

export const IDLE: DialogueState = { kind: 'idle' };

// ─── Actions & outcomes ────────────────────────────
export type DialogueAction =
  | { type: 'reply'; text: string }
  | { type: 'submit_complaint'; fields: SlotValues }
  | { type: 'fetch_complaint'; id: string }
  | { type: 'retrieve_documents'; query: string };

export type ComplaintRecord = ComplaintRecordDto;

export type ActionOutcome =
  | { type: 'complaint_submitted'; complaintId: string }
  | { type: 'complaint_found'; record: ComplaintRecord }
  | { type: 'complaint_not_found'; id: string }
  | { type: 'documents_answered'; answer: string }
  | { type: 'backend_failure'; message: string };

// ─── History ───────────────────────────────────────
export interface ConversationTurn {
  readonly utterance: string;
  readonly response: string | null;
  readonly intent: IntentLabel;
  readonly confidence: number;
  /** Query handed to document retrieval, for DocumentQuery turns. */
  readonly retrievalQuery?: string;
  readonly timestamp: number;
}
