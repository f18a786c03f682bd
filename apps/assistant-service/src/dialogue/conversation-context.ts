import type { ComplaintSlotName } from '@helpdesk/shared-kernel';
import { IDLE, type ComplaintDraft, type ConversationTurn, type DialogueAction, type DialogueState } from './types';

export type CollaboratorAction = Exclude<DialogueAction, { type: 'reply' }>;

/** A turn whose reply waits on a collaborator call. */
export interface PendingTurn {
  utterance: string;
  intent: ConversationTurn['intent'];
  confidence: number;
  action: CollaboratorAction;
}

/**
 * Per-session dialogue memory: a bounded turn window, the current state (which carries the
 * draft) and the refinement toggle. Owned by exactly one session.
 */
export class ConversationContext {
  private turns: ConversationTurn[] = [];
  private state: DialogueState = IDLE;
  private refinement: boolean;
  private pending: PendingTurn | undefined;

  constructor(
    readonly sessionId: string,
    private readonly capacity: number,
    refinementEnabled: boolean,
  ) {
    this.refinement = refinementEnabled;
  }

  appendTurn(turn: ConversationTurn): void {
    this.turns.push(turn);
    if (this.turns.length > this.capacity) {
      this.turns.splice(0, this.turns.length - this.capacity);
    }
  }

  /** Most recent turns, oldest first. */
  getHistory(limit = this.capacity): readonly ConversationTurn[] {
    if (limit <= 0) return [];
    return this.turns.slice(-limit);
  }

  getState(): DialogueState {
    return this.state;
  }

  setState(state: DialogueState): void {
    this.state = state;
  }

  getDraft(): ComplaintDraft | undefined {
    return this.state.kind === 'collecting_complaint' || this.state.kind === 'confirm_pending'
      ? this.state.draft
      : undefined;
  }

  /** Writes a slot value into the active draft. No-op when no complaint is being collected. */
  updateSlot(name: ComplaintSlotName, value: string): void {
    const state = this.state;
    if (state.kind !== 'collecting_complaint' && state.kind !== 'confirm_pending') return;
    const draft: ComplaintDraft = { order: state.draft.order, values: { ...state.draft.values, [name]: value } };
    this.state = { ...state, draft };
  }

  isRefinementEnabled(): boolean {
    return this.refinement;
  }

  setRefinement(enabled: boolean): void {
    this.refinement = enabled;
  }

  getPendingTurn(): PendingTurn | undefined {
    return this.pending;
  }

  setPendingTurn(pending: PendingTurn | undefined): void {
    this.pending = pending;
  }

  /** Clears history and any draft; the refinement toggle survives. */
  reset(): void {
    this.turns = [];
    this.state = IDLE;
    this.pending = undefined;
  }
}
