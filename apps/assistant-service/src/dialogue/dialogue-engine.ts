import { AppError, IntentLabel } from '@helpdesk/shared-kernel';
import { isResetCommand } from './commands';
import type { CollaboratorAction } from './conversation-context';
import { classify } from './intent-classifier';
import { refineQuery } from './query-refiner';
import { SessionStore } from './session-store';
import { DEFAULT_DIALOGUE_SETTINGS, type DialogueSettings } from './settings';
import { SLOT_CATALOG } from './slots';
import { applyOutcome, transition } from './state-machine';
import {
  IDLE,
  type ActionOutcome,
  type Classification,
  type ConversationTurn,
  type DialogueAction,
  type DialogueState,
  type SlotValues,
} from './types';

export const RESET_REPLY = 'Conversation cleared. How can I help you?';

export interface TurnDecision {
  sessionId: string;
  action: DialogueAction;
  classification: Classification;
  /** State after this turn; for collaborator actions, the state while the call is in flight. */
  state: DialogueState;
  abandoned: boolean;
  reset: boolean;
}

export interface TurnCompletion {
  sessionId: string;
  reply: string;
  state: DialogueState;
}

export interface SessionSnapshot {
  sessionId: string;
  state: DialogueState['kind'];
  awaitingSlot?: string;
  draft?: SlotValues;
  refineQuery: boolean;
  history: readonly ConversationTurn[];
}

export interface DialogueEngineOptions {
  settings?: DialogueSettings;
  sessionTtlMs?: number;
  now?: () => number;
}

const DEFAULT_SESSION_TTL_MS = 30 * 60_000;

/**
 * Turn handling over per-session contexts. A turn either ends in a reply, or in a collaborator
 * action whose result must be passed back through {@link DialogueEngine.completeTurn} before the
 * session's next turn.
 */
export class DialogueEngine {
  readonly settings: DialogueSettings;
  private readonly sessions: SessionStore;
  private readonly now: () => number;

  constructor(options: DialogueEngineOptions = {}) {
    this.settings = options.settings ?? DEFAULT_DIALOGUE_SETTINGS;
    this.now = options.now ?? Date.now;
    this.sessions = new SessionStore({
      ttlMs: options.sessionTtlMs ?? DEFAULT_SESSION_TTL_MS,
      historyWindow: this.settings.historyWindow,
      refinementDefault: this.settings.refinementDefault,
      now: this.now,
    });
  }

  handleTurn(sessionId: string, utterance: string): TurnDecision {
    const context = this.sessions.getOrCreate(sessionId);
    if (context.getPendingTurn()) {
      throw new AppError(409, 'TURN_IN_PROGRESS', `Session '${sessionId}' has a turn awaiting its outcome`);
    }

    if (isResetCommand(utterance)) {
      context.reset();
      return {
        sessionId,
        action: { type: 'reply', text: RESET_REPLY },
        classification: { label: IntentLabel.UNKNOWN, confidence: 1, slots: [], source: 'pattern', template: 'reset' },
        state: context.getState(),
        abandoned: false,
        reset: true,
      };
    }

    const classification = classify(utterance, context.getState(), { fuzzyThreshold: this.settings.fuzzyThreshold });
    const step = transition(context.getState(), classification, utterance, this.settings);

    let action = step.action;
    if (action.type === 'retrieve_documents') {
      action = {
        type: 'retrieve_documents',
        query: refineQuery(action.query, context.getHistory(), context.isRefinementEnabled()),
      };
    }

    context.setState(step.state);
    if (action.type === 'reply') {
      context.appendTurn({
        utterance,
        response: action.text,
        intent: classification.label,
        confidence: classification.confidence,
        timestamp: this.now(),
      });
    } else {
      context.setPendingTurn({ utterance, intent: classification.label, confidence: classification.confidence, action });
    }

    return { sessionId, action, classification, state: step.state, abandoned: step.abandoned, reset: false };
  }

  /** Applies the collaborator result for the session's pending action and records the turn. */
  completeTurn(sessionId: string, outcome: ActionOutcome): TurnCompletion {
    const context = this.sessions.getOrCreate(sessionId);
    const pending = context.getPendingTurn();
    if (!pending) {
      throw new AppError(409, 'NO_PENDING_TURN', `Session '${sessionId}' has no action awaiting an outcome`);
    }

    const result = applyOutcome(context.getState(), pending.action, outcome);
    context.setState(result.state);
    context.setPendingTurn(undefined);
    context.appendTurn({
      utterance: pending.utterance,
      response: result.reply,
      intent: pending.intent,
      confidence: pending.confidence,
      retrievalQuery: pending.action.type === 'retrieve_documents' ? pending.action.query : undefined,
      timestamp: this.now(),
    });
    return { sessionId, reply: result.reply, state: result.state };
  }

  /** The pending collaborator action, if a turn is waiting on one. */
  pendingAction(sessionId: string): CollaboratorAction | undefined {
    return this.sessions.get(sessionId)?.getPendingTurn()?.action;
  }

  history(sessionId: string): readonly ConversationTurn[] {
    return this.sessions.get(sessionId)?.getHistory() ?? [];
  }

  activeSessions(): number {
    return this.sessions.size();
  }

  reset(sessionId: string): void {
    this.sessions.get(sessionId)?.reset();
  }

  setRefinement(sessionId: string, enabled: boolean): void {
    this.sessions.getOrCreate(sessionId).setRefinement(enabled);
  }

  /** Read-only: an unknown or expired session reads as a fresh idle one and is not created. */
  describe(sessionId: string): SessionSnapshot {
    const context = this.sessions.get(sessionId);
    if (!context) {
      return { sessionId, state: IDLE.kind, refineQuery: this.settings.refinementDefault, history: [] };
    }
    const state = context.getState();
    const awaitingSlot =
      state.kind === 'collecting_complaint' ? state.draft.order[state.cursor] : undefined;
    const draft = context.getDraft();

    return {
      sessionId,
      state: state.kind,
      awaitingSlot: awaitingSlot ? SLOT_CATALOG[awaitingSlot].name : undefined,
      draft: draft ? { ...draft.values } : undefined,
      refineQuery: context.isRefinementEnabled(),
      history: context.getHistory(),
    };
  }
}
