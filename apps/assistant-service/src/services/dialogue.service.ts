import { createLogger } from '@helpdesk/observability';
import { BackendFailureError, IntentLabel, type HistoryEntryDto } from '@helpdesk/shared-kernel';
import { randomUUID } from 'crypto';
import type { ComplaintClient } from '../clients/complaint.client';
import type { DocumentAnswerClient } from '../clients/ragClient';
import type { DialogueEngine, SessionSnapshot } from '../dialogue/dialogue-engine';
import type { ActionOutcome, DialogueAction, DialogueState } from '../dialogue/types';
import type { CollaboratorAction } from '../dialogue/conversation-context';

const log = createLogger('dialogue-service');

export const RAG_DISABLED_REPLY =
  'Document search is not available right now. You can still file a complaint or check an existing one.';

export interface TurnResult {
  sessionId: string;
  reply: string;
  intent: IntentLabel;
  confidence: number;
  action: DialogueAction['type'];
  state: DialogueState['kind'];
  query?: string;
  complaintId?: string;
}

export interface DialogueServiceDeps {
  engine: DialogueEngine;
  complaints: ComplaintClient;
  /** Absent when document answering is disabled. */
  documents?: DocumentAnswerClient;
}

export interface DialogueService {
  handleMessage(sessionId: string, text: string, correlationId?: string): Promise<TurnResult>;
  /** Queued behind the session's in-flight turn. */
  resetSession(sessionId: string): Promise<void>;
  /** Queued behind the session's in-flight turn. */
  updateSettings(sessionId: string, settings: { refineQuery: boolean }): Promise<SessionSnapshot>;
  describeSession(sessionId: string): SessionSnapshot;
  activeSessions(): number;
}

function toHistory(engine: DialogueEngine, sessionId: string): HistoryEntryDto[] {
  return engine.history(sessionId).flatMap((turn) => {
    const entries: HistoryEntryDto[] = [{ role: 'user', content: turn.utterance }];
    if (turn.response !== null) entries.push({ role: 'assistant', content: turn.response });
    return entries;
  });
}

/**
 * Wires the dialogue engine to its collaborators. Turns of one session run strictly one after
 * another; different sessions proceed independently.
 */
export function createDialogueService(deps: DialogueServiceDeps): DialogueService {
  const { engine, complaints, documents } = deps;
  const queues = new Map<string, Promise<unknown>>();

  function enqueue<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = queues.get(sessionId) ?? Promise.resolve();
    const run = previous.then(task);
    const settled = run.catch(() => undefined);
    queues.set(sessionId, settled);
    void settled.then(() => {
      if (queues.get(sessionId) === settled) queues.delete(sessionId);
    });
    return run;
  }

  async function execute(
    sessionId: string,
    action: CollaboratorAction,
    correlationId: string,
  ): Promise<ActionOutcome> {
    switch (action.type) {
      case 'submit_complaint': {
        const result = await complaints.submit(action.fields, correlationId);
        return result.type === 'submitted'
          ? { type: 'complaint_submitted', complaintId: result.complaintId }
          : { type: 'backend_failure', message: result.message };
      }
      case 'fetch_complaint': {
        const result = await complaints.fetch(action.id, correlationId);
        if (result.type === 'found') return { type: 'complaint_found', record: result.record };
        if (result.type === 'not_found') return { type: 'complaint_not_found', id: result.id };
        return { type: 'backend_failure', message: result.message };
      }
      case 'retrieve_documents': {
        if (!documents) return { type: 'documents_answered', answer: RAG_DISABLED_REPLY };
        try {
          const answer = await documents.ask(action.query, toHistory(engine, sessionId), correlationId);
          return { type: 'documents_answered', answer: answer.answer };
        } catch (error) {
          if (error instanceof BackendFailureError) return { type: 'backend_failure', message: 'the answer service is unavailable' };
          throw error;
        }
      }
    }
  }

  async function runTurn(sessionId: string, text: string, correlationId: string): Promise<TurnResult> {
    const decision = engine.handleTurn(sessionId, text);
    const base = {
      sessionId,
      intent: decision.classification.label,
      confidence: decision.classification.confidence,
      action: decision.action.type,
    };

    log.info(
      {
        correlationId,
        sessionId,
        intent: base.intent,
        confidence: base.confidence,
        source: decision.classification.source,
        action: base.action,
        state: decision.state.kind,
        abandoned: decision.abandoned,
      },
      'turn classified',
    );

    if (decision.action.type === 'reply') {
      return { ...base, reply: decision.action.text, state: decision.state.kind };
    }

    const action = decision.action;
    let outcome: ActionOutcome;
    try {
      outcome = await execute(sessionId, action, correlationId);
    } catch (error) {
      engine.completeTurn(sessionId, { type: 'backend_failure', message: 'unexpected error' });
      throw error;
    }
    const completion = engine.completeTurn(sessionId, outcome);

    return {
      ...base,
      reply: completion.reply,
      state: completion.state.kind,
      query: action.type === 'retrieve_documents' ? action.query : undefined,
      complaintId:
        outcome.type === 'complaint_submitted'
          ? outcome.complaintId
          : action.type === 'fetch_complaint'
            ? action.id
            : undefined,
    };
  }

  return {
    handleMessage(sessionId, text, correlationId = randomUUID()) {
      return enqueue(sessionId, () => runTurn(sessionId, text, correlationId));
    },

    resetSession(sessionId) {
      return enqueue(sessionId, async () => {
        engine.reset(sessionId);
        log.info({ sessionId }, 'session reset');
      });
    },

    updateSettings(sessionId, settings) {
      return enqueue(sessionId, async () => {
        engine.setRefinement(sessionId, settings.refineQuery);
        return engine.describe(sessionId);
      });
    },

    describeSession(sessionId) {
      return engine.describe(sessionId);
    },

    activeSessions() {
      return engine.activeSessions();
    },
  };
}
