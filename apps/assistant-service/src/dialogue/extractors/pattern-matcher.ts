import { IntentLabel } from '@helpdesk/shared-kernel';
import type { ComplaintIntent, PatternMatch } from '../types';

interface PatternTemplate {
  name: string;
  intent: ComplaintIntent;
  pattern: RegExp;
}

const TEMPLATES: PatternTemplate[] = [
  { name: 'file_a_complaint', intent: IntentLabel.FILE_COMPLAINT, pattern: /\bfile\s+an?\s+(?:new\s+)?complaint\b/i },
  { name: 'submit_a_complaint', intent: IntentLabel.FILE_COMPLAINT, pattern: /\bsubmit\s+an?\s+(?:new\s+)?complaint\b/i },
  { name: 'make_a_complaint', intent: IntentLabel.FILE_COMPLAINT, pattern: /\bmake\s+an?\s+(?:new\s+)?complaint\b/i },
  { name: 'register_a_complaint', intent: IntentLabel.FILE_COMPLAINT, pattern: /\bregister\s+an?\s+(?:new\s+)?complaint\b/i },
  { name: 'lodge_a_complaint', intent: IntentLabel.FILE_COMPLAINT, pattern: /\blodge\s+an?\s+(?:new\s+)?complaint\b/i },
  { name: 'raise_a_complaint', intent: IntentLabel.FILE_COMPLAINT, pattern: /\braise\s+an?\s+(?:new\s+)?complaint\b/i },
  { name: 'complain_about', intent: IntentLabel.FILE_COMPLAINT, pattern: /\bcomplain\s+about\b/i },
  { name: 'report_an_issue', intent: IntentLabel.FILE_COMPLAINT, pattern: /\breport\s+an?\s+issue\b/i },
  { name: 'report_a_problem', intent: IntentLabel.FILE_COMPLAINT, pattern: /\breport\s+a\s+problem\b/i },
  {
    name: 'verb_complaint',
    intent: IntentLabel.RETRIEVE_COMPLAINT,
    pattern:
      /\b(?:get|show|view|check|retrieve)\s+(?:me\s+)?(?:my\s+)?(?:the\s+)?(?:details|status|info)?\s*(?:for|of|about|on)?\s*(?:my\s+)?(?:complaint|issue|ticket)\b/i,
  },
  {
    name: 'where_is_complaint',
    intent: IntentLabel.RETRIEVE_COMPLAINT,
    pattern: /\b(?:what|where)\s+is\s+(?:my\s+)?(?:complaint|issue|ticket)\b/i,
  },
  { name: 'track_complaint', intent: IntentLabel.RETRIEVE_COMPLAINT, pattern: /\btrack\s+(?:my\s+)?(?:complaint|issue|ticket)\b/i },
  {
    name: 'complaint_id_reference',
    intent: IntentLabel.RETRIEVE_COMPLAINT,
    pattern: /\bcomplaint\s+(?:id|number|no\.?|#)\s*(?:is\s+|[:=#]\s*)?[A-Z0-9][A-Z0-9-]{4,}[A-Z0-9]\b/i,
  },
];

/**
 * Deterministic template match. The first template that fires wins; filing templates are
 * listed before retrieval ones.
 */
export function matchPatterns(utterance: string): PatternMatch {
  for (const template of TEMPLATES) {
    if (template.pattern.test(utterance)) {
      return { matched: true, intent: template.intent, template: template.name };
    }
  }
  return { matched: false };
}

/** The utterance with the span of the first matching template removed. */
export function templateResidue(utterance: string): string {
  for (const template of TEMPLATES) {
    const match = template.pattern.exec(utterance);
    if (match) return `${utterance.slice(0, match.index)} ${utterance.slice(match.index + match[0].length)}`;
  }
  return utterance;
}
