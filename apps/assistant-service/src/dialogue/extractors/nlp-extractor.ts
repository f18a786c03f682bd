import { IntentLabel } from '@helpdesk/shared-kernel';
import vocabulary from '../data/domain-vocabulary.json';
import { isStopword, tokenize } from '../text';
import type { ComplaintIntent, ExtractedEntities, NlpExtraction } from '../types';

const ID_BODY = '[A-Z0-9][A-Z0-9-]{4,}[A-Z0-9]';

const EXPLICIT_ID_PATTERNS = [
  new RegExp(`(?:my|the)\\s+complaint\\s+id\\s+(?:is|was|:)?\\s*(${ID_BODY})`, 'i'),
  new RegExp(`status\\s+of\\s+complaint\\s+id\\s*[:=]?\\s*(${ID_BODY})`, 'i'),
  new RegExp(`complaint\\s+(?:number|no\\.?|#)\\s*[:=]?\\s*(${ID_BODY})`, 'i'),
  new RegExp(`complaint\\s+(?:id\\s*(?:is\\s+|[:=]\\s*)?)?(${ID_BODY})`, 'i'),
  new RegExp(`\\bid\\s*(?:is\\s+|[:=]\\s*)?(${ID_BODY})`, 'i'),
];
const WHOLE_ID = new RegExp(`^#?(${ID_BODY})$`, 'i');
const FREE_ID = new RegExp(`(?<![#@\\w-])(${ID_BODY})(?![@\\w-])`, 'gi');

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/;
const PHONE_PATTERNS = [
  /\+\d{1,3}\s?\d{10}\b/,
  /\(\d{3}\)\s?\d{3}-\d{4}/,
  /\b\d{3}[-.\s]\d{3}[-.\s]\d{4}\b/,
  /\b\d{10}\b/,
];
const ORDER_PATTERNS = [/#\s?([A-Z0-9-]{3,})\b/i, /\border\s+(?:number|no\.?)?\s*([0-9][A-Z0-9-]{2,})\b/i];
const NAME_LEAD = /\b(?:my name is|my name's|name is|call me|i am called)\s+(.+)$/i;
const NAME_WORD = /^[A-Za-z][A-Za-z.'-]*$/;

const FILING_KEYWORDS = new Set(vocabulary.filingKeywords);
const RETRIEVAL_KEYWORDS = new Set(vocabulary.retrievalKeywords);
const DOMAIN_KEYWORDS = new Set(vocabulary.domainKeywords);
const FILING_VERBS = new Set(vocabulary.filingVerbs);
const RETRIEVAL_VERBS = new Set(vocabulary.retrievalVerbs);
const IRREGULAR = new Map<string, string>(Object.entries(vocabulary.irregularVerbs));

function inflections(base: string): string[] {
  const stem = base.endsWith('e') ? base.slice(0, -1) : base;
  const forms = [base, `${base}s`, `${stem}ed`, `${stem}ing`];
  if (/[^aeiou][aeiou][bdgmnprt]$/.test(base)) {
    const last = base.slice(-1);
    forms.push(`${base}${last}ed`, `${base}${last}ing`);
  }
  return forms;
}

const VERB_FORMS = new Map<string, string>();
for (const base of [...FILING_VERBS, ...RETRIEVAL_VERBS]) {
  for (const form of inflections(base)) VERB_FORMS.set(form, base);
}

/** Maps an inflected form of a known action verb to its base form; other tokens pass through. */
export function lemmatize(token: string): string {
  return IRREGULAR.get(token) ?? VERB_FORMS.get(token) ?? token;
}

function hasDigit(value: string): boolean {
  return /\d/.test(value);
}

interface ComplaintIdMatch {
  id: string;
  /** Found inside free text rather than as the whole message or after "complaint id". */
  free: boolean;
}

function findComplaintId(text: string): ComplaintIdMatch | undefined {
  const trimmed = text.trim().replace(/[.!?]+$/, '');
  const whole = trimmed.match(WHOLE_ID);
  if (whole && hasDigit(whole[1])) return { id: whole[1], free: false };

  for (const pattern of EXPLICIT_ID_PATTERNS) {
    const match = trimmed.match(pattern);
    if (match && hasDigit(match[1])) return { id: match[1], free: false };
  }

  for (const match of trimmed.matchAll(FREE_ID)) {
    const candidate = match[1];
    if (hasDigit(candidate) && /[A-Z]/i.test(candidate)) return { id: candidate, free: true };
  }
  return undefined;
}

export function extractComplaintId(text: string): string | undefined {
  return findComplaintId(text)?.id;
}

function extractPhone(text: string): string | undefined {
  for (const pattern of PHONE_PATTERNS) {
    const match = text.match(pattern);
    if (match) return match[0];
  }
  return undefined;
}

function extractOrderReference(text: string): string | undefined {
  for (const pattern of ORDER_PATTERNS) {
    const match = text.match(pattern);
    if (match) return match[1];
  }
  return undefined;
}

function extractPersonName(text: string): string | undefined {
  const lead = text.match(NAME_LEAD);
  if (!lead) return undefined;

  const words: string[] = [];
  for (const raw of lead[1].trim().split(/\s+/)) {
    const word = raw.replace(/[,.!?;:]+$/, '');
    if (!NAME_WORD.test(word) || isStopword(word.toLowerCase())) break;
    words.push(word);
    if (words.length === 4 || word !== raw) break;
  }
  return words.length > 0 ? words.join(' ') : undefined;
}

function withoutEmail(text: string): { text: string; email?: string } {
  const email = text.match(EMAIL_PATTERN)?.[0];
  return { text: email ? text.replace(email, ' ') : text, email };
}

export function extractEntities(text: string): ExtractedEntities {
  const stripped = withoutEmail(text);
  return {
    complaintId: extractComplaintId(stripped.text),
    email: stripped.email,
    phone: extractPhone(stripped.text),
    personName: extractPersonName(stripped.text),
    orderReference: extractOrderReference(stripped.text),
  };
}

function pickIntentHint(lemmas: string[]): ComplaintIntent | undefined {
  const hasFilingKeyword = lemmas.some((t) => FILING_KEYWORDS.has(t));
  const hasRetrievalKeyword = lemmas.some((t) => RETRIEVAL_KEYWORDS.has(t));

  for (const lemma of lemmas) {
    if (FILING_VERBS.has(lemma) && hasFilingKeyword) return IntentLabel.FILE_COMPLAINT;
    if (RETRIEVAL_VERBS.has(lemma) && hasRetrievalKeyword) return IntentLabel.RETRIEVE_COMPLAINT;
  }
  return undefined;
}

/**
 * Keyword and entity extraction for complaint-domain utterances. Pure; the first action verb
 * paired with a keyword of its kind decides the intent hint.
 */
export function extractNlp(utterance: string): NlpExtraction {
  const lemmas = tokenize(utterance).map(lemmatize);
  const keywords = lemmas.filter((t) => FILING_KEYWORDS.has(t) || RETRIEVAL_KEYWORDS.has(t) || DOMAIN_KEYWORDS.has(t));
  const verbs = lemmas.filter((t) => FILING_VERBS.has(t) || RETRIEVAL_VERBS.has(t));
  const entities = extractEntities(utterance);
  const intentHint = pickIntentHint(lemmas);
  // Product codes and model numbers look like IDs; a free-floating one needs complaint vocabulary beside it.
  const idMatch = findComplaintId(withoutEmail(utterance).text);
  const idSignal = idMatch !== undefined && (!idMatch.free || keywords.length > 0);

  return {
    keywords: [...new Set(keywords)],
    verbs: [...new Set(verbs)],
    intentHint,
    entities,
    hasDomainSignal: lemmas.some((t) => DOMAIN_KEYWORDS.has(t)) || idSignal || intentHint !== undefined,
  };
}
