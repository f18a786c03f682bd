import { ComplaintSlotName, SlotKind } from '@helpdesk/shared-kernel';
import { isQuestionShaped, tokenize } from './text';
import type { ExtractedEntities } from './types';

export interface SlotDefinition {
  name: ComplaintSlotName;
  kind: SlotKind;
  prompt: string;
  /** Reply when a value of the wrong shape is given. */
  invalidText: string;
  /** Summary label used in the confirmation reply. */
  label: string;
}

export type SlotValidation = { valid: true; value: string } | { valid: false; error: string };

export const SLOT_CATALOG: Record<ComplaintSlotName, SlotDefinition> = {
  [ComplaintSlotName.DESCRIPTION]: {
    name: ComplaintSlotName.DESCRIPTION,
    kind: SlotKind.FREE_TEXT,
    prompt: 'Please describe your complaint in detail.',
    invalidText: "I didn't catch that. Please describe your complaint in detail.",
    label: 'Details',
  },
  [ComplaintSlotName.NAME]: {
    name: ComplaintSlotName.NAME,
    kind: SlotKind.PERSON_NAME,
    prompt: 'What is your name?',
    invalidText: 'That does not look like a name. Please enter your name (e.g., Jane Doe).',
    label: 'Name',
  },
  [ComplaintSlotName.PHONE]: {
    name: ComplaintSlotName.PHONE,
    kind: SlotKind.PHONE,
    prompt: 'What is your phone number? Please enter a 10-digit number without spaces or special characters.',
    invalidText:
      'Oops! The number you entered is not a valid phone number. Please enter a 10-digit phone number (e.g., 1234567890).',
    label: 'Phone',
  },
  [ComplaintSlotName.EMAIL]: {
    name: ComplaintSlotName.EMAIL,
    kind: SlotKind.EMAIL,
    prompt: 'Please provide your email address in the format name@example.com.',
    invalidText:
      'Oops! The email address you entered is not valid. Please enter a valid email address (e.g., name@example.com).',
    label: 'Email',
  },
};

export const DEFAULT_SLOT_ORDER: readonly ComplaintSlotName[] = [
  ComplaintSlotName.DESCRIPTION,
  ComplaintSlotName.NAME,
  ComplaintSlotName.PHONE,
  ComplaintSlotName.EMAIL,
];

export function isComplaintSlotName(value: string): value is ComplaintSlotName {
  return Object.prototype.hasOwnProperty.call(SLOT_CATALOG, value);
}

const EMAIL_SHAPE = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const NAME_SHAPE = /^[A-Za-z][A-Za-z.'-]*$/;

export function normalizePhone(raw: string): string {
  return raw.replace(/[\s\-().]/g, '');
}

export function isValidPhone(raw: string): boolean {
  const cleaned = normalizePhone(raw);
  return /^\d{10}$/.test(cleaned) || /^\+\d{1,3}\d{10}$/.test(cleaned);
}

export function isValidEmail(raw: string): boolean {
  return EMAIL_SHAPE.test(raw);
}

export function isValidPersonName(raw: string): boolean {
  const words = raw.trim().split(/\s+/);
  return raw.trim().length > 0 && words.length <= 4 && words.every((word) => NAME_SHAPE.test(word));
}

/**
 * Turns a user reply into the value stored for a slot. Extracted entities take precedence over
 * the raw text so "my email is jane@example.com" stores only the address.
 */
export function validateSlotValue(
  slot: SlotDefinition,
  utterance: string,
  entities: ExtractedEntities,
): SlotValidation {
  const text = utterance.trim();
  if (!text) return { valid: false, error: slot.invalidText };

  switch (slot.kind) {
    case SlotKind.PHONE: {
      const candidate = entities.phone ?? text;
      return isValidPhone(candidate)
        ? { valid: true, value: normalizePhone(candidate) }
        : { valid: false, error: slot.invalidText };
    }
    case SlotKind.EMAIL: {
      const candidate = entities.email ?? text;
      return isValidEmail(candidate) ? { valid: true, value: candidate } : { valid: false, error: slot.invalidText };
    }
    case SlotKind.PERSON_NAME: {
      const candidate = (entities.personName ?? text).replace(/[.!]+$/, '');
      return isValidPersonName(candidate)
        ? { valid: true, value: candidate }
        : { valid: false, error: slot.invalidText };
    }
    case SlotKind.IDENTIFIER: {
      const candidate = entities.complaintId;
      return candidate ? { valid: true, value: candidate } : { valid: false, error: slot.invalidText };
    }
    case SlotKind.FREE_TEXT:
      return { valid: true, value: text };
  }
}

/**
 * Whether an utterance could be an answer for a slot of this kind. Used by the classifier to keep
 * a pending slot ahead of weak intent signals; the value itself is validated later.
 */
export function isPlausibleFor(kind: SlotKind, utterance: string, hasDomainSignal: boolean): boolean {
  const text = utterance.trim();
  if (!text) return true;
  const words = tokenize(text);

  switch (kind) {
    case SlotKind.PHONE:
      return /\d/.test(text);
    case SlotKind.EMAIL:
      return text.includes('@') || words.length === 1;
    case SlotKind.PERSON_NAME:
      return !isQuestionShaped(text) && words.length <= 6;
    case SlotKind.IDENTIFIER:
      return words.length === 1;
    case SlotKind.FREE_TEXT:
      return !isQuestionShaped(text) || hasDomainSignal;
  }
}
