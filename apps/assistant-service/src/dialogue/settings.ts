import { ComplaintSlotName, ConfigurationError } from '@helpdesk/shared-kernel';
import { DEFAULT_FUZZY_THRESHOLD } from './extractors/fuzzy-matcher';
import { DEFAULT_SLOT_ORDER, isComplaintSlotName } from './slots';

export interface DialogueSettings {
  fuzzyThreshold: number;
  topicSwitchThreshold: number;
  historyWindow: number;
  refinementDefault: boolean;
  slotOrder: readonly ComplaintSlotName[];
}

export const DEFAULT_DIALOGUE_SETTINGS: DialogueSettings = {
  fuzzyThreshold: DEFAULT_FUZZY_THRESHOLD,
  topicSwitchThreshold: 0.8,
  historyWindow: 6,
  refinementDefault: true,
  slotOrder: DEFAULT_SLOT_ORDER,
};

export interface DialogueSettingsInput {
  fuzzyThreshold?: number;
  topicSwitchThreshold?: number;
  historyWindow?: number;
  refinementDefault?: boolean;
  /** Comma-separated slot names, in the order they are asked. */
  slots?: string;
}

function assertUnitInterval(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0 || value > 1) {
    throw new ConfigurationError(`${name} must be in (0, 1]`, { [name]: value });
  }
}

export function parseSlotOrder(raw: string): ComplaintSlotName[] {
  const names = raw
    .split(',')
    .map((s) => s.trim().toLowerCase())
    .filter(Boolean);

  if (names.length === 0) throw new ConfigurationError('COMPLAINT_SLOTS must name at least one slot');

  const order: ComplaintSlotName[] = [];
  for (const name of names) {
    if (!isComplaintSlotName(name)) {
      throw new ConfigurationError(`Unknown complaint slot "${name}"`, { slots: raw });
    }
    if (order.includes(name)) {
      throw new ConfigurationError(`Complaint slot "${name}" is listed twice`, { slots: raw });
    }
    order.push(name);
  }
  // The complaint backend rejects a complaint without details.
  if (!order.includes(ComplaintSlotName.DESCRIPTION)) {
    throw new ConfigurationError(`COMPLAINT_SLOTS must include "${ComplaintSlotName.DESCRIPTION}"`, { slots: raw });
  }
  return order;
}

/** Builds the engine settings; a bad threshold or slot list is fatal at startup. */
export function buildDialogueSettings(input: DialogueSettingsInput = {}): DialogueSettings {
  const settings: DialogueSettings = {
    fuzzyThreshold: input.fuzzyThreshold ?? DEFAULT_DIALOGUE_SETTINGS.fuzzyThreshold,
    topicSwitchThreshold: input.topicSwitchThreshold ?? DEFAULT_DIALOGUE_SETTINGS.topicSwitchThreshold,
    historyWindow: input.historyWindow ?? DEFAULT_DIALOGUE_SETTINGS.historyWindow,
    refinementDefault: input.refinementDefault ?? DEFAULT_DIALOGUE_SETTINGS.refinementDefault,
    slotOrder: input.slots === undefined ? DEFAULT_DIALOGUE_SETTINGS.slotOrder : parseSlotOrder(input.slots),
  };

  assertUnitInterval('fuzzyThreshold', settings.fuzzyThreshold);
  assertUnitInterval('topicSwitchThreshold', settings.topicSwitchThreshold);
  if (!Number.isInteger(settings.historyWindow) || settings.historyWindow < 1) {
    throw new ConfigurationError('historyWindow must be a positive integer', { historyWindow: settings.historyWindow });
  }
  return settings;
}
