import { ComplaintSlotName, SlotKind } from '@helpdesk/shared-kernel';
import { isPlausibleFor, isValidPhone, SLOT_CATALOG, validateSlotValue } from '../slots';

const phone = SLOT_CATALOG[ComplaintSlotName.PHONE];
const email = SLOT_CATALOG[ComplaintSlotName.EMAIL];
const name = SLOT_CATALOG[ComplaintSlotName.NAME];
const description = SLOT_CATALOG[ComplaintSlotName.DESCRIPTION];

describe('validateSlotValue', () => {
  test('stores phone numbers without separators', () => {
    expect(validateSlotValue(phone, '(555) 123-4567', { phone: '(555) 123-4567' })).toEqual({
      valid: true,
      value: '5551234567',
    });
  });

  test('rejects a short phone number with the slot error', () => {
    expect(validateSlotValue(phone, '12345', {})).toEqual({ valid: false, error: phone.invalidText });
  });

  test('prefers the extracted email over the raw reply', () => {
    expect(validateSlotValue(email, 'my email is jane@example.com', { email: 'jane@example.com' })).toEqual({
      valid: true,
      value: 'jane@example.com',
    });
  });

  test('rejects names with digits', () => {
    expect(validateSlotValue(name, 'Jane Doe', {})).toEqual({ valid: true, value: 'Jane Doe' });
    expect(validateSlotValue(name, 'R2D2', {}).valid).toBe(false);
  });

  test('an empty description is invalid', () => {
    expect(validateSlotValue(description, '   ', {})).toEqual({ valid: false, error: description.invalidText });
  });
});

describe('isValidPhone', () => {
  test.each([
    ['1234567890', true],
    ['+44 1234567890', true],
    ['555.123.4567', true],
    ['12345', false],
    ['phone', false],
  ])('%p -> %p', (raw, expected) => {
    expect(isValidPhone(raw)).toBe(expected);
  });
});

describe('isPlausibleFor', () => {
  test('phone answers need a digit', () => {
    expect(isPlausibleFor(SlotKind.PHONE, 'tomorrow maybe', false)).toBe(false);
    expect(isPlausibleFor(SlotKind.PHONE, 'it is 555 1234', false)).toBe(true);
  });

  test('questions are not free text unless they mention the complaint', () => {
    expect(isPlausibleFor(SlotKind.FREE_TEXT, 'how do returns work?', false)).toBe(false);
    expect(isPlausibleFor(SlotKind.FREE_TEXT, 'why was my complaint ignored?', true)).toBe(true);
  });

  test('an empty reply is always plausible so it can be re-prompted', () => {
    expect(isPlausibleFor(SlotKind.EMAIL, '', false)).toBe(true);
  });
});
