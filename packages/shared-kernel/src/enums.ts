// ─── Intents ───────────────────────────────────────
export enum IntentLabel {
  FILE_COMPLAINT = 'FileComplaint',
  RETRIEVE_COMPLAINT = 'RetrieveComplaint',
  PROVIDE_SLOT_VALUE = 'ProvideSlotValue',
  DOCUMENT_QUERY = 'DocumentQuery',
  UNKNOWN = 'Unknown',
}

// ─── Complaint slots ───────────────────────────────
export enum SlotKind {
  FREE_TEXT = 'free_text',
  PERSON_NAME = 'person_name',
  PHONE = 'phone',
  EMAIL = 'email',
  IDENTIFIER = 'identifier',
}

export enum ComplaintSlotName {
  DESCRIPTION = 'description',
  NAME = 'name',
  PHONE = 'phone',
  EMAIL = 'email',
}
