// ─── Ports per service ─────────────────────────────
export const PORTS = {
  ASSISTANT: 3021,
  COMPLAINT_API: 3030,
  RAG_SERVICE: 3040,
} as const;

// ─── Internal URLs (defaults, overridable by env) ──
export const SERVICE_URLS = {
  COMPLAINT_API: `http://localhost:${PORTS.COMPLAINT_API}`,
  RAG_SERVICE: `http://127.0.0.1:${PORTS.RAG_SERVICE}`,
} as const;
