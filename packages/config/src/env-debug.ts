import { createLogger } from '@helpdesk/observability';

const SECRET_PATTERN = /(SECRET|TOKEN|PASSWORD|KEY)/i;
const WATCHED_PREFIXES = ['NODE_ENV', 'PORT', 'LOG_LEVEL', 'COMPLAINT_', 'RAG_', 'FUZZY_', 'TOPIC_', 'HISTORY_', 'QUERY_', 'SESSION_'];

let printed = false;

function redact(name: string, value: string): string {
  if (!SECRET_PATTERN.test(name)) return value;
  if (value.length <= 4) return '****';
  return `${value.slice(0, 2)}****${value.slice(-2)}`;
}

/**
 * Logs a one-time summary of the variables a service depends on.
 *
 * Active only when `ENV_DEBUG` is true (or `1`, `yes`). Secret-looking values are redacted.
 *
 * @param serviceName  Name of the calling service (e.g. "assistant-service").
 */
export function envDebug(serviceName: string, source: NodeJS.ProcessEnv = process.env): void {
  if (printed) return;
  if (!['true', '1', 'yes'].includes((source.ENV_DEBUG ?? '').toLowerCase())) return;
  printed = true;

  const summary: Record<string, string> = {};
  for (const [name, value] of Object.entries(source)) {
    if (value === undefined) continue;
    if (!WATCHED_PREFIXES.some((prefix) => name.startsWith(prefix))) continue;
    summary[name] = redact(name, value);
  }

  createLogger('env-debug').info({ service: serviceName, env: summary }, 'Environment summary');
}
