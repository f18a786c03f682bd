import { config } from 'dotenv';
import { z } from 'zod';
import path from 'path';
import { existsSync } from 'fs';
import { ConfigurationError } from '@helpdesk/shared-kernel';

// Walks up from cwd until it finds the workspace root (package.json next to packages/)
function findWorkspaceRoot(startDir: string): string {
  let dir = startDir;
  while (dir !== path.dirname(dir)) {
    if (existsSync(path.join(dir, 'package.json')) && existsSync(path.join(dir, 'packages'))) return dir;
    dir = path.dirname(dir);
  }
  return startDir;
}

const workspaceRoot = findWorkspaceRoot(process.cwd());

// 1. Service-local .env (highest priority)
config();
// 2. Workspace root .env (defaults)
config({ path: path.resolve(workspaceRoot, '.env') });

/**
 * Validates a source (process.env by default) against a Zod schema.
 * Throws a ConfigurationError listing every invalid variable.
 */
export function validateEnv<T extends z.ZodRawShape>(
  schema: z.ZodObject<T>,
  source: NodeJS.ProcessEnv = process.env,
): z.infer<z.ZodObject<T>> {
  const result = schema.safeParse(source);
  if (!result.success) {
    const formatted = result.error.issues
      .map((i) => `  ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new ConfigurationError(`Invalid environment variables:\n${formatted}`, result.error.flatten().fieldErrors);
  }
  return result.data;
}

/** Accepts true/1/yes/on (any case) as true. */
export const BoolFromString = z.preprocess((value) => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') return ['true', '1', 'yes', 'on'].includes(value.toLowerCase());
  return false;
}, z.boolean());

/** Base schema shared by every service */
export const BaseEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  ENV_DEBUG: BoolFromString.default(false),
});

export { envDebug } from './env-debug';
