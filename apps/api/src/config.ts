import { parseArgs } from 'node:util';
import { z } from 'zod';

import type { LogLevel } from '@usersvc/shared';

const schema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  SERVICE_NAME: z.string().min(1).default('users-router'),
});

export type ApiConfig = {
  port: number;
  logLevel: LogLevel;
  serviceName: string;
};

type Env = Record<string, string | undefined>;

function orUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Reads configuration from CLI flags and the environment. `--port` wins over
 * `PORT`. Throws on unknown flags or invalid values.
 */
export function loadConfig(argv: string[] = process.argv.slice(2), env: Env = process.env): ApiConfig {
  const { values } = parseArgs({
    args: argv,
    options: {
      port: { type: 'string', short: 'p' },
    },
    strict: true,
    allowPositionals: false,
  });

  const parsed = schema.safeParse({
    PORT: orUndefined(values.port) ?? orUndefined(env.PORT),
    LOG_LEVEL: orUndefined(env.LOG_LEVEL),
    SERVICE_NAME: orUndefined(env.SERVICE_NAME),
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const reason = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown';
    throw new Error(`Invalid configuration: ${reason}`);
  }

  return {
    port: parsed.data.PORT,
    logLevel: parsed.data.LOG_LEVEL,
    serviceName: parsed.data.SERVICE_NAME,
  };
}
