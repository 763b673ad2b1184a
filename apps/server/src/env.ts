import { z } from 'zod';
import { DEFAULT_MESSAGE_HISTORY_LIMIT, DEFAULT_PORT, LIVENESS, PUSH_SEND_TIMEOUT_MS, WEBHOOK } from '@switchboard/shared/constants';

/** Reusable Zod type for 'true'/'false' env flags → boolean. */
const boolFlag = z.enum(['true', 'false']).default('false').transform(v => v === 'true');

const positiveMs = (fallback: number) => z.coerce.number().int().min(1).default(fallback);

const serverEnvSchema = z
  .object({
    // Runtime
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    SWITCHBOARD_PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT),
    SWITCHBOARD_HOST: z.string().default('0.0.0.0'),
    SWITCHBOARD_DB_PATH: z.string().default('./data/switchboard.db'),
    SWITCHBOARD_LOG_LEVEL: z.coerce.number().int().min(0).max(5).optional(),
    SWITCHBOARD_LOG_DIR: z.string().optional(),
    SWITCHBOARD_ADMIN_USERNAME: z.string().min(1).optional(),
    // Message store
    SWITCHBOARD_MESSAGE_HISTORY_LIMIT: z.coerce.number().int().min(1).default(DEFAULT_MESSAGE_HISTORY_LIMIT),
    // Delivery
    SWITCHBOARD_WEBHOOK_TIMEOUT_MS: positiveMs(WEBHOOK.TIMEOUT_MS),
    SWITCHBOARD_WEBHOOK_MAX_RETRIES: z.coerce.number().int().min(1).max(10).default(WEBHOOK.MAX_RETRIES),
    SWITCHBOARD_WEBHOOK_POLICY: z.enum(['always', 'offline_only']).default('always'),
    SWITCHBOARD_PROBE_INTERVAL_MS: positiveMs(LIVENESS.PROBE_INTERVAL_MS),
    SWITCHBOARD_STALE_AFTER_MS: positiveMs(LIVENESS.STALE_AFTER_MS),
    SWITCHBOARD_PUSH_TIMEOUT_MS: positiveMs(PUSH_SEND_TIMEOUT_MS),
    // Centrifugo pub/sub mirror (optional)
    CENTRIFUGO_ENABLED: boolFlag,
    CENTRIFUGO_API_URL: z.string().url().optional(),
    CENTRIFUGO_API_KEY: z.string().min(1).optional(),
  })
  .superRefine((value, ctx) => {
    if (!value.CENTRIFUGO_ENABLED) return;
    if (!value.CENTRIFUGO_API_URL) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['CENTRIFUGO_API_URL'], message: 'Required when CENTRIFUGO_ENABLED=true' });
    }
    if (!value.CENTRIFUGO_API_KEY) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['CENTRIFUGO_API_KEY'], message: 'Required when CENTRIFUGO_ENABLED=true' });
    }
  });

const result = serverEnvSchema.safeParse(process.env);

if (!result.success) {
  console.error('\n  Missing or invalid environment variables:\n');
  result.error.issues.forEach(i => console.error(`  - ${i.path.join('.')}: ${i.message}`));
  console.error('\n  Copy .env.example to .env\n');
  process.exit(1);
}

export const env = result.data;
export type ServerEnv = typeof env;
