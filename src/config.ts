import { IANAZone } from 'luxon';
import { ZodError, z } from 'zod';

export const IS_PRODUCTION = process.env.NODE_ENV === 'production';

/** Raised once at start-up when the environment cannot produce a usable configuration. */
export class ConfigurationError extends Error {
  constructor(
    public readonly missing: string[],
    public readonly invalid: string[],
  ) {
    const parts: string[] = [];
    if (missing.length > 0) {
      parts.push(`missing: ${missing.join(', ')}`);
    }
    if (invalid.length > 0) {
      parts.push(`invalid: ${invalid.join(', ')}`);
    }
    super(`Invalid configuration (${parts.join('; ')})`);
    this.name = 'ConfigurationError';
  }
}

// Mirrors the `=== 'true' || === '1'` convention used for feature flags
const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(defaultValue ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1');

/** `Name:address` pairs separated by commas, e.g. `Jordan:+15550000100,Sam:U0123ABC`. */
const contactList = z
  .string()
  .default('')
  .transform((value, ctx) => {
    const contacts: EscalationContact[] = [];
    for (const entry of value.split(',').map((part) => part.trim())) {
      if (!entry) continue;
      const separator = entry.indexOf(':');
      const name = entry.slice(0, separator).trim();
      const address = entry.slice(separator + 1).trim();
      if (separator === -1 || !name || !address) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected Name:address, got "${entry}"` });
        return z.NEVER;
      }
      contacts.push(Object.freeze({ name, address }));
    }
    return contacts;
  });

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  DATABASE_PATH: z.string().min(1).optional(),

  TIMEZONE: z
    .string()
    .default('America/Chicago')
    .refine((zone) => IANAZone.isValidZone(zone), 'must be an IANA time zone'),
  DAILY_SEND_HOUR: z.coerce.number().int().min(0).max(23).default(8),
  DAILY_SEND_MINUTE: z.coerce.number().int().min(0).max(59).default(0),
  MISFIRE_GRACE_SECONDS: z.coerce.number().int().positive().default(300),

  MESSAGING_GATEWAY: z.enum(['twilio', 'slack']).default('twilio'),
  TWILIO_ACCOUNT_SID: z.string().min(1).optional(),
  TWILIO_AUTH_TOKEN: z.string().min(1).optional(),
  TWILIO_PHONE_NUMBER: z.string().min(1).optional(),
  SLACK_TOKEN: z.string().min(1).optional(),

  SENDER_NAME: z.string().min(1).default('On-Call'),
  GATEWAY_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  DISPATCH_CONCURRENCY: z.coerce.number().int().min(1).max(20).default(3),

  AUTO_RENEW_ENABLED: booleanFlag(true),
  AUTO_RENEW_HOUR: z.coerce.number().int().min(0).max(23).default(2),
  AUTO_RENEW_MINUTE: z.coerce.number().int().min(0).max(59).default(0),
  AUTO_RENEW_THRESHOLD_WEEKS: z.coerce.number().int().min(1).default(2),
  AUTO_RENEW_WEEKS: z.coerce.number().int().min(1).max(52).default(4),

  ESCALATION_SUMMARY_ENABLED: booleanFlag(false),
  ESCALATION_SUMMARY_WEEKDAY: z.coerce.number().int().min(1).max(7).default(1),
  ESCALATION_SUMMARY_HOUR: z.coerce.number().int().min(0).max(23).default(8),
  ESCALATION_SUMMARY_MINUTE: z.coerce.number().int().min(0).max(59).default(0),
  ESCALATION_CONTACTS: contactList,

  SEED_EXAMPLE_DATA: booleanFlag(false),
});

export interface TimeOfDay {
  readonly hour: number;
  readonly minute: number;
}

export interface TwilioGatewayConfig {
  readonly provider: 'twilio';
  readonly accountSid: string;
  readonly authToken: string;
  readonly fromNumber: string;
}

export interface SlackGatewayConfig {
  readonly provider: 'slack';
  readonly token: string;
}

export type GatewayConfig = TwilioGatewayConfig | SlackGatewayConfig;

export interface AutoRenewConfig {
  readonly enabled: boolean;
  readonly at: TimeOfDay;
  readonly thresholdWeeks: number;
  readonly renewWeeks: number;
}

export interface EscalationContact {
  readonly name: string;
  readonly address: string;
}

/** Weekly on-call summary for the people who are paged when nobody answers. */
export interface EscalationConfig {
  readonly enabled: boolean;
  /** ISO weekday the summary goes out, 1 = Monday. */
  readonly weekday: number;
  readonly at: TimeOfDay;
  readonly contacts: readonly EscalationContact[];
}

export interface AppConfig {
  readonly environment: 'development' | 'test' | 'production';
  readonly logLevel: string;
  /** Undefined means the default location, see `getDatabasePath`. */
  readonly databasePath: string | undefined;
  readonly timezone: string;
  readonly dailySend: TimeOfDay;
  readonly misfireGraceMs: number;
  readonly senderName: string;
  readonly gateway: GatewayConfig;
  readonly gatewayTimeoutMs: number;
  readonly dispatchConcurrency: number;
  readonly autoRenew: AutoRenewConfig;
  readonly escalation: EscalationConfig;
  readonly seedExampleData: boolean;
}

type ParsedEnv = z.infer<typeof envSchema>;

function resolveGateway(parsed: ParsedEnv, missing: string[]): GatewayConfig | null {
  if (parsed.MESSAGING_GATEWAY === 'slack') {
    if (!parsed.SLACK_TOKEN) {
      missing.push('SLACK_TOKEN');
      return null;
    }
    return Object.freeze({ provider: 'slack', token: parsed.SLACK_TOKEN });
  }

  const { TWILIO_ACCOUNT_SID, TWILIO_AUTH_TOKEN, TWILIO_PHONE_NUMBER } = parsed;
  if (!TWILIO_ACCOUNT_SID) {
    missing.push('TWILIO_ACCOUNT_SID');
  }
  if (!TWILIO_AUTH_TOKEN) {
    missing.push('TWILIO_AUTH_TOKEN');
  }
  if (!TWILIO_PHONE_NUMBER) {
    missing.push('TWILIO_PHONE_NUMBER');
  }
  if (!TWILIO_ACCOUNT_SID || !TWILIO_AUTH_TOKEN || !TWILIO_PHONE_NUMBER) {
    return null;
  }

  return Object.freeze({
    provider: 'twilio',
    accountSid: TWILIO_ACCOUNT_SID,
    authToken: TWILIO_AUTH_TOKEN,
    fromNumber: TWILIO_PHONE_NUMBER,
  });
}

/**
 * Validates the environment once and returns a frozen configuration.
 * Every missing or invalid variable is reported together in a single `ConfigurationError`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  let parsed: ParsedEnv;
  try {
    parsed = envSchema.parse(env);
  } catch (error) {
    if (error instanceof ZodError) {
      const missing = new Set<string>();
      const invalid = new Set<string>();
      for (const issue of error.issues) {
        const key = issue.path[0]?.toString();
        if (!key) continue;
        if (issue.code === 'invalid_type' && issue.received === 'undefined') {
          missing.add(key);
        } else {
          invalid.add(key);
        }
      }
      throw new ConfigurationError([...missing], [...invalid]);
    }
    throw error;
  }

  const missing: string[] = [];
  const gateway = resolveGateway(parsed, missing);
  if (parsed.ESCALATION_SUMMARY_ENABLED && parsed.ESCALATION_CONTACTS.length === 0) {
    missing.push('ESCALATION_CONTACTS');
  }
  if (!gateway || missing.length > 0) {
    throw new ConfigurationError(missing, []);
  }

  return Object.freeze({
    environment: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    databasePath: parsed.DATABASE_PATH,
    timezone: parsed.TIMEZONE,
    dailySend: Object.freeze({ hour: parsed.DAILY_SEND_HOUR, minute: parsed.DAILY_SEND_MINUTE }),
    misfireGraceMs: parsed.MISFIRE_GRACE_SECONDS * 1000,
    senderName: parsed.SENDER_NAME,
    gateway,
    gatewayTimeoutMs: parsed.GATEWAY_TIMEOUT_MS,
    dispatchConcurrency: parsed.DISPATCH_CONCURRENCY,
    autoRenew: Object.freeze({
      enabled: parsed.AUTO_RENEW_ENABLED,
      at: Object.freeze({ hour: parsed.AUTO_RENEW_HOUR, minute: parsed.AUTO_RENEW_MINUTE }),
      thresholdWeeks: parsed.AUTO_RENEW_THRESHOLD_WEEKS,
      renewWeeks: parsed.AUTO_RENEW_WEEKS,
    }),
    escalation: Object.freeze({
      enabled: parsed.ESCALATION_SUMMARY_ENABLED,
      weekday: parsed.ESCALATION_SUMMARY_WEEKDAY,
      at: Object.freeze({ hour: parsed.ESCALATION_SUMMARY_HOUR, minute: parsed.ESCALATION_SUMMARY_MINUTE }),
      contacts: Object.freeze([...parsed.ESCALATION_CONTACTS]),
    }),
    seedExampleData: parsed.SEED_EXAMPLE_DATA,
  });
}
