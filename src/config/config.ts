import * as fs from 'fs';
import { z } from 'zod';
import dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors.js';

const DEFAULT_SYSTEM_PROMPT =
  'You are a warm, attentive companion chatting privately with one person. ' +
  'Keep replies natural and concise, and remember what they have told you in this conversation.';

const SQLITE_URL_PREFIX = 'sqlite:///';

const BOOLEAN_TRUE = new Set(['1', 'true', 'yes', 'on']);
const BOOLEAN_FALSE = new Set(['0', 'false', 'no', 'off']);

// ============ Field parsers ============

/** Trimmed string; blank counts as missing so defaults and required checks apply */
const envString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined),
  z.string().optional()
);

function requiredString(name: string) {
  return envString.pipe(z.string({ required_error: `Missing required env var: ${name}` }));
}

/** Integer field; without a default the variable is required */
function integer(name: string, defaultValue?: number) {
  return envString.transform((value, ctx) => {
    if (value === undefined) {
      if (defaultValue !== undefined) return defaultValue;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required env var: ${name}` });
      return z.NEVER;
    }
    if (!/^[-+]?\d+$/.test(value)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be integer` });
      return z.NEVER;
    }
    return parseInt(value, 10);
  });
}

function number(name: string, defaultValue: number) {
  return envString.transform((value, ctx) => {
    if (value === undefined) return defaultValue;
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be number` });
      return z.NEVER;
    }
    return parsed;
  });
}

function boolean(name: string, defaultValue: boolean) {
  return envString.transform((value, ctx) => {
    if (value === undefined) return defaultValue;
    const normalized = value.toLowerCase();
    if (BOOLEAN_TRUE.has(normalized)) return true;
    if (BOOLEAN_FALSE.has(normalized)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be a boolean (true/false)` });
    return z.NEVER;
  });
}

// ============ Section schemas ============

const telegramSchema = z.object({
  botToken: requiredString('TELEGRAM_BOT_TOKEN'),
  ownerId: integer('OWNER_TELEGRAM_ID'),
  unauthorizedMode: envString
    .transform((value) => (value ?? 'deny').toLowerCase())
    .pipe(z.enum(['deny', 'ignore'], { errorMap: () => ({ message: "UNAUTHORIZED_MODE must be 'deny' or 'ignore'" }) })),
  unauthorizedMessage: envString.transform((value) => value ?? 'Access denied'),
});

const llmSchema = z.object({
  apiKey: requiredString('LLM_API_KEY'),
  baseUrl: envString.transform((value) => value ?? 'https://api.openai.com/v1').pipe(z.string().url()),
  model: requiredString('LLM_MODEL'),
  timeoutSeconds: number('LLM_TIMEOUT_SECONDS', 60).pipe(
    z.number().positive('LLM_TIMEOUT_SECONDS must be > 0')
  ),
  maxTokens: integer('LLM_MAX_TOKENS', 350).pipe(z.number().int().positive('LLM_MAX_TOKENS must be >= 1')),
});

const storageSchema = z.object({
  databaseUrl: envString
    .transform((value) => value ?? `${SQLITE_URL_PREFIX}data.db`)
    .refine((url) => url.startsWith(SQLITE_URL_PREFIX), {
      message: `Only sqlite DATABASE_URL is supported. Expected format: ${SQLITE_URL_PREFIX}path/to/db.sqlite3`,
    })
    .refine((url) => url.length > SQLITE_URL_PREFIX.length, {
      message: 'DATABASE_URL sqlite path cannot be empty',
    }),
});

const conversationSchema = z.object({
  systemPrompt: z.string().min(1, 'System prompt cannot be empty'),
  maxContextMessages: integer('MAX_CONTEXT_MESSAGES', 40).pipe(
    z.number().int().positive('MAX_CONTEXT_MESSAGES must be >= 1')
  ),
});

const proactiveSchema = z
  .object({
    enabled: boolean('AUTO_MESSAGE_ENABLED', false),
    idleHoursMin: number('AUTO_MESSAGE_IDLE_HOURS_MIN', 1).pipe(
      z.number().positive('AUTO_MESSAGE_IDLE_HOURS_MIN/MAX must be > 0')
    ),
    idleHoursMax: number('AUTO_MESSAGE_IDLE_HOURS_MAX', 3).pipe(
      z.number().positive('AUTO_MESSAGE_IDLE_HOURS_MIN/MAX must be > 0')
    ),
    checkMinutes: integer('AUTO_MESSAGE_CHECK_MINUTES', 10).pipe(
      z.number().int().min(1, 'AUTO_MESSAGE_CHECK_MINUTES must be >= 1')
    ),
  })
  .refine((p) => p.idleHoursMin <= p.idleHoursMax, {
    message: 'AUTO_MESSAGE_IDLE_HOURS_MIN cannot be greater than MAX',
    path: ['idleHoursMin'],
  });

const loggingSchema = z.object({
  level: envString
    .transform((value) => value ?? 'info')
    .pipe(z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])),
});

export const configSchema = z.object({
  telegram: telegramSchema,
  llm: llmSchema,
  storage: storageSchema,
  conversation: conversationSchema,
  proactive: proactiveSchema,
  logging: loggingSchema,
});

export type Config = z.infer<typeof configSchema>;
export type TelegramConfig = Config['telegram'];
export type LLMConfig = Config['llm'];
export type ConversationConfig = Config['conversation'];
export type ProactiveConfig = Config['proactive'];
export type LoggingConfig = Config['logging'];
export type UnauthorizedMode = TelegramConfig['unauthorizedMode'];

export type Env = Record<string, string | undefined>;

/**
 * Resolve the system prompt: SYSTEM_PROMPT_FILE wins over SYSTEM_PROMPT,
 * which wins over the built-in default.
 */
function resolveSystemPrompt(env: Env): string {
  const file = env.SYSTEM_PROMPT_FILE?.trim();
  if (file) {
    try {
      return fs.readFileSync(file, 'utf-8').trim();
    } catch (error) {
      throw new ConfigurationError(`SYSTEM_PROMPT_FILE could not be read: ${file}`, error);
    }
  }
  return env.SYSTEM_PROMPT?.trim() || DEFAULT_SYSTEM_PROMPT;
}

/**
 * Load configuration from environment variables
 * @throws ConfigurationError listing every invalid field
 */
export function loadConfig(env: Env = process.env): Config {
  const rawConfig = {
    telegram: {
      botToken: env.TELEGRAM_BOT_TOKEN,
      ownerId: env.OWNER_TELEGRAM_ID,
      unauthorizedMode: env.UNAUTHORIZED_MODE,
      unauthorizedMessage: env.UNAUTHORIZED_MESSAGE,
    },
    llm: {
      apiKey: env.LLM_API_KEY,
      baseUrl: env.LLM_BASE_URL,
      model: env.LLM_MODEL,
      timeoutSeconds: env.LLM_TIMEOUT_SECONDS,
      maxTokens: env.LLM_MAX_TOKENS,
    },
    storage: {
      databaseUrl: env.DATABASE_URL,
    },
    conversation: {
      systemPrompt: resolveSystemPrompt(env),
      maxContextMessages: env.MAX_CONTEXT_MESSAGES,
    },
    proactive: {
      enabled: env.AUTO_MESSAGE_ENABLED,
      idleHoursMin: env.AUTO_MESSAGE_IDLE_HOURS_MIN,
      idleHoursMax: env.AUTO_MESSAGE_IDLE_HOURS_MAX,
      checkMinutes: env.AUTO_MESSAGE_CHECK_MINUTES,
    },
    logging: {
      level: env.LOG_LEVEL,
    },
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errorMessages = result.error.errors
      .map((err) => `${err.path.join('.')}: ${err.message}`)
      .join('\n');
    throw new ConfigurationError(`Configuration validation failed:\n${errorMessages}`);
  }

  return result.data;
}

/**
 * Load `.env` into process.env (existing variables win) and parse it.
 */
export function loadConfigFromProcess(): Config {
  dotenv.config();
  return loadConfig(process.env);
}

/** Filesystem path of the sqlite database named by a validated DATABASE_URL */
export function sqlitePath(databaseUrl: string): string {
  return databaseUrl.slice(SQLITE_URL_PREFIX.length);
}
