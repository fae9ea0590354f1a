import { registerAs } from '@nestjs/config';
import { z } from 'zod';

import { parseDuration } from './duration';
import { RequestReplyConfig } from './interfaces/nats-request-reply-options.interface';
import { DEFAULT_TIMEOUT, MAX_TIMEOUT_MS, MIN_TIMEOUT_MS, REQUEST_REPLY_CONFIG_NAMESPACE } from './nats.constants';
import { ConfigurationError, errorMessage } from './request-reply.errors';

const nonBlank = z.string().refine((value) => value.trim().length > 0, { message: 'must not be blank' });

const requestReplyConfigSchema = z.object({
  urls: z.array(z.string()).min(1),
  subject: nonBlank,
  inboxPrefix: nonBlank.optional(),
  headers: z.record(z.string()).default({}),
  metadata: z
    .object({
      includePrefixes: z.array(z.string()).default([]),
      includePatterns: z.array(z.string()).default([])
    })
    .optional(),
  timeout: z.string().default(DEFAULT_TIMEOUT),
  tls: z
    .object({
      enabled: z.boolean().default(false),
      caFile: z.string().optional(),
      certFile: z.string().optional(),
      keyFile: z.string().optional()
    })
    .optional(),
  auth: z
    .object({
      user: z.string().optional(),
      pass: z.string().optional(),
      token: z.string().optional(),
      nkeySeed: z.string().optional(),
      userJwt: z.string().optional(),
      userNkeySeed: z.string().optional(),
      userCredentials: z.string().optional()
    })
    .refine((auth) => !auth.userJwt || auth.userNkeySeed, {
      message: 'userNkeySeed is required when userJwt is set',
      path: ['userNkeySeed']
    })
    .optional(),
  label: z.string().optional()
});

export type RequestReplyConfigInput = z.input<typeof requestReplyConfigSchema>;

/**
 * Splits every entry on commas and drops empty items.
 */
export function expandUrls(urls: string[]): string[] {
  return urls.flatMap((entry) => entry.split(',')).map((url) => url.trim()).filter((url) => url.length > 0);
}

/**
 * Validates a raw stage configuration.
 * @throws ConfigurationError listing every problem found
 */
export function parseRequestReplyConfig(raw: unknown): RequestReplyConfig {
  const result = requestReplyConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid request/reply configuration: ${issues.join('; ')}`, { cause: result.error });
  }

  const { urls, timeout, ...rest } = result.data;

  const expanded = expandUrls(urls);
  if (expanded.length === 0) {
    throw new ConfigurationError('Invalid request/reply configuration: urls: at least one URL is required');
  }

  let timeoutMs: number;
  try {
    timeoutMs = parseDuration(timeout);
  } catch (err) {
    throw new ConfigurationError(`Invalid request/reply configuration: timeout: ${errorMessage(err)}`, { cause: err });
  }
  if (!(timeoutMs > 0)) {
    throw new ConfigurationError(`Invalid request/reply configuration: timeout: must be greater than zero, got "${timeout}"`);
  }
  if (timeoutMs < MIN_TIMEOUT_MS) {
    throw new ConfigurationError(`Invalid request/reply configuration: timeout: must be at least ${MIN_TIMEOUT_MS}ms, got "${timeout}"`);
  }
  if (timeoutMs > MAX_TIMEOUT_MS) {
    throw new ConfigurationError(`Invalid request/reply configuration: timeout: must not exceed ${MAX_TIMEOUT_MS}ms, got "${timeout}"`);
  }

  return { ...rest, urls: expanded, timeoutMs };
}

function list(value: string | undefined): string[] | undefined {
  return value === undefined ? undefined : value.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
}

function jsonObject(name: string, value: string | undefined): unknown {
  if (value === undefined) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(value);
    return parsed;
  } catch (err) {
    throw new ConfigurationError(`${name} is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Builds the raw configuration from `NATS_REQUEST_REPLY_*` environment variables.
 */
export function requestReplyConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const prefixes = list(env.NATS_REQUEST_REPLY_METADATA_PREFIXES);
  const patterns = list(env.NATS_REQUEST_REPLY_METADATA_PATTERNS);

  return {
    urls: [env.NATS_REQUEST_REPLY_URLS ?? 'nats://localhost:4222'],
    subject: env.NATS_REQUEST_REPLY_SUBJECT,
    inboxPrefix: env.NATS_REQUEST_REPLY_INBOX_PREFIX,
    headers: jsonObject('NATS_REQUEST_REPLY_HEADERS', env.NATS_REQUEST_REPLY_HEADERS),
    metadata: prefixes || patterns ? { includePrefixes: prefixes, includePatterns: patterns } : undefined,
    timeout: env.NATS_REQUEST_REPLY_TIMEOUT,
    tls: env.NATS_REQUEST_REPLY_TLS === 'true'
      ? {
          enabled: true,
          caFile: env.NATS_REQUEST_REPLY_TLS_CA_FILE,
          certFile: env.NATS_REQUEST_REPLY_TLS_CERT_FILE,
          keyFile: env.NATS_REQUEST_REPLY_TLS_KEY_FILE
        }
      : undefined,
    auth: env.NATS_REQUEST_REPLY_USER || env.NATS_REQUEST_REPLY_TOKEN
      ? { user: env.NATS_REQUEST_REPLY_USER, pass: env.NATS_REQUEST_REPLY_PASS, token: env.NATS_REQUEST_REPLY_TOKEN }
      : undefined,
    label: env.NATS_REQUEST_REPLY_LABEL
  };
}

/**
 * `@nestjs/config` namespace holding the validated configuration, for use with
 * `ConfigModule.forFeature(requestReplyConfig)`.
 */
export const requestReplyConfig = registerAs(REQUEST_REPLY_CONFIG_NAMESPACE, () =>
  parseRequestReplyConfig(requestReplyConfigFromEnv())
);
