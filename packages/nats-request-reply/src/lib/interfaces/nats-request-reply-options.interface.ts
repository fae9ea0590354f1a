import { Codec } from 'nats';
import { LoggerService } from '@nestjs/common';

import { Interpolator } from '../interpolation';
import { MetadataFilterOptions } from '../metadata.filter';
import { RecordFactory } from '../reply.converter';

export type TlsConfig = {
  /**
   * Whether to connect over TLS at all
   */
  enabled: boolean;
  caFile?: string;
  certFile?: string;
  keyFile?: string;
};

/**
 * Authentication material, already resolved to its contents.
 */
export type AuthConfig = {
  user?: string;
  pass?: string;
  token?: string;

  /**
   * NKey seed used to sign the server nonce
   */
  nkeySeed?: string;

  /**
   * User JWT; requires `userNkeySeed`
   */
  userJwt?: string;
  userNkeySeed?: string;

  /**
   * Contents of a `.creds` file
   */
  userCredentials?: string;
};

/**
 * Parsed, immutable stage configuration.
 */
export type RequestReplyConfig = {
  /**
   * Server URLs, with comma-separated entries already expanded
   */
  urls: string[];

  /**
   * Subject template, e.g. `orders.${! json("id") }`
   */
  subject: string;

  /**
   * Explicit prefix for the reply inbox subject
   */
  inboxPrefix?: string;

  /**
   * Header name to value template, in the order headers are added
   */
  headers: Record<string, string>;

  /**
   * Which record metadata becomes headers. Absent means none.
   */
  metadata?: MetadataFilterOptions;

  /**
   * Request timeout in milliseconds, always greater than zero
   */
  timeoutMs: number;

  tls?: TlsConfig;
  auth?: AuthConfig;

  /**
   * Stage label, used as the NATS connection name
   */
  label?: string;
};

/**
 * Collaborators handed to a processor at creation time.
 */
export interface RequestReplyResources {
  /**
   * Logger service to use for logging
   */
  logger?: LoggerService;

  /**
   * Evaluates subject and header templates. Defaults to {@link ExpressionInterpolator}.
   */
  interpolator?: Interpolator;

  /**
   * Builds output records from reply payloads
   */
  recordFactory?: RecordFactory;
}

export interface NatsRequestReplyModuleOptions extends RequestReplyResources {
  /**
   * Raw stage configuration, validated with `parseRequestReplyConfig`
   */
  config: unknown;

  /**
   * NATS codec the client proxy uses for encoding and decoding messages
   */
  codec?: Codec<unknown>;
}
