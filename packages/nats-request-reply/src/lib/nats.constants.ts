export const REQUEST_REPLY_OPTIONS = 'REQUEST_REPLY_OPTIONS';
export const REQUEST_REPLY_PROCESSOR = 'REQUEST_REPLY_PROCESSOR';
export const REQUEST_REPLY_CLIENT = 'REQUEST_REPLY_CLIENT';
export const APP_LOGGER = 'APP_LOGGER';

export const REQUEST_REPLY_CONFIG_NAMESPACE = 'natsRequestReply';

export const DEFAULT_TIMEOUT = '3s';

/**
 * Request timeouts are run on Node timers, which take whole milliseconds up to 2^31 - 1.
 */
export const MIN_TIMEOUT_MS = 1;
export const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * Metadata the client proxy sets on outgoing records so subject templates can
 * route on the Nest message pattern, e.g. `${! meta("nest_pattern") }`.
 */
export const PATTERN_METADATA_KEY = 'nest_pattern';

/**
 * Metadata fields attached to every converted reply.
 */
export const NatsMetadata = {
  Subject: 'nats_subject',
  SequenceStream: 'nats_sequence_stream',
  SequenceConsumer: 'nats_sequence_consumer',
  NumDelivered: 'nats_num_delivered',
  NumPending: 'nats_num_pending',
  Domain: 'nats_domain',
  TimestampUnixNano: 'nats_timestamp_unix_nano'
} as const;
