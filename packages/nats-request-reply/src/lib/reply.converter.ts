import { Msg } from 'nats';

import { NatsMetadata } from './nats.constants';
import { PipelineRecord } from './pipeline.record';
import { ConversionError, errorMessage } from './request-reply.errors';

export type RecordFactory = (body: Uint8Array) => PipelineRecord;

/**
 * Delivery details carried by a JetStream ack reply subject.
 */
export interface DeliveryInfo {
  domain: string;
  stream: string;
  consumer: string;
  delivered: string;
  streamSequence: string;
  consumerSequence: string;
  timestampNanos: string;
  pending: string;
}

const ACK_PREFIX = '$JS.ACK.';

/**
 * Parses a JetStream ack subject.
 *
 * Two layouts exist:
 * - `$JS.ACK.<stream>.<consumer>.<delivered>.<sseq>.<cseq>.<ts>.<pending>`
 * - `$JS.ACK.<domain>.<account>.<stream>.<consumer>.<delivered>.<sseq>.<cseq>.<ts>.<pending>[.<token>]`
 *
 * Returns undefined for anything else.
 */
export function parseDeliveryInfo(reply: unknown): DeliveryInfo | undefined {
  if (typeof reply !== 'string' || !reply.startsWith(ACK_PREFIX)) {
    return undefined;
  }

  let tokens = reply.split('.');
  if (tokens.length === 9) {
    tokens = [...tokens.slice(0, 2), '', '', ...tokens.slice(2)];
  } else if (tokens.length < 11) {
    return undefined;
  }

  const domain = tokens[2] === '_' ? '' : tokens[2];
  return {
    domain,
    stream: tokens[4],
    consumer: tokens[5],
    delivered: tokens[6],
    streamSequence: tokens[7],
    consumerSequence: tokens[8],
    timestampNanos: tokens[9],
    pending: tokens[10]
  };
}

/**
 * Turns a NATS reply into the record that replaces the request record.
 *
 * Replies land on a generated inbox, so `nats_subject` carries the subject the
 * request was sent to when the caller passes it, and the reply's own subject
 * otherwise.
 */
export class ReplyConverter {
  constructor(private readonly recordFactory: RecordFactory = PipelineRecord.fromBytes) {}

  convert(reply: Msg, subject: string = reply.subject): PipelineRecord {
    let record: PipelineRecord;
    try {
      record = this.recordFactory(reply.data);
    } catch (err) {
      throw new ConversionError(`failed to build a record from the reply to "${subject}": ${errorMessage(err)}`, { cause: err });
    }

    record.setMeta(NatsMetadata.Subject, subject);

    const info = parseDeliveryInfo(reply.reply);
    if (info) {
      record.setMeta(NatsMetadata.SequenceStream, info.streamSequence);
      record.setMeta(NatsMetadata.SequenceConsumer, info.consumerSequence);
      record.setMeta(NatsMetadata.NumDelivered, info.delivered);
      record.setMeta(NatsMetadata.NumPending, info.pending);
      record.setMeta(NatsMetadata.Domain, info.domain);
      record.setMeta(NatsMetadata.TimestampUnixNano, info.timestampNanos);
    }

    if (reply.headers) {
      for (const key of reply.headers.keys()) {
        const value = reply.headers.get(key);
        if (value) {
          record.setMeta(key, value);
        }
      }
    }

    return record;
  }
}
