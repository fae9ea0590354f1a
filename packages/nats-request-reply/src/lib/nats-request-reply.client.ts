import { ClientProxy, ReadPacket, WritePacket } from '@nestjs/microservices';
import { Logger, LoggerService } from '@nestjs/common';

import { Codec, JSONCodec } from 'nats';

import { noop } from 'rxjs';

import { NatsRequestReplyProcessor } from './nats-request-reply.processor';
import { PATTERN_METADATA_KEY } from './nats.constants';
import { PipelineRecord } from './pipeline.record';
import { RequestReplyError } from './request-reply.errors';

export interface NatsRequestReplyClientOptions {
  /**
   * Connected processor every request goes through
   */
  processor: NatsRequestReplyProcessor;

  /**
   * NATS codec to use for encoding and decoding messages
   */
  codec?: Codec<unknown>;

  /**
   * Logger service to use for logging
   */
  logger?: LoggerService;
}

/**
 * Nest client proxy on top of the request/reply stage.
 *
 * `send(pattern, data)` encodes `data` into a record, exposes the pattern as the
 * `nest_pattern` metadata entry for the subject template, and decodes the reply
 * body. Events are not supported.
 */
export class NatsRequestReplyClient extends ClientProxy {
  protected readonly codec: Codec<unknown>;
  protected readonly logger: LoggerService;
  protected readonly processor: NatsRequestReplyProcessor;

  constructor(options: NatsRequestReplyClientOptions) {
    super();
    this.processor = options.processor;
    this.codec = options.codec || JSONCodec();
    this.logger = options.logger || new Logger(this.constructor.name);
  }

  async connect(): Promise<NatsRequestReplyProcessor> {
    await this.processor.connect();
    return this.processor;
  }

  async close(): Promise<void> {
    await this.processor.close();
  }

  protected dispatchEvent<T = never>(packet: ReadPacket): Promise<T> {
    const pattern = this.normalizePattern(packet.pattern);
    return Promise.reject(
      new RequestReplyError(`Cannot emit "${pattern}": the request/reply client only supports send()`)
    );
  }

  protected publish(packet: ReadPacket, callback: (packet: WritePacket) => void): typeof noop {
    const pattern = this.normalizePattern(packet.pattern);
    const record = PipelineRecord.fromBytes(this.codec.encode(packet.data));
    record.setMeta(PATTERN_METADATA_KEY, pattern);

    this.processor
      .process({}, record)
      .then((reply) => callback({ response: this.codec.decode(reply.asBytes()), isDisposed: true }))
      .catch((err: unknown) => {
        this.logger.debug?.(`Request for pattern "${pattern}" failed`);
        callback({ err });
      });

    // Nothing to tear down: the processor owns the reply subscription
    return noop;
  }

  unwrap<T>(): T {
    return <T>(<unknown>this.processor);
  }
}
