import { Logger, LoggerService } from '@nestjs/common';

import { ErrorCode, headers, Msg, MsgHdrs, NatsConnection, NatsError } from 'nats';

import { ConnectionManager } from './connection.manager';
import { HeaderResolver } from './header.resolver';
import { RequestReplyConfig, RequestReplyResources } from './interfaces/nats-request-reply-options.interface';
import { ProcessContext, Processor } from './interfaces/processor.interface';
import { ExpressionInterpolator } from './interpolation';
import { MetadataFilter } from './metadata.filter';
import { PipelineRecord } from './pipeline.record';
import { ReplyConverter } from './reply.converter';
import {
  ConnectionError,
  errorMessage,
  NoRespondersError,
  RequestCancelledError,
  RequestReplyError,
  RequestTimeoutError
} from './request-reply.errors';
import { SubjectResolver } from './subject.resolver';

/**
 * Sends each record as a NATS request and replaces it with the reply.
 *
 * One record in, one record out. Records may be processed concurrently; they
 * share the stage's single connection and the client's reply inbox matches
 * every reply to its own request. Nothing is retried: a failed request, a
 * timeout or a lost connection fails that record and is thrown to the caller.
 */
export class NatsRequestReplyProcessor implements Processor {
  protected readonly logger: LoggerService;
  protected readonly connectionManager: ConnectionManager;
  private readonly subjectResolver: SubjectResolver;
  private readonly headerResolver: HeaderResolver;
  private readonly replyConverter: ReplyConverter;

  constructor(
    protected readonly config: RequestReplyConfig,
    resources: RequestReplyResources = {}
  ) {
    this.logger = resources.logger || new Logger(NatsRequestReplyProcessor.name);

    const interpolator = resources.interpolator || new ExpressionInterpolator();
    const metadataFilter = config.metadata ? new MetadataFilter(config.metadata) : undefined;

    this.subjectResolver = new SubjectResolver(config.subject, interpolator);
    this.headerResolver = new HeaderResolver(config.headers, metadataFilter, interpolator, this.logger);
    this.replyConverter = new ReplyConverter(resources.recordFactory);
    this.connectionManager = new ConnectionManager({
      urls: config.urls,
      timeoutMs: config.timeoutMs,
      label: config.label,
      inboxPrefix: config.inboxPrefix,
      tls: config.tls,
      auth: config.auth,
      logger: this.logger
    });
  }

  /**
   * Builds a processor and connects it. A processor is never handed out unconnected.
   * @throws ConnectionError when the broker is unreachable or rejects the handshake
   */
  static async create(config: RequestReplyConfig, resources: RequestReplyResources = {}): Promise<NatsRequestReplyProcessor> {
    const processor = new NatsRequestReplyProcessor(config, resources);
    await processor.connect();
    return processor;
  }

  connect(): Promise<NatsConnection> {
    return this.connectionManager.connect();
  }

  async process(context: ProcessContext, record: PipelineRecord): Promise<PipelineRecord> {
    try {
      return await this.connectionManager.withConnection(async (connection) => {
        const subject = this.subjectResolver.resolve(record);
        const payload = record.asBytes();

        let requestHeaders: MsgHdrs | undefined;
        if (connection.info?.headers) {
          requestHeaders = this.headerResolver.resolve(record, headers());
        }

        const reply = await this.request(connection, context, subject, payload, requestHeaders);
        return this.replyConverter.convert(reply, subject);
      });
    } catch (err) {
      this.logger.debug?.(`Request/reply failed: ${errorMessage(err)}`);
      throw err;
    }
  }

  /**
   * Waits for in-flight requests and closes the connection. Safe to call more than once.
   */
  async close(_context?: ProcessContext): Promise<void> {
    await this.connectionManager.close();
  }

  /**
   * Effective request timeout: the configured timeout, shortened to the time
   * left before the caller's deadline.
   */
  requestTimeout(context: ProcessContext): number {
    if (context.signal?.aborted) {
      throw new RequestCancelledError('Request cancelled before it was sent');
    }
    if (!context.deadline) {
      return this.config.timeoutMs;
    }

    const remaining = context.deadline.getTime() - Date.now();
    if (remaining <= 0) {
      throw new RequestTimeoutError('Deadline exceeded before the request was sent');
    }
    return Math.min(remaining, this.config.timeoutMs);
  }

  private async request(
    connection: NatsConnection,
    context: ProcessContext,
    subject: string,
    payload: Uint8Array,
    requestHeaders: MsgHdrs | undefined
  ): Promise<Msg> {
    const timeout = this.requestTimeout(context);
    const signal = context.signal;
    let onAbort: (() => void) | undefined;

    try {
      const pending = connection.request(subject, payload, { timeout, headers: requestHeaders });
      if (!signal) {
        return await pending;
      }

      // nats v2 requests cannot be cancelled: an aborted request stays registered on the
      // shared inbox until its own timeout fires, and the race below absorbs that late rejection.
      const aborted = new Promise<never>((_, reject) => {
        onAbort = () => reject(new RequestCancelledError(`Request to "${subject}" was cancelled`));
        signal.addEventListener('abort', onAbort, { once: true });
      });
      return await Promise.race([pending, aborted]);
    } catch (err) {
      throw this.toRequestError(err, subject, timeout);
    } finally {
      if (signal && onAbort) {
        signal.removeEventListener('abort', onAbort);
      }
    }
  }

  private toRequestError(err: unknown, subject: string, timeout: number): RequestReplyError {
    if (err instanceof RequestReplyError) {
      return err;
    }
    if (err instanceof NatsError) {
      if (err.code === ErrorCode.Timeout) {
        return new RequestTimeoutError(`Request to "${subject}" timed out after ${timeout}ms`, { cause: err });
      }
      if (err.code === ErrorCode.NoResponders) {
        return new NoRespondersError(`No responders are listening on "${subject}"`, { cause: err });
      }
    }
    return new ConnectionError(`Request to "${subject}" failed: ${errorMessage(err)}`, { cause: err });
  }
}
