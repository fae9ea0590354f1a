import { LoggerService } from '@nestjs/common';

import { JSONCodec } from 'nats';

import { createMock } from '@golevelup/ts-jest';
import { lastValueFrom } from 'rxjs';

import { ConnectionManager } from '../lib/connection.manager';
import { NatsRequestReplyClient } from '../lib/nats-request-reply.client';
import { NatsRequestReplyProcessor } from '../lib/nats-request-reply.processor';
import { PATTERN_METADATA_KEY } from '../lib/nats.constants';
import { PipelineRecord } from '../lib/pipeline.record';
import { parseRequestReplyConfig } from '../lib/request-reply.config';
import { NoRespondersError, RequestReplyError, StageClosedError } from '../lib/request-reply.errors';

import { createReply, FakeBroker } from './helpers/fake-broker';

describe('NatsRequestReplyClient', () => {
  const codec = JSONCodec<unknown>();
  let broker: FakeBroker;
  let processor: NatsRequestReplyProcessor;
  let client: NatsRequestReplyClient;

  beforeEach(() => {
    broker = new FakeBroker();
    broker.respond('math.sum', (request) => {
      const numbers = codec.decode(request.data);
      const sum = Array.isArray(numbers) ? numbers.reduce((total: number, n: unknown) => total + Number(n), 0) : 0;
      return createReply({ subject: '_INBOX.test.1', data: codec.encode(sum) });
    });
    jest.spyOn(ConnectionManager.prototype, 'createNatsConnection').mockResolvedValue(broker.connection());

    const logger = createMock<LoggerService>();
    processor = new NatsRequestReplyProcessor(
      parseRequestReplyConfig({ urls: ['nats://test:4222'], subject: '${! meta("nest_pattern") }' }),
      { logger }
    );
    client = new NatsRequestReplyClient({ processor, logger });
  });

  afterEach(async () => {
    await client.close();
    jest.restoreAllMocks();
  });

  it('should route send() through the pattern and decode the reply', async () => {
    await expect(lastValueFrom(client.send<number>('math.sum', [1, 2, 3]))).resolves.toBe(6);

    expect(broker.requests[0].subject).toBe('math.sum');
    expect(broker.requests[0].headers?.get(PATTERN_METADATA_KEY)).toBe('');
    expect(new TextDecoder().decode(broker.requests[0].data)).toBe('[1,2,3]');
  });

  it('should surface request failures to the subscriber', async () => {
    await expect(lastValueFrom(client.send('math.unknown', 1))).rejects.toThrow(
      new NoRespondersError('No responders are listening on "math.unknown"')
    );
  });

  it('should refuse to emit events', async () => {
    await expect(lastValueFrom(client.emit('math.sum', 1))).rejects.toThrow(
      new RequestReplyError('Cannot emit "math.sum": the request/reply client only supports send()')
    );
    expect(broker.requests).toHaveLength(0);
  });

  it('should expose the processor', () => {
    expect(client.unwrap<NatsRequestReplyProcessor>()).toBe(processor);
  });

  it('should close the processor', async () => {
    await client.connect();
    await client.close();

    await expect(processor.process({}, PipelineRecord.fromString('1'))).rejects.toThrow(StageClosedError);
  });
});
