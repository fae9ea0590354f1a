import { DynamicModule, FactoryProvider, Inject, Logger, LoggerService, Module, ModuleMetadata, OnModuleDestroy, Provider } from '@nestjs/common';

import { NatsRequestReplyClient } from './nats-request-reply.client';
import { NatsRequestReplyProcessor } from './nats-request-reply.processor';
import { APP_LOGGER, REQUEST_REPLY_CLIENT, REQUEST_REPLY_OPTIONS, REQUEST_REPLY_PROCESSOR } from './nats.constants';
import { NatsRequestReplyModuleOptions } from './interfaces/nats-request-reply-options.interface';
import { parseRequestReplyConfig } from './request-reply.config';

export interface NatsRequestReplyModuleAsyncOptions extends Pick<ModuleMetadata, 'imports'> {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  useFactory: (...args: any[]) => Promise<NatsRequestReplyModuleOptions> | NatsRequestReplyModuleOptions;
  inject?: FactoryProvider['inject'];
}

const sharedProviders: Provider[] = [
  {
    provide: APP_LOGGER,
    inject: [REQUEST_REPLY_OPTIONS],
    useFactory: (options: NatsRequestReplyModuleOptions) => {
      return options.logger || new Logger('NatsRequestReply');
    }
  },
  {
    provide: REQUEST_REPLY_PROCESSOR,
    inject: [REQUEST_REPLY_OPTIONS, APP_LOGGER],
    useFactory: (options: NatsRequestReplyModuleOptions, logger: LoggerService) => {
      // Connects before the application finishes bootstrapping; a failed connect aborts startup
      return NatsRequestReplyProcessor.create(parseRequestReplyConfig(options.config), {
        logger,
        interpolator: options.interpolator,
        recordFactory: options.recordFactory
      });
    }
  },
  {
    provide: REQUEST_REPLY_CLIENT,
    inject: [REQUEST_REPLY_OPTIONS, REQUEST_REPLY_PROCESSOR, APP_LOGGER],
    useFactory: (options: NatsRequestReplyModuleOptions, processor: NatsRequestReplyProcessor, logger: LoggerService) => {
      return new NatsRequestReplyClient({ processor, codec: options.codec, logger });
    }
  }
];

const exportedTokens = [REQUEST_REPLY_OPTIONS, REQUEST_REPLY_PROCESSOR, REQUEST_REPLY_CLIENT, APP_LOGGER];

@Module({})
export class NatsRequestReplyModule implements OnModuleDestroy {
  constructor(@Inject(REQUEST_REPLY_PROCESSOR) private readonly processor: NatsRequestReplyProcessor) {}

  /**
   * Register the request/reply stage with static options
   * @param options Raw stage configuration plus optional collaborators
   */
  static register(options: NatsRequestReplyModuleOptions): DynamicModule {
    return {
      module: NatsRequestReplyModule,
      providers: [
        {
          provide: REQUEST_REPLY_OPTIONS,
          useValue: options
        },
        ...sharedProviders
      ],
      exports: exportedTokens
    };
  }

  /**
   * Register the request/reply stage with async options, e.g. read from `ConfigService`
   */
  static registerAsync(options: NatsRequestReplyModuleAsyncOptions): DynamicModule {
    return {
      module: NatsRequestReplyModule,
      imports: options.imports || [],
      providers: [
        {
          provide: REQUEST_REPLY_OPTIONS,
          useFactory: options.useFactory,
          inject: options.inject || []
        },
        ...sharedProviders
      ],
      exports: exportedTokens
    };
  }

  async onModuleDestroy(): Promise<void> {
    await this.processor.close();
  }
}
