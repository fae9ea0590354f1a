import 'reflect-metadata';

export * from './lib/nats-request-reply.module';
export * from './lib/nats-request-reply.processor';
export * from './lib/nats-request-reply.client';
export * from './lib/nats.constants';
export * from './lib/connection.manager';
export * from './lib/connection.lock';
export * from './lib/subject.resolver';
export * from './lib/header.resolver';
export * from './lib/reply.converter';
export * from './lib/metadata.filter';
export * from './lib/interpolation';
export * from './lib/pipeline.record';
export * from './lib/duration';
export * from './lib/request-reply.config';
export * from './lib/request-reply.errors';
export * from './lib/interfaces/nats-request-reply-options.interface';
export * from './lib/interfaces/processor.interface';
