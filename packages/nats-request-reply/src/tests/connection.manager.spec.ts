import { LoggerService } from '@nestjs/common';

import { Events, DebugEvents, NatsConnection } from 'nats';

import { createMock, DeepMocked } from '@golevelup/ts-jest';

import { authOptions, ConnectionManager } from '../lib/connection.manager';
import { ConnectionError, StageClosedError } from '../lib/request-reply.errors';

import { deferred, FakeBroker, flush, statusStream } from './helpers/fake-broker';

describe('ConnectionManager', () => {
  let logger: DeepMocked<LoggerService>;
  let connection: DeepMocked<NatsConnection>;
  let manager: ConnectionManager;
  let createConnection: jest.SpyInstance;

  beforeEach(() => {
    logger = createMock<LoggerService>();
    connection = new FakeBroker().connection();
    manager = new ConnectionManager({ urls: ['nats://a:4222', 'nats://b:4222'], timeoutMs: 3000, logger });
    createConnection = jest.spyOn(manager, 'createNatsConnection').mockResolvedValue(connection);
  });

  describe('connect', () => {
    it('should connect with reconnects disabled', async () => {
      await expect(manager.connect()).resolves.toBe(connection);

      expect(createConnection).toHaveBeenCalledWith({
        servers: ['nats://a:4222', 'nats://b:4222'],
        timeout: 3000,
        reconnect: false
      });
      expect(logger.log).toHaveBeenCalledWith('Connecting to NATS (nats://a:4222, nats://b:4222)...');
      expect(logger.log).toHaveBeenCalledWith('Connected to nats://test:4222');
    });

    it('should reuse the live connection', async () => {
      await manager.connect();
      await manager.connect();

      expect(createConnection).toHaveBeenCalledTimes(1);
    });

    it('should wrap connection failures', async () => {
      createConnection.mockRejectedValueOnce(new Error('connection refused'));

      await expect(manager.connect()).rejects.toThrow(
        new ConnectionError('Failed to connect to NATS (nats://a:4222, nats://b:4222): connection refused')
      );
      expect(manager.getConnection()).toBeUndefined();
    });

    it('should refuse to connect once closed', async () => {
      await manager.connect();
      await manager.close();

      await expect(manager.connect()).rejects.toThrow(new StageClosedError('Cannot connect a closed stage'));
      expect(createConnection).toHaveBeenCalledTimes(1);
    });
  });

  describe('close', () => {
    it('should drain the connection once', async () => {
      await manager.connect();

      await manager.close();
      await manager.close();

      expect(connection.drain).toHaveBeenCalledTimes(1);
      expect(manager.isClosed()).toBe(true);
      expect(manager.getConnection()).toBeUndefined();
    });

    it('should close the connection when draining fails', async () => {
      connection.drain.mockRejectedValueOnce(new Error('drain failed'));
      await manager.connect();

      await manager.close();

      expect(connection.close).toHaveBeenCalledTimes(1);
      expect(logger.error).toHaveBeenCalledWith('Error draining connection: drain failed');
    });

    it('should succeed without a connection', async () => {
      await expect(manager.close()).resolves.toBeUndefined();
      expect(manager.isClosed()).toBe(true);
    });

    it('should wait for in-flight work', async () => {
      await manager.connect();
      const work = deferred<string>();

      const inFlight = manager.withConnection(() => work.promise);
      await flush();
      const closing = manager.close();
      await flush();

      expect(connection.drain).not.toHaveBeenCalled();

      work.resolve('done');
      await expect(inFlight).resolves.toBe('done');
      await closing;

      expect(connection.drain).toHaveBeenCalledTimes(1);
    });
  });

  describe('withConnection', () => {
    it('should pass the live connection', async () => {
      await manager.connect();

      await expect(manager.withConnection(async (live) => live)).resolves.toBe(connection);
    });

    it('should fail before connect', async () => {
      await expect(manager.withConnection(async () => 'unused')).rejects.toThrow(
        new StageClosedError('Stage is not connected')
      );
    });

    it('should fail after close', async () => {
      await manager.connect();
      await manager.close();

      await expect(manager.withConnection(async () => 'unused')).rejects.toThrow(new StageClosedError('Stage is closed'));
    });
  });

  describe('buildConnectionOptions', () => {
    it('should include the label, inbox prefix and TLS files', () => {
      const configured = new ConnectionManager({
        urls: ['tls://a:4222'],
        timeoutMs: 500,
        label: 'orders-stage',
        inboxPrefix: '_INBOX_orders',
        tls: { enabled: true, caFile: '/certs/ca.pem' },
        logger
      });

      const options = configured.buildConnectionOptions();

      expect(options.name).toBe('orders-stage');
      expect(options.inboxPrefix).toBe('_INBOX_orders');
      expect(options.tls).toEqual({ caFile: '/certs/ca.pem' });
      expect(options.reconnect).toBe(false);
    });

    it('should leave TLS out when disabled', () => {
      const configured = new ConnectionManager({ urls: ['nats://a:4222'], timeoutMs: 500, tls: { enabled: false }, logger });

      expect(configured.buildConnectionOptions().tls).toBeUndefined();
    });
  });

  describe('handleStatusUpdates', () => {
    it('should log status events by severity', async () => {
      connection.status.mockReturnValueOnce(
        statusStream(
          { type: Events.Disconnect, data: 'nats://a:4222' },
          { type: Events.LDM, data: 'nats://a:4222' },
          { type: DebugEvents.PingTimer, data: 1 }
        )
      );

      await manager.handleStatusUpdates(connection);

      expect(logger.error).toHaveBeenCalledWith('(disconnect): nats://a:4222');
      expect(logger.warn).toHaveBeenCalledWith('(ldm): nats://a:4222');
      expect(logger.debug).toHaveBeenCalledWith('(pingTimer): 1');
    });
  });
});

describe('authOptions', () => {
  it('should return nothing without auth', () => {
    expect(authOptions()).toEqual({});
  });

  it('should map user, password and token', () => {
    expect(authOptions({ user: 'test-user', pass: 'test-secret' })).toEqual({ user: 'test-user', pass: 'test-secret' });
    expect(authOptions({ token: 'test-token' })).toEqual({ token: 'test-token' });
  });

  it('should build an authenticator from key material', () => {
    expect(typeof authOptions({ userCredentials: 'test-creds' }).authenticator).toBe('function');
    expect(typeof authOptions({ userJwt: 'test-jwt', userNkeySeed: 'test-seed' }).authenticator).toBe('function');
    expect(typeof authOptions({ nkeySeed: 'test-seed' }).authenticator).toBe('function');
  });
});
