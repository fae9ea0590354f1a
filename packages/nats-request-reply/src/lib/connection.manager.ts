import { Logger, LoggerService } from '@nestjs/common';

import {
  Authenticator,
  connect,
  ConnectionOptions,
  credsAuthenticator,
  DebugEvents,
  Events,
  jwtAuthenticator,
  NatsConnection,
  nkeyAuthenticator
} from 'nats';

import { ConnectionLock } from './connection.lock';
import { AuthConfig, TlsConfig } from './interfaces/nats-request-reply-options.interface';
import { ConnectionError, errorMessage, StageClosedError } from './request-reply.errors';

export interface ConnectionManagerOptions {
  urls: string[];
  timeoutMs: number;
  label?: string;
  inboxPrefix?: string;
  tls?: TlsConfig;
  auth?: AuthConfig;
  logger?: LoggerService;
}

const encoder = new TextEncoder();

/**
 * Maps already-resolved auth material onto NATS connection options.
 * Credentials take precedence over a user JWT, which takes precedence over a bare NKey seed.
 */
export function authOptions(auth?: AuthConfig): Pick<ConnectionOptions, 'user' | 'pass' | 'token' | 'authenticator'> {
  if (!auth) {
    return {};
  }

  let authenticator: Authenticator | undefined;
  if (auth.userCredentials) {
    authenticator = credsAuthenticator(encoder.encode(auth.userCredentials));
  } else if (auth.userJwt) {
    authenticator = jwtAuthenticator(auth.userJwt, auth.userNkeySeed ? encoder.encode(auth.userNkeySeed) : undefined);
  } else if (auth.nkeySeed) {
    authenticator = nkeyAuthenticator(encoder.encode(auth.nkeySeed));
  }

  const options: Pick<ConnectionOptions, 'user' | 'pass' | 'token' | 'authenticator'> = {};
  if (auth.user !== undefined) options.user = auth.user;
  if (auth.pass !== undefined) options.pass = auth.pass;
  if (auth.token !== undefined) options.token = auth.token;
  if (authenticator) options.authenticator = authenticator;
  return options;
}

/**
 * Owns the single broker connection of a stage.
 *
 * The connection moves from unconnected to connected once and from connected to
 * closed once; a closed manager never connects again. Requests run under the
 * shared side of a {@link ConnectionLock}, connect and close under the exclusive side.
 */
export class ConnectionManager {
  protected readonly logger: LoggerService;
  protected connection?: NatsConnection;
  private closed = false;
  private readonly lock = new ConnectionLock();

  constructor(protected readonly options: ConnectionManagerOptions) {
    this.logger = options.logger || new Logger(ConnectionManager.name);
  }

  connect(): Promise<NatsConnection> {
    return this.lock.write(async () => {
      if (this.closed) {
        throw new StageClosedError('Cannot connect a closed stage');
      }
      if (this.connection) {
        return this.connection;
      }

      const servers = this.options.urls.join(', ');
      this.logger.log(`Connecting to NATS (${servers})...`);

      let connection: NatsConnection;
      try {
        connection = await this.createNatsConnection(this.buildConnectionOptions());
      } catch (err) {
        this.logger.error(`Failed to connect to NATS (${servers}): ${errorMessage(err)}`);
        throw new ConnectionError(`Failed to connect to NATS (${servers}): ${errorMessage(err)}`, { cause: err });
      }

      this.connection = connection;

      // fire-and-forget: the iterator ends when the connection closes
      this.handleStatusUpdates(connection).catch((err: unknown) => {
        this.logger.error(`Error in status monitoring: ${errorMessage(err)}`);
      });

      this.logger.log(`Connected to ${connection.getServer()}`);
      return connection;
    });
  }

  /**
   * Waits for in-flight requests, then drains and forgets the connection.
   * Calling it again is a no-op.
   */
  close(): Promise<void> {
    return this.lock.write(async () => {
      this.closed = true;

      const connection = this.connection;
      if (!connection) {
        return;
      }
      this.connection = undefined;

      this.logger.log('Closing NATS connection...');
      try {
        await connection.drain();
        this.logger.log('Connection drained successfully.');
      } catch (err) {
        this.logger.error(`Error draining connection: ${errorMessage(err)}`);
        try {
          await connection.close();
          this.logger.log('Connection closed after drain failure.');
        } catch (closeErr) {
          this.logger.error(`Error closing connection: ${errorMessage(closeErr)}`);
        }
      }
    });
  }

  /**
   * Runs `fn` against the live connection while holding the shared lock.
   * @throws StageClosedError when there is no live connection
   */
  withConnection<T>(fn: (connection: NatsConnection) => Promise<T>): Promise<T> {
    return this.lock.read(async () => {
      const connection = this.connection;
      if (!connection) {
        throw new StageClosedError(this.closed ? 'Stage is closed' : 'Stage is not connected');
      }
      return fn(connection);
    });
  }

  getConnection(): NatsConnection | undefined {
    return this.connection;
  }

  isClosed(): boolean {
    return this.closed;
  }

  createNatsConnection(options: ConnectionOptions): Promise<NatsConnection> {
    return connect(options);
  }

  buildConnectionOptions(): ConnectionOptions {
    const options: ConnectionOptions = {
      servers: this.options.urls,
      timeout: this.options.timeoutMs,
      reconnect: false,
      ...authOptions(this.options.auth)
    };

    if (this.options.label) {
      options.name = this.options.label;
    }
    if (this.options.inboxPrefix) {
      options.inboxPrefix = this.options.inboxPrefix;
    }
    if (this.options.tls?.enabled) {
      const { caFile, certFile, keyFile } = this.options.tls;
      options.tls = { caFile, certFile, keyFile };
    }

    return options;
  }

  async handleStatusUpdates(connection: NatsConnection): Promise<void> {
    for await (const status of connection.status()) {
      const data = typeof status.data === 'object' ? JSON.stringify(status.data) : status.data;
      const message = `(${status.type}): ${data}`;

      switch (status.type) {
        case DebugEvents.PingTimer:
        case DebugEvents.Reconnecting:
        case DebugEvents.StaleConnection:
          this.logger.debug?.(message);
          break;

        case Events.Disconnect:
        case Events.Error:
          this.logger.error(message);
          break;

        case Events.Reconnect:
          this.logger.log(message);
          break;

        case Events.LDM:
          this.logger.warn(message);
          break;

        case Events.Update:
          this.logger.verbose?.(message);
          break;
      }
    }
  }
}
