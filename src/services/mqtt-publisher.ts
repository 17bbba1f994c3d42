import type { FastifyBaseLogger } from "fastify";
import { connectAsync, type IClientOptions } from "mqtt";
import type { AppEnv } from "../config/env";
import { ServiceError } from "./service-error";

/**
 * Publishes retained messages and resolves once the broker acknowledged
 * them. An empty payload clears the retained message on a topic.
 */
export interface RetainedPublisher {
  /** Ensures a live broker session before anything is published. */
  connect(): Promise<void>;
  publishRetained(topic: string, payload: string): Promise<void>;
  close(): Promise<void>;
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number, what: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`${what} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

/** The part of mqtt's client the publisher relies on. */
export interface BrokerClient {
  readonly connected: boolean;
  readonly reconnecting: boolean;
  readonly disconnecting: boolean;
  on(event: "connect" | "close", listener: () => void): this;
  on(event: "error", listener: (error: Error) => void): this;
  off(event: "connect" | "close", listener: () => void): this;
  publishAsync(topic: string, payload: string, options: { qos: 1; retain: true }): Promise<unknown>;
  endAsync(force?: boolean): Promise<void>;
}

export type BrokerConnector = (url: string, options: IClientOptions) => Promise<BrokerClient>;

const connectBroker: BrokerConnector = (url, options) => connectAsync(url, options, false);

export class MqttRetainedPublisher implements RetainedPublisher {
  private client: BrokerClient | null = null;
  private connecting: Promise<BrokerClient> | null = null;

  constructor(
    private readonly options: {
      url: string;
      clientId: string;
      username?: string;
      password?: string;
      connectTimeoutMs: number;
      publishTimeoutMs: number;
      connector?: BrokerConnector;
    },
    private logger?: FastifyBaseLogger
  ) {}

  static fromEnv(env: AppEnv, logger?: FastifyBaseLogger): MqttRetainedPublisher {
    return new MqttRetainedPublisher(
      {
        url: env.MQTT_URL,
        clientId: env.MQTT_CLIENT_ID,
        username: env.MQTT_USERNAME,
        password: env.MQTT_PASSWORD,
        connectTimeoutMs: env.MQTT_CONNECT_TIMEOUT_MS,
        publishTimeoutMs: env.MQTT_PUBLISH_TIMEOUT_MS
      },
      logger
    );
  }

  /** Attaches the app logger once it exists; the publisher is built before the app. */
  useLogger(logger: FastifyBaseLogger): void {
    this.logger = logger;
  }

  /** Waits for a reconnecting client to get its session back. */
  private awaitReconnect(client: BrokerClient): Promise<BrokerClient> {
    let detach = () => {};
    const reconnected = new Promise<BrokerClient>((resolve, reject) => {
      const onConnect = () => resolve(client);
      const onClose = () => {
        if (client.disconnecting || !client.reconnecting) {
          reject(new Error("mqtt client closed while reconnecting"));
        }
      };
      client.on("connect", onConnect);
      client.on("close", onClose);
      detach = () => {
        client.off("connect", onConnect);
        client.off("close", onClose);
      };
    });
    return withTimeout(reconnected, this.options.connectTimeoutMs, "mqtt reconnect").finally(() => detach());
  }

  private async ensureClient(): Promise<BrokerClient> {
    const current = this.client;
    if (current && current.connected) {
      return current;
    }
    if (current && current.reconnecting) {
      return this.awaitReconnect(current);
    }
    if (this.connecting) {
      return this.connecting;
    }

    const connectOptions: IClientOptions = {
      clientId: this.options.clientId,
      username: this.options.username,
      password: this.options.password,
      connectTimeout: this.options.connectTimeoutMs,
      keepalive: 20,
      reconnectPeriod: 1000
    };

    this.connecting = this.replaceClient(current, connectOptions).finally(() => {
      this.connecting = null;
    });

    return this.connecting;
  }

  /** Ends a client that gave up reconnecting, so only one session holds the client id. */
  private async replaceClient(stale: BrokerClient | null, connectOptions: IClientOptions): Promise<BrokerClient> {
    if (stale) {
      this.client = null;
      await stale.endAsync(true);
      this.logger?.warn({ client_id: this.options.clientId }, "mqtt_stale_client_ended");
    }

    const client = await (this.options.connector ?? connectBroker)(this.options.url, connectOptions);
    client.on("error", (error) => {
      this.logger?.warn({ err: error }, "mqtt_client_error");
    });
    this.client = client;
    this.logger?.info({ mqtt_url: this.options.url, client_id: this.options.clientId }, "mqtt_connected");
    return client;
  }

  async connect(): Promise<void> {
    try {
      await this.ensureClient();
    } catch (error) {
      this.logger?.error({ err: error }, "mqtt_connect_failed");
      throw new ServiceError("publish_failed", "broker_unavailable", "Message broker is unavailable.", null, {
        cause: error
      });
    }
  }

  async publishRetained(topic: string, payload: string): Promise<void> {
    try {
      const client = await this.ensureClient();
      await withTimeout(
        client.publishAsync(topic, payload, { qos: 1, retain: true }),
        this.options.publishTimeoutMs,
        `publish to ${topic}`
      );
    } catch (error) {
      this.logger?.error({ err: error, topic }, "mqtt_publish_failed");
      throw new ServiceError("publish_failed", "publish_failed", `Publishing to ${topic} failed.`, { topic }, {
        cause: error
      });
    }
  }

  async close(): Promise<void> {
    const pending = this.connecting;
    if (pending) {
      await pending.catch((error: unknown) => {
        this.logger?.warn({ err: error }, "mqtt_connect_abandoned");
      });
    }
    const client = this.client;
    this.client = null;
    if (client) {
      await client.endAsync();
    }
  }
}
