import { readFileSync } from "node:fs";
import { connectAsync, type IClientOptions } from "mqtt";
import type { AppConfig, MqttQos } from "../config/env";
import { NotificationError, describeError } from "../errors";
import type { LoggerLike } from "../logging/logger";

export type Notifier = {
  notify: (topic: string, payload: string) => Promise<void>;
};

type MqttPublishClient = {
  publishAsync: (topic: string, message: string, options: { qos: MqttQos; retain: boolean }) => Promise<unknown>;
  endAsync: (force?: boolean) => Promise<void>;
};

export type MqttConnector = (brokerUrl: string, options: IClientOptions) => Promise<MqttPublishClient>;

export type MqttNotifierOptions = AppConfig["mqtt"];

// allowRetries=false: a failed connect rejects instead of reconnecting.
const defaultConnector: MqttConnector = (brokerUrl, options) => connectAsync(brokerUrl, options, false);

export class MqttNotifier implements Notifier {
  constructor(
    private readonly options: MqttNotifierOptions,
    private readonly logger: LoggerLike,
    private readonly connect: MqttConnector = defaultConnector
  ) {}

  brokerUrl(): string {
    return `${this.options.protocol}://${this.options.host}:${this.options.port}`;
  }

  async notify(topic: string, payload: string): Promise<void> {
    const brokerUrl = this.brokerUrl();

    let client: MqttPublishClient;
    try {
      client = await this.connect(brokerUrl, this.connectOptions());
    } catch (error) {
      if (error instanceof NotificationError) {
        throw error;
      }
      throw new NotificationError(
        "mqtt_connect_failed",
        `Could not connect to ${brokerUrl}: ${describeError(error)}`,
        { broker: brokerUrl }
      );
    }

    try {
      await client.publishAsync(topic, payload, {
        qos: this.options.qos,
        retain: this.options.retain
      });
      this.logger.info({ broker: brokerUrl, topic, qos: this.options.qos }, "mqtt_message_published");
    } catch (error) {
      throw new NotificationError(
        "mqtt_publish_failed",
        `Could not publish to ${topic}: ${describeError(error)}`,
        { broker: brokerUrl, topic }
      );
    } finally {
      await this.disconnect(client, brokerUrl);
    }
  }

  private connectOptions(): IClientOptions {
    const options: IClientOptions = {
      clean: true,
      reconnectPeriod: 0,
      connectTimeout: this.options.connectTimeoutMs,
      rejectUnauthorized: this.options.rejectUnauthorized
    };
    if (this.options.clientId) {
      options.clientId = this.options.clientId;
    }
    if (this.options.username && this.options.password) {
      options.username = this.options.username;
      options.password = this.options.password;
    }
    if (this.options.caFile) {
      options.ca = this.readTlsFile(this.options.caFile);
    }
    return options;
  }

  private readTlsFile(filePath: string): Buffer {
    try {
      return readFileSync(filePath);
    } catch (error) {
      this.logger.error({ err: error, file_path: filePath }, "mqtt_tls_file_read_failed");
      throw new NotificationError(
        "mqtt_tls_file_read_failed",
        `Could not read MQTT CA file ${filePath}: ${describeError(error)}`,
        { file_path: filePath }
      );
    }
  }

  private async disconnect(client: MqttPublishClient, brokerUrl: string): Promise<void> {
    try {
      await client.endAsync();
    } catch (error) {
      this.logger.warn({ err: error, broker: brokerUrl }, "mqtt_disconnect_failed");
    }
  }
}
