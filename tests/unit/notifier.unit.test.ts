import assert from "node:assert/strict";
import test from "node:test";
import type { IClientOptions } from "mqtt";
import { NotificationError } from "../../src/errors";
import { MqttNotifier, type MqttConnector, type MqttNotifierOptions } from "../../src/services/notifier";
import { RecordingLogger } from "../helpers/fakes";

const baseOptions: MqttNotifierOptions = {
  protocol: "mqtt",
  host: "broker.local",
  port: 1883,
  username: "test-user",
  password: "test-secret",
  topic: "homeassistant/reboot",
  payload: "reboot",
  qos: 1,
  retain: false,
  connectTimeoutMs: 5000,
  rejectUnauthorized: true
};

function fakeBroker(options: { failConnect?: boolean; failPublish?: boolean } = {}) {
  const state: {
    connects: Array<{ url: string; options: IClientOptions }>;
    published: Array<{ topic: string; message: string; qos: number; retain: boolean }>;
    ended: number;
  } = { connects: [], published: [], ended: 0 };
  const connect: MqttConnector = async (url, clientOptions) => {
    state.connects.push({ url, options: clientOptions });
    if (options.failConnect) {
      throw new Error("connect ECONNREFUSED 127.0.0.1:1883");
    }
    return {
      publishAsync: async (topic, message, publishOptions) => {
        if (options.failPublish) {
          throw new Error("client disconnecting");
        }
        state.published.push({ topic, message, qos: publishOptions.qos, retain: publishOptions.retain });
        return undefined;
      },
      endAsync: async () => {
        state.ended += 1;
      }
    };
  };
  return { state, connect };
}

test("mqtt notifier: connects with credentials, publishes once and disconnects", async () => {
  const broker = fakeBroker();
  const logger = new RecordingLogger();
  const notifier = new MqttNotifier(baseOptions, logger, broker.connect);

  await notifier.notify("homeassistant/reboot", "reboot");

  assert.equal(broker.state.connects.length, 1);
  assert.equal(broker.state.connects[0].url, "mqtt://broker.local:1883");
  assert.equal(broker.state.connects[0].options.username, "test-user");
  assert.equal(broker.state.connects[0].options.password, "test-secret");
  assert.equal(broker.state.connects[0].options.reconnectPeriod, 0);
  assert.equal(broker.state.connects[0].options.connectTimeout, 5000);
  assert.deepEqual(broker.state.published, [
    { topic: "homeassistant/reboot", message: "reboot", qos: 1, retain: false }
  ]);
  assert.equal(broker.state.ended, 1);
  assert.deepEqual(logger.messages("info"), ["mqtt_message_published"]);
});

test("mqtt notifier: credentials are only sent when both are configured", async () => {
  const broker = fakeBroker();
  const notifier = new MqttNotifier(
    { ...baseOptions, password: undefined, protocol: "mqtts", port: 8883 },
    new RecordingLogger(),
    broker.connect
  );

  await notifier.notify("homeassistant/reboot", "reboot");

  assert.equal(broker.state.connects[0].url, "mqtts://broker.local:8883");
  assert.equal(broker.state.connects[0].options.username, undefined);
  assert.equal(broker.state.connects[0].options.password, undefined);
});

test("mqtt notifier: connection failures become NotificationErrors", async () => {
  const broker = fakeBroker({ failConnect: true });
  const notifier = new MqttNotifier(baseOptions, new RecordingLogger(), broker.connect);

  await assert.rejects(
    notifier.notify("homeassistant/reboot", "reboot"),
    (error: unknown) =>
      error instanceof NotificationError &&
      error.code === "mqtt_connect_failed" &&
      error.message === "Could not connect to mqtt://broker.local:1883: connect ECONNREFUSED 127.0.0.1:1883"
  );
  assert.equal(broker.state.ended, 0);
});

test("mqtt notifier: publish failures still disconnect", async () => {
  const broker = fakeBroker({ failPublish: true });
  const notifier = new MqttNotifier(baseOptions, new RecordingLogger(), broker.connect);

  await assert.rejects(
    notifier.notify("homeassistant/reboot", "reboot"),
    (error: unknown) => error instanceof NotificationError && error.code === "mqtt_publish_failed"
  );
  assert.equal(broker.state.ended, 1);
});

test("mqtt notifier: an unreadable CA file fails before connecting", async () => {
  const broker = fakeBroker();
  const logger = new RecordingLogger();
  const notifier = new MqttNotifier(
    { ...baseOptions, caFile: "/nonexistent/ca.pem" },
    logger,
    broker.connect
  );

  await assert.rejects(
    notifier.notify("homeassistant/reboot", "reboot"),
    (error: unknown) => error instanceof NotificationError && error.code === "mqtt_tls_file_read_failed"
  );
  assert.equal(broker.state.connects.length, 0);
  assert.deepEqual(logger.messages("error"), ["mqtt_tls_file_read_failed"]);
});
