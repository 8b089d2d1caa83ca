import type { MqttClient } from 'mqtt';
import type { QoS } from 'mqtt-packet';
import type { ControlPlane } from '../../application/index.js';

export interface PublishOptions {
  qos: QoS;
  retain: boolean;
}

/**
 * Adapts an MQTT client to the `ControlPlane` port.
 *
 * Subscriptions are exact-topic: the handler only sees messages whose
 * topic equals the subscribed one.
 */
export function createMqttControlPlane(client: MqttClient, options: PublishOptions): ControlPlane {
  return {
    async publish(topic: string, payload: string): Promise<void> {
      await client.publishAsync(topic, payload, { qos: options.qos, retain: options.retain });
    },

    async subscribe(topic, handler) {
      const listener = (received: string, payload: Buffer): void => {
        if (received !== topic) return;
        handler(received, payload);
      };

      await client.subscribeAsync(topic, { qos: options.qos });
      client.on('message', listener);

      return async () => {
        client.removeListener('message', listener);
        await client.unsubscribeAsync(topic);
      };
    },
  };
}
