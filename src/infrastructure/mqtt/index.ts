export { connectMqtt, buildMqttOptions } from './client.js';
export { createMqttControlPlane } from './control-plane.js';
export type { PublishOptions } from './control-plane.js';
export { startCommandSubscriber, handleCommandMessage } from './command-subscriber.js';
export type { CommandHandler } from './command-subscriber.js';
