export { connectNats, createNatsBus } from './client.js';
export { startHeartbeatSubscriber, handleHeartbeat } from './heartbeat-subscriber.js';
