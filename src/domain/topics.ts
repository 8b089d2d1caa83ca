/**
 * Topic and subject names shared with the control plane and local services.
 */

/** Internal-bus wildcard every service heartbeat is published under. */
export const HEARTBEAT_SUBJECT = 'heartbeat.*';

/** Downstream services whose configuration file the agent may overwrite. */
export const DOWNSTREAM_SERVICES = ['export'] as const;

export type DownstreamService = (typeof DOWNSTREAM_SERVICES)[number];

export function isDownstreamService(name: string): name is DownstreamService {
  return (DOWNSTREAM_SERVICES as readonly string[]).includes(name);
}

/** Control-plane topic responses are published on. */
export function responseTopic(channel: string): string {
  return `channels/${channel}/messages/res`;
}

/** Control-plane topic commands arrive on. */
export function requestTopic(channel: string): string {
  return `channels/${channel}/messages/req`;
}

/** Internal-bus subject announcing a freshly written configuration. */
export function configReadySubject(service: string): string {
  return `commands.${service}.config`;
}
