/** Liveness state of a local service; only heartbeats set it. */
export type ServiceStatus = 'online';

/**
 * A locally running process that announces itself on the internal bus.
 *
 * Keyed by `name`, which comes from the heartbeat subject. Entries are
 * created on the first heartbeat and updated in place afterwards.
 */
export interface Service {
  readonly name: string;
  status: ServiceStatus;
  last_seen: string; // ISO-8601
}
