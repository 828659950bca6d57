/**
 * Suppresses repeat failure notifications for an endpoint within a cooldown window.
 */
export interface ICooldownGate {
  /** True when a notification may be sent now; records the send when it returns true */
  tryAcquire(endpointId: string): Promise<boolean>;
}
