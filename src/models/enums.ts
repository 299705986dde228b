/**
 * Enums for hub sessions.
 */

/**
 * Session lifecycle states.
 *
 * Disconnected -> Handshaking -> Ready -> (Uploading <-> Ready) -> Disconnected
 */
export enum HubState {
  DISCONNECTED = 'disconnected',
  HANDSHAKING = 'handshaking',
  READY = 'ready',
  UPLOADING = 'uploading',
}

/**
 * How a program start was delivered.
 */
export enum DeliveryStatus {
  /** Written to the link, acknowledgment not awaited */
  SENT = 'sent',
  /** Hub confirmed the request */
  ACKNOWLEDGED = 'acknowledged',
}
