/**
 * Result structures returned by session and fast path operations.
 */

import type { DeliveryStatus } from './enums';

/**
 * Outcome of one complete file upload.
 */
export interface UploadReport {
  slot: number;
  fileName: string;

  /** Program size in bytes */
  bytes: number;

  /** Number of TransferChunkRequests sent */
  chunks: number;

  /** Whole-file CRC announced in StartFileUploadRequest */
  crc: number;

  elapsedMs: number;
}

interface DeliveryBase {
  slot: number;

  /** Time from call to write (sent) or to response (acknowledged) */
  latencyMs: number;
}

/**
 * Fire-and-forget delivery: no guarantee the hub received it.
 */
export interface SentResult extends DeliveryBase {
  status: DeliveryStatus.SENT;
}

/**
 * Acknowledged delivery: the hub accepted the request.
 */
export interface AcknowledgedResult extends DeliveryBase {
  status: DeliveryStatus.ACKNOWLEDGED;
}

export type FlowResult = SentResult | AcknowledgedResult;

/**
 * Result of running a fast path action.
 */
export type RunResult = FlowResult & {
  action: string;

  /** True when the action had to be uploaded before it could start */
  uploaded: boolean;
};
