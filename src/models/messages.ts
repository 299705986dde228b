/**
 * Hub protocol message model.
 *
 * Every message is a variant of the closed {@link HubMessage} union,
 * discriminated by its {@link MessageType}.
 */

import { MessageType } from '../protocol/constants';

export interface VersionTriple {
  major: number;
  minor: number;
  build: number;
}

export interface InfoRequest {
  type: MessageType.InfoRequest;
}

/**
 * Handshake answer describing the hub's protocol version and limits.
 */
export interface InfoResponse {
  type: MessageType.InfoResponse;

  /** RPC protocol version */
  rpcVersion: VersionTriple;

  /** Hub firmware version */
  firmwareVersion: VersionTriple;

  /** Largest BLE write the hub accepts, in bytes */
  maxPacketSize: number;

  /** Largest decoded message the hub accepts, in bytes */
  maxMessageSize: number;

  /** Largest payload of a single TransferChunkRequest */
  maxChunkSize: number;

  /** Product group and device identifier */
  productGroupDevice: number;
}

export interface StartFileUploadRequest {
  type: MessageType.StartFileUploadRequest;
  fileName: string;
  slot: number;
  crc: number;
}

export interface StartFileUploadResponse {
  type: MessageType.StartFileUploadResponse;
  accepted: boolean;
}

export interface TransferChunkRequest {
  type: MessageType.TransferChunkRequest;
  runningCrc: number;
  chunk: Uint8Array;
}

export interface TransferChunkResponse {
  type: MessageType.TransferChunkResponse;
  accepted: boolean;
}

export interface ProgramFlowRequest {
  type: MessageType.ProgramFlowRequest;
  slot: number;
  stop: boolean;
}

export interface ProgramFlowResponse {
  type: MessageType.ProgramFlowResponse;
  accepted: boolean;
}

/** Hub-originated: a program started or stopped. */
export interface ProgramFlowNotification {
  type: MessageType.ProgramFlowNotification;
  stop: boolean;
}

/** Hub-originated: text printed by the running program. */
export interface ConsoleNotification {
  type: MessageType.ConsoleNotification;
  text: string;
}

export interface ClearSlotRequest {
  type: MessageType.ClearSlotRequest;
  slot: number;
}

export interface ClearSlotResponse {
  type: MessageType.ClearSlotResponse;
  accepted: boolean;
}

export type RequestMessage =
  | InfoRequest
  | StartFileUploadRequest
  | TransferChunkRequest
  | ProgramFlowRequest
  | ClearSlotRequest;

export type ResponseMessage =
  | InfoResponse
  | StartFileUploadResponse
  | TransferChunkResponse
  | ProgramFlowResponse
  | ClearSlotResponse;

export type NotificationMessage = ProgramFlowNotification | ConsoleNotification;

export type HubMessage = RequestMessage | ResponseMessage | NotificationMessage;

/** Narrow a message union member by its type id. */
export type MessageOfType<T extends MessageType> = Extract<HubMessage, { type: T }>;

/**
 * Response type expected for each request type.
 */
export const RESPONSE_FOR = {
  [MessageType.InfoRequest]: MessageType.InfoResponse,
  [MessageType.StartFileUploadRequest]: MessageType.StartFileUploadResponse,
  [MessageType.TransferChunkRequest]: MessageType.TransferChunkResponse,
  [MessageType.ProgramFlowRequest]: MessageType.ProgramFlowResponse,
  [MessageType.ClearSlotRequest]: MessageType.ClearSlotResponse,
} as const satisfies Record<RequestMessage['type'], ResponseMessage['type']>;

export type ResponseTo<R extends RequestMessage> = MessageOfType<
  (typeof RESPONSE_FOR)[R['type']]
>;

export function isMessageOfType<T extends MessageType>(
  message: HubMessage,
  type: T
): message is MessageOfType<T> {
  return message.type === type;
}
