/**
 * BLE protocol constants for SPIKE Prime class hubs (App 3 firmware).
 */

export const SERVICE_UUID = '0000fd02-0000-1000-8000-00805f9b34fb';
export const RX_CHAR_UUID = '0000fd02-0001-1000-8000-00805f9b34fb'; // host -> hub (write)
export const TX_CHAR_UUID = '0000fd02-0002-1000-8000-00805f9b34fb'; // hub -> host (notify)

// Framing
export const START_MARKER = 0x01; // optional, marks a high priority frame
export const ESCAPE_MARKER = 0x00;
export const END_MARKER = 0x02;
export const FRAME_XOR = 0x03;
export const MAX_BLOCK_SIZE = 84;
export const NO_DELIMITER = 0xff;
export const COBS_CODE_OFFSET = END_MARKER;

// Field limits
export const FILE_NAME_FIELD_SIZE = 32; // NUL terminated, so 31 usable bytes
export const MAX_CHUNK_FIELD = 0xffff;
export const SLOT_COUNT = 20;
export const STATUS_ACCEPTED = 0x00;

/**
 * Message type identifiers (first byte of every payload).
 */
export enum MessageType {
  InfoRequest = 0x00,
  InfoResponse = 0x01,
  StartFileUploadRequest = 0x0c,
  StartFileUploadResponse = 0x0d,
  TransferChunkRequest = 0x10,
  TransferChunkResponse = 0x11,
  ProgramFlowRequest = 0x1e,
  ProgramFlowResponse = 0x1f,
  ProgramFlowNotification = 0x20,
  ConsoleNotification = 0x21,
  ClearSlotRequest = 0x46,
  ClearSlotResponse = 0x47,
}
