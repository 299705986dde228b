/**
 * Binary (de)serialization of hub protocol messages.
 *
 * All multi-byte fields are little-endian. Layouts after the type byte:
 *
 *   InfoResponse             [rpc:1.1.2][fw:1.1.2][maxPacket:2][maxMessage:2][maxChunk:2][product:2]
 *   StartFileUploadRequest   [fileName:32 NUL padded][slot:1][crc:4]
 *   TransferChunkRequest     [runningCrc:4][size:2][chunk:size]
 *   ProgramFlowRequest       [stop:1][slot:1]
 *   ProgramFlowNotification  [stop:1]
 *   ConsoleNotification      [utf8 text, NUL padded]
 *   ClearSlotRequest         [slot:1]
 *   *Response                [status:1] (0 = accepted)
 */

import {
  FieldTooLargeError,
  MalformedMessageError,
  UnknownMessageTypeError,
} from '../exceptions';
import type { HubMessage, VersionTriple } from '../models/messages';
import {
  FILE_NAME_FIELD_SIZE,
  MAX_CHUNK_FIELD,
  MessageType,
  STATUS_ACCEPTED,
} from './constants';

const INFO_RESPONSE_SIZE = 17;

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8');

function checkByte(field: string, value: number): number {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new FieldTooLargeError(`${field} ${value} does not fit in one byte`);
  }
  return value;
}

function checkUint16(field: string, value: number): number {
  if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
    throw new FieldTooLargeError(`${field} ${value} does not fit in two bytes`);
  }
  return value;
}

function checkUint32(field: string, value: number): number {
  if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
    throw new FieldTooLargeError(`${field} ${value} does not fit in four bytes`);
  }
  return value;
}

function statusMessage(type: MessageType, accepted: boolean): Uint8Array {
  return Uint8Array.of(type, accepted ? STATUS_ACCEPTED : 0x01);
}

function writeVersion(view: DataView, offset: number, version: VersionTriple): void {
  view.setUint8(offset, checkByte('version major', version.major));
  view.setUint8(offset + 1, checkByte('version minor', version.minor));
  view.setUint16(offset + 2, checkUint16('version build', version.build), true);
}

function readVersion(view: DataView, offset: number): VersionTriple {
  return {
    major: view.getUint8(offset),
    minor: view.getUint8(offset + 1),
    build: view.getUint16(offset + 2, true),
  };
}

/**
 * Serialize a message to its payload bytes (before framing).
 *
 * @throws {FieldTooLargeError} If a field does not fit its wire width
 */
export function serializeMessage(message: HubMessage): Uint8Array {
  switch (message.type) {
    case MessageType.InfoRequest:
      return Uint8Array.of(message.type);

    case MessageType.InfoResponse: {
      const buffer = new ArrayBuffer(INFO_RESPONSE_SIZE);
      const view = new DataView(buffer);
      view.setUint8(0, message.type);
      writeVersion(view, 1, message.rpcVersion);
      writeVersion(view, 5, message.firmwareVersion);
      view.setUint16(9, checkUint16('maxPacketSize', message.maxPacketSize), true);
      view.setUint16(11, checkUint16('maxMessageSize', message.maxMessageSize), true);
      view.setUint16(13, checkUint16('maxChunkSize', message.maxChunkSize), true);
      view.setUint16(15, checkUint16('productGroupDevice', message.productGroupDevice), true);
      return new Uint8Array(buffer);
    }

    case MessageType.StartFileUploadRequest: {
      const name = textEncoder.encode(message.fileName);
      if (name.length > FILE_NAME_FIELD_SIZE - 1) {
        throw new FieldTooLargeError(
          `File name "${message.fileName}" is ${name.length} bytes ` +
            `(max ${FILE_NAME_FIELD_SIZE - 1})`
        );
      }
      const buffer = new ArrayBuffer(1 + FILE_NAME_FIELD_SIZE + 1 + 4);
      const view = new DataView(buffer);
      const result = new Uint8Array(buffer);
      view.setUint8(0, message.type);
      result.set(name, 1);
      view.setUint8(1 + FILE_NAME_FIELD_SIZE, checkByte('slot', message.slot));
      view.setUint32(2 + FILE_NAME_FIELD_SIZE, checkUint32('crc', message.crc), true);
      return result;
    }

    case MessageType.TransferChunkRequest: {
      if (message.chunk.length > MAX_CHUNK_FIELD) {
        throw new FieldTooLargeError(
          `Chunk of ${message.chunk.length} bytes exceeds ${MAX_CHUNK_FIELD}`
        );
      }
      const buffer = new ArrayBuffer(1 + 4 + 2 + message.chunk.length);
      const view = new DataView(buffer);
      const result = new Uint8Array(buffer);
      view.setUint8(0, message.type);
      view.setUint32(1, checkUint32('runningCrc', message.runningCrc), true);
      view.setUint16(5, message.chunk.length, true);
      result.set(message.chunk, 7);
      return result;
    }

    case MessageType.ProgramFlowRequest:
      return Uint8Array.of(message.type, message.stop ? 1 : 0, checkByte('slot', message.slot));

    case MessageType.ProgramFlowNotification:
      return Uint8Array.of(message.type, message.stop ? 1 : 0);

    case MessageType.ConsoleNotification: {
      const text = textEncoder.encode(message.text);
      const result = new Uint8Array(1 + text.length);
      result[0] = message.type;
      result.set(text, 1);
      return result;
    }

    case MessageType.ClearSlotRequest:
      return Uint8Array.of(message.type, checkByte('slot', message.slot));

    case MessageType.StartFileUploadResponse:
    case MessageType.TransferChunkResponse:
    case MessageType.ProgramFlowResponse:
    case MessageType.ClearSlotResponse:
      return statusMessage(message.type, message.accepted);
  }
}

function requireLength(data: Uint8Array, length: number, name: string): void {
  if (data.length < length) {
    throw new MalformedMessageError(
      `${name} too short: ${data.length} bytes (need at least ${length})`
    );
  }
}

function readStatus(data: Uint8Array, name: string): boolean {
  requireLength(data, 2, name);
  return data[1] === STATUS_ACCEPTED;
}

/**
 * Deserialize payload bytes (after unframing) into a message.
 *
 * @throws {UnknownMessageTypeError} If the type byte is not a known message
 * @throws {MalformedMessageError} If the payload is shorter than its layout
 */
export function deserializeMessage(data: Uint8Array): HubMessage {
  requireLength(data, 1, 'Message');
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const type = data[0];

  switch (type) {
    case MessageType.InfoRequest:
      return { type: MessageType.InfoRequest };

    case MessageType.InfoResponse:
      requireLength(data, INFO_RESPONSE_SIZE, 'InfoResponse');
      return {
        type: MessageType.InfoResponse,
        rpcVersion: readVersion(view, 1),
        firmwareVersion: readVersion(view, 5),
        maxPacketSize: view.getUint16(9, true),
        maxMessageSize: view.getUint16(11, true),
        maxChunkSize: view.getUint16(13, true),
        productGroupDevice: view.getUint16(15, true),
      };

    case MessageType.StartFileUploadRequest: {
      requireLength(data, 1 + FILE_NAME_FIELD_SIZE + 1 + 4, 'StartFileUploadRequest');
      const nameField = data.subarray(1, 1 + FILE_NAME_FIELD_SIZE);
      const end = nameField.indexOf(0);
      return {
        type: MessageType.StartFileUploadRequest,
        fileName: textDecoder.decode(end === -1 ? nameField : nameField.subarray(0, end)),
        slot: view.getUint8(1 + FILE_NAME_FIELD_SIZE),
        crc: view.getUint32(2 + FILE_NAME_FIELD_SIZE, true),
      };
    }

    case MessageType.TransferChunkRequest: {
      requireLength(data, 7, 'TransferChunkRequest');
      const size = view.getUint16(5, true);
      requireLength(data, 7 + size, 'TransferChunkRequest');
      return {
        type: MessageType.TransferChunkRequest,
        runningCrc: view.getUint32(1, true),
        chunk: data.slice(7, 7 + size),
      };
    }

    case MessageType.ProgramFlowRequest:
      requireLength(data, 3, 'ProgramFlowRequest');
      return { type: MessageType.ProgramFlowRequest, stop: data[1] !== 0, slot: data[2] };

    case MessageType.ProgramFlowNotification:
      requireLength(data, 2, 'ProgramFlowNotification');
      return { type: MessageType.ProgramFlowNotification, stop: data[1] !== 0 };

    case MessageType.ConsoleNotification:
      return {
        type: MessageType.ConsoleNotification,
        text: textDecoder.decode(data.subarray(1)).replace(/\0+$/, ''),
      };

    case MessageType.ClearSlotRequest:
      requireLength(data, 2, 'ClearSlotRequest');
      return { type: MessageType.ClearSlotRequest, slot: data[1] };

    case MessageType.StartFileUploadResponse:
      return { type: MessageType.StartFileUploadResponse, accepted: readStatus(data, 'StartFileUploadResponse') };

    case MessageType.TransferChunkResponse:
      return { type: MessageType.TransferChunkResponse, accepted: readStatus(data, 'TransferChunkResponse') };

    case MessageType.ProgramFlowResponse:
      return { type: MessageType.ProgramFlowResponse, accepted: readStatus(data, 'ProgramFlowResponse') };

    case MessageType.ClearSlotResponse:
      return { type: MessageType.ClearSlotResponse, accepted: readStatus(data, 'ClearSlotResponse') };

    default:
      throw new UnknownMessageTypeError(type);
  }
}
