/**
 * Frame codec for the hub link.
 *
 * Payloads are byte-stuffed with a COBS variant that removes the three
 * reserved values (0x00, 0x01, 0x02), whitened with XOR 0x03 and terminated
 * with the end marker:
 *
 *   [0x01 optional][encoded payload ^ 0x03][0x02]
 *
 * Each code byte describes one block: how many literal bytes follow and which
 * reserved value (if any) the block stood in for,
 * `code = value * MAX_BLOCK_SIZE + blockLength + COBS_CODE_OFFSET`.
 * `NO_DELIMITER` marks a full block that replaced nothing.
 */

import { FrameTruncatedError, InvalidEscapeError } from '../exceptions';
import {
  COBS_CODE_OFFSET,
  END_MARKER,
  FRAME_XOR,
  MAX_BLOCK_SIZE,
  NO_DELIMITER,
  START_MARKER,
} from './constants';

export interface PackOptions {
  /** Prepend the start marker (hub treats the frame as high priority) */
  priority?: boolean;
}

/**
 * Byte-stuff a payload so it contains none of the reserved values.
 *
 * @param payload - Raw message bytes
 * @returns Encoded bytes (no XOR, no delimiters)
 */
export function encode(payload: Uint8Array): Uint8Array {
  const out: number[] = [];
  let codeIndex = 0;
  let block = 0;

  const beginBlock = (): void => {
    codeIndex = out.length;
    out.push(NO_DELIMITER);
    block = 1;
  };

  beginBlock();
  for (const byte of payload) {
    if (byte > END_MARKER) {
      out.push(byte);
      block++;
    }

    if (byte <= END_MARKER || block > MAX_BLOCK_SIZE) {
      if (byte <= END_MARKER) {
        out[codeIndex] = byte * MAX_BLOCK_SIZE + block + COBS_CODE_OFFSET;
      }
      beginBlock();
    }
  }
  out[codeIndex] = block + COBS_CODE_OFFSET;

  return Uint8Array.from(out);
}

function unescapeCode(code: number): { value: number | null; block: number } {
  if (code === NO_DELIMITER) {
    return { value: null, block: MAX_BLOCK_SIZE + 1 };
  }
  if (code < COBS_CODE_OFFSET + 1) {
    throw new InvalidEscapeError(
      `Invalid code byte 0x${code.toString(16).padStart(2, '0')}`
    );
  }

  const offset = code - COBS_CODE_OFFSET;
  let value = Math.floor(offset / MAX_BLOCK_SIZE);
  let block = offset % MAX_BLOCK_SIZE;
  if (block === 0) {
    block = MAX_BLOCK_SIZE;
    value -= 1;
  }
  return { value, block };
}

/**
 * Reverse {@link encode}.
 *
 * @throws {FrameTruncatedError} If the data ends inside a block
 * @throws {InvalidEscapeError} If a code byte does not resolve to a reserved value
 */
export function decode(data: Uint8Array): Uint8Array {
  if (data.length === 0) {
    throw new FrameTruncatedError('Empty frame');
  }

  const out: number[] = [];
  let { value, block } = unescapeCode(data[0]);

  for (let i = 1; i < data.length; i++) {
    block--;
    if (block > 0) {
      out.push(data[i]);
      continue;
    }
    if (value !== null) {
      out.push(value);
    }
    ({ value, block } = unescapeCode(data[i]));
  }

  if (block !== 1) {
    throw new FrameTruncatedError(
      `Frame ended ${block - 1} byte(s) short of its last block`
    );
  }

  return Uint8Array.from(out);
}

/**
 * Encode a payload into a complete wire frame.
 */
export function pack(payload: Uint8Array, options: PackOptions = {}): Uint8Array {
  const encoded = encode(payload);
  const prefix = options.priority ? 1 : 0;
  const frame = new Uint8Array(prefix + encoded.length + 1);

  if (options.priority) {
    frame[0] = START_MARKER;
  }
  for (let i = 0; i < encoded.length; i++) {
    frame[prefix + i] = encoded[i] ^ FRAME_XOR;
  }
  frame[frame.length - 1] = END_MARKER;

  return frame;
}

/**
 * Decode a complete wire frame back into the payload.
 *
 * @throws {FrameTruncatedError} If the end marker is missing
 * @throws {InvalidEscapeError} If the frame holds an invalid escape
 */
export function unpack(frame: Uint8Array): Uint8Array {
  if (frame.length === 0 || frame[frame.length - 1] !== END_MARKER) {
    throw new FrameTruncatedError('Frame is missing its end marker');
  }

  const start = frame[0] === START_MARKER ? 1 : 0;
  const body = frame.subarray(start, frame.length - 1);
  const unwhitened = body.map((byte) => byte ^ FRAME_XOR);

  return decode(unwhitened);
}
