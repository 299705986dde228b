/** CRC-32 (IEEE 802.3, reflected, polynomial 0xEDB88320) used by the upload protocol. */

const CRC_TABLE = (() => {
  const table = new Uint32Array(256);
  for (let n = 0; n < 256; n++) {
    let c = n;
    for (let k = 0; k < 8; k++) {
      c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[n] = c >>> 0;
  }
  return table;
})();

/** The hub checksums buffers padded to this alignment. */
export const CRC_ALIGNMENT = 4;

/** Continues a CRC-32 from `running` over `chunk`. */
export function update(running: number, chunk: Uint8Array): number {
  let crc = (running ^ 0xffffffff) >>> 0;
  for (const byte of chunk) {
    crc = CRC_TABLE[(crc ^ byte) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

/** One-shot CRC-32 over a whole buffer; equals folding {@link update} over any split of it. */
export function whole(data: Uint8Array): number {
  return update(0, data);
}

/** Zero-pads `data` to a multiple of {@link CRC_ALIGNMENT} bytes, as the hub does before checksumming. */
export function wordAlign(data: Uint8Array): Uint8Array {
  const remainder = data.length % CRC_ALIGNMENT;
  if (remainder === 0) {
    return data;
  }
  const padded = new Uint8Array(data.length + CRC_ALIGNMENT - remainder);
  padded.set(data);
  return padded;
}
