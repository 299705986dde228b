/**
 * Reassembles BLE packets into complete frames.
 *
 * A frame may arrive split across several notifications, and one
 * notification may carry the tail of one frame and the start of the next.
 * Frames are cut at every end marker.
 */

import { END_MARKER } from '../protocol/constants';

export class FrameBuffer {
  private pending: Uint8Array = new Uint8Array(0);

  /**
   * Append a packet and return every frame it completes (end marker included).
   */
  push(packet: Uint8Array): Uint8Array[] {
    const merged = new Uint8Array(this.pending.length + packet.length);
    merged.set(this.pending, 0);
    merged.set(packet, this.pending.length);

    const frames: Uint8Array[] = [];
    let start = 0;
    let end = merged.indexOf(END_MARKER, start);
    while (end !== -1) {
      frames.push(merged.slice(start, end + 1));
      start = end + 1;
      end = merged.indexOf(END_MARKER, start);
    }

    this.pending = merged.slice(start);
    return frames;
  }

  /**
   * Number of buffered bytes not yet forming a frame.
   */
  get size(): number {
    return this.pending.length;
  }

  clear(): void {
    this.pending = new Uint8Array(0);
  }
}
