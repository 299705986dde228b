/**
 * Session with one SPIKE Prime class hub.
 */

import {
  BLEConnectionError,
  BLETimeoutError,
  FlowRejectedError,
  FlowTimeoutError,
  FrameError,
  HandshakeRejectedError,
  HandshakeTimeoutError,
  OperationAbortedError,
  ProtocolError,
  UploadFailedError,
  UploadRejectedError,
} from './exceptions';
import { DeliveryStatus, HubState } from './models/enums';
import {
  RESPONSE_FOR,
  isMessageOfType,
  type HubMessage,
  type InfoResponse,
  type MessageOfType,
  type ProgramFlowRequest,
  type RequestMessage,
  type ResponseMessage,
  type ResponseTo,
} from './models/messages';
import type { FlowResult, UploadReport } from './models/results';
import { MessageType } from './protocol/constants';
import { update, whole, wordAlign } from './protocol/crc';
import { pack, unpack } from './protocol/framing';
import { deserializeMessage, serializeMessage } from './protocol/messages';
import type { SignalQueue } from './signals';
import {
  BLEConnection,
  type BLEConnectionOptions,
  type HubTransport,
} from './transport/connection';
import { FrameBuffer } from './transport/frame-buffer';
import { NotificationQueue } from './transport/notification-queue';

export type ConsoleListener = (text: string, deviceId: string) => void;

/**
 * Await deadlines in milliseconds.
 */
export interface HubTimeouts {
  handshake: number;
  uploadStart: number;
  chunk: number;
  flow: number;
  clearSlot: number;
}

export interface HubSessionOptions {
  /** Link to drive; defaults to a {@link BLEConnection} built from `connection` */
  transport?: HubTransport;

  /** Options for the default BLE connection */
  connection?: BLEConnectionOptions;

  /** Identifier used for logs and as the source of signals */
  deviceId?: string;

  timeouts?: Partial<HubTimeouts>;

  /** Queue fed with every console line the hub prints */
  signalQueue?: SignalQueue;

  /** Called when the hub reports a program start or stop */
  onProgramFlow?: (stop: boolean) => void;
}

export interface OperationOptions {
  /** Cancels the caller's wait; a request already on the wire is still drained */
  signal?: AbortSignal;
}

export interface UploadOptions extends OperationOptions {
  onProgress?: (sentBytes: number, totalBytes: number) => void;
}

export interface FlowOptions extends OperationOptions {
  /** Stop instead of start (default: false) */
  stop?: boolean;

  /** Wait for ProgramFlowResponse (default: true) */
  waitForAck?: boolean;
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new OperationAbortedError();
  }
}

/**
 * Session with a hub.
 *
 * Owns the physical link, performs the handshake, and allows at most one
 * outstanding request: concurrent callers are queued and served in order.
 * Console output is routed to listeners and never taken as a response.
 *
 * @example
 * ```typescript
 * const hub = new HubSession({ connection: { namePrefix: 'Avatar' } });
 * await hub.connect();
 * await hub.upload(0, 'program.py', program);
 * await hub.startProgram(0);
 * await hub.disconnect();
 * ```
 */
export class HubSession {
  // Await deadlines (milliseconds)
  static readonly TIMEOUT_HANDSHAKE = 5000;
  static readonly TIMEOUT_UPLOAD_START = 5000;
  static readonly TIMEOUT_CHUNK = 8000; // Slow links need longer per chunk
  static readonly TIMEOUT_FLOW = 3000;
  static readonly TIMEOUT_CLEAR_SLOT = 3000;

  readonly deviceId: string;

  private readonly transport: HubTransport;
  private readonly timeouts: HubTimeouts;
  private readonly responses = new NotificationQueue<ResponseMessage>();
  private readonly frames = new FrameBuffer();
  private readonly consoleListeners = new Set<ConsoleListener>();
  private readonly onProgramFlow?: (stop: boolean) => void;

  private _state: HubState = HubState.DISCONNECTED;
  private _info: Readonly<InfoResponse> | null = null;
  private awaiting: MessageType | null = null;
  private lock: Promise<void> = Promise.resolve();
  private runningSlot: number | null = null;

  constructor(options: HubSessionOptions = {}) {
    this.transport = options.transport ?? new BLEConnection(options.connection);
    this.deviceId =
      options.deviceId ??
      options.connection?.address ??
      options.connection?.namePrefix ??
      'hub';
    this.timeouts = {
      handshake: HubSession.TIMEOUT_HANDSHAKE,
      uploadStart: HubSession.TIMEOUT_UPLOAD_START,
      chunk: HubSession.TIMEOUT_CHUNK,
      flow: HubSession.TIMEOUT_FLOW,
      clearSlot: HubSession.TIMEOUT_CLEAR_SLOT,
      ...options.timeouts,
    };
    this.onProgramFlow = options.onProgramFlow;

    options.signalQueue?.attach(this);
  }

  get state(): HubState {
    return this._state;
  }

  /**
   * Handshake answer, frozen once the session is ready.
   */
  get info(): Readonly<InfoResponse> | null {
    return this._info;
  }

  get isConnected(): boolean {
    return this._state !== HubState.DISCONNECTED && this.transport.isConnected;
  }

  get maxChunkSize(): number {
    return this.ensureReady().maxChunkSize;
  }

  /**
   * Subscribe to console output printed by hub programs.
   *
   * @returns Function that removes the listener
   */
  onConsole(listener: ConsoleListener): () => void {
    this.consoleListeners.add(listener);
    return () => {
      this.consoleListeners.delete(listener);
    };
  }

  /**
   * Open the link and perform the handshake.
   *
   * The InfoRequest is always the first message sent on a new link.
   *
   * @returns The hub's InfoResponse
   * @throws {BLEConnectionError} If the link cannot be opened
   * @throws {HandshakeTimeoutError} If the hub does not answer in time
   * @throws {HandshakeRejectedError} If the hub reports unusable limits
   */
  async connect(): Promise<Readonly<InfoResponse>> {
    if (this._state !== HubState.DISCONNECTED) {
      throw new BLEConnectionError(`Session ${this.deviceId} is already ${this._state}`);
    }

    this.transport.setPacketHandler((packet) => this.handlePacket(packet));
    this.transport.setDisconnectHandler(() => this.handleLinkLoss());
    await this.transport.connect();
    this.setState(HubState.HANDSHAKING);

    try {
      const info = await this.exclusive(() =>
        this.exchange(
          { type: MessageType.InfoRequest },
          this.timeouts.handshake,
          (error) =>
            new HandshakeTimeoutError(
              `No InfoResponse within ${this.timeouts.handshake}ms`,
              { cause: error }
            )
        )
      );

      if (info.maxPacketSize === 0 || info.maxChunkSize === 0) {
        throw new HandshakeRejectedError(
          `Hub reported unusable limits (packet ${info.maxPacketSize}, chunk ${info.maxChunkSize})`
        );
      }

      this._info = Object.freeze({ ...info });
      this.setState(HubState.READY);

      const { rpcVersion: rpc, firmwareVersion: fw } = info;
      console.log(
        `[${this.deviceId}] Ready: rpc ${rpc.major}.${rpc.minor}.${rpc.build}, ` +
          `firmware ${fw.major}.${fw.minor}.${fw.build}, ` +
          `chunk ${info.maxChunkSize}B, packet ${info.maxPacketSize}B`
      );
      return this._info;
    } catch (error) {
      await this.closeTransport();
      throw error;
    }
  }

  /**
   * Stop the last started program (best effort) and close the link.
   */
  async disconnect(): Promise<void> {
    if (this._state === HubState.DISCONNECTED) {
      return;
    }

    const slot = this.runningSlot;
    if (slot !== null && this.transport.isConnected) {
      try {
        await this.stopProgram(slot);
      } catch (error) {
        console.warn(
          `[${this.deviceId}] Could not stop slot ${slot} before disconnect: ${describe(error)}`
        );
      }
    }

    await this.closeTransport();
    console.log(`[${this.deviceId}] Disconnected`);
  }

  /**
   * Upload a program into a slot.
   *
   * All or nothing: a rejected or unanswered chunk aborts the transfer, and
   * a retry starts over from StartFileUploadRequest.
   *
   * @throws {UploadRejectedError} If the hub refuses the upload (no chunks sent)
   * @throws {UploadFailedError} If a chunk is rejected or times out
   * @throws {FieldTooLargeError} If the file name exceeds 31 bytes
   */
  async upload(
    slot: number,
    fileName: string,
    program: Uint8Array,
    options: UploadOptions = {}
  ): Promise<UploadReport> {
    return this.guarded(options.signal, async () => {
      const info = this.ensureReady();
      const startedAt = Date.now();
      const crc = whole(wordAlign(program));

      this.setState(HubState.UPLOADING);
      try {
        const start = await this.exchange(
          { type: MessageType.StartFileUploadRequest, fileName, slot, crc },
          this.timeouts.uploadStart,
          (error) =>
            new UploadFailedError(`No answer to upload start for slot ${slot}`, {
              cause: error,
            })
        );
        if (!start.accepted) {
          throw new UploadRejectedError(slot);
        }

        let runningCrc = 0;
        let chunks = 0;
        for (let offset = 0; offset < program.length; offset += info.maxChunkSize) {
          throwIfAborted(options.signal);

          const chunk = program.subarray(offset, offset + info.maxChunkSize);
          const sent = offset + chunk.length;
          // The hub pads only the final chunk to a word boundary
          runningCrc = update(runningCrc, sent === program.length ? wordAlign(chunk) : chunk);

          const response = await this.exchange(
            { type: MessageType.TransferChunkRequest, runningCrc, chunk },
            this.timeouts.chunk,
            (error) =>
              new UploadFailedError(
                `Chunk ${chunks + 1} of slot ${slot} timed out at offset ${offset}`,
                { cause: error }
              )
          );
          if (!response.accepted) {
            throw new UploadFailedError(
              `Hub rejected chunk ${chunks + 1} of slot ${slot} at offset ${offset}`
            );
          }

          chunks++;
          options.onProgress?.(sent, program.length);
          console.debug(`[${this.deviceId}] Slot ${slot}: ${sent}/${program.length} bytes`);
        }

        return {
          slot,
          fileName,
          bytes: program.length,
          chunks,
          crc,
          elapsedMs: Date.now() - startedAt,
        };
      } finally {
        if (this._state === HubState.UPLOADING) {
          this.setState(HubState.READY);
        }
      }
    });
  }

  /**
   * Start or stop the program in a slot.
   *
   * Every start plays the hub's startup sound once.
   *
   * With `waitForAck: false` the call returns once the request is written;
   * the session still holds the link until the response (or timeout) so a
   * late answer is never taken for the next request's.
   *
   * @throws {FlowTimeoutError} If acknowledged mode gets no response in time
   * @throws {FlowRejectedError} If the hub answers with a failure status
   */
  async flow(slot: number, options: FlowOptions = {}): Promise<FlowResult> {
    const stop = options.stop ?? false;
    const request: ProgramFlowRequest = { type: MessageType.ProgramFlowRequest, slot, stop };
    const startedAt = Date.now();
    const onTimeout = (error: BLETimeoutError): Error =>
      new FlowTimeoutError(
        `No ProgramFlowResponse for slot ${slot} within ${this.timeouts.flow}ms`,
        { cause: error }
      );

    if (options.waitForAck ?? true) {
      const response = await this.guarded(options.signal, async () => {
        this.ensureReady();
        return this.exchange(request, this.timeouts.flow, onTimeout);
      });
      if (!response.accepted) {
        throw new FlowRejectedError(slot, stop);
      }
      this.trackFlow(slot, stop);
      return { status: DeliveryStatus.ACKNOWLEDGED, slot, latencyMs: Date.now() - startedAt };
    }

    await new Promise<void>((resolve, reject) => {
      void this.guarded(options.signal, async () => {
        this.ensureReady();
        return this.exchange(request, this.timeouts.flow, onTimeout, () => {
          this.trackFlow(slot, stop);
          resolve();
        });
      }).then(
        (response) => {
          if (!response.accepted) {
            console.warn(`[${this.deviceId}] Hub rejected unacknowledged flow request for slot ${slot}`);
            if (!stop && this.runningSlot === slot) {
              this.runningSlot = null;
            }
          }
        },
        (error: unknown) => {
          // Only effective if the request never made it onto the wire
          reject(error);
          console.warn(`[${this.deviceId}] Unacknowledged flow request for slot ${slot}: ${describe(error)}`);
        }
      );
    });

    return { status: DeliveryStatus.SENT, slot, latencyMs: Date.now() - startedAt };
  }

  /**
   * Start the program in a slot.
   */
  async startProgram(slot: number, options: Omit<FlowOptions, 'stop'> = {}): Promise<FlowResult> {
    return this.flow(slot, { ...options, stop: false });
  }

  /**
   * Stop the program in a slot.
   */
  async stopProgram(slot: number, options: Omit<FlowOptions, 'stop'> = {}): Promise<FlowResult> {
    return this.flow(slot, { ...options, stop: true });
  }

  /**
   * Erase a slot.
   *
   * @returns Whether the hub accepted the request
   */
  async clearSlot(slot: number, options: OperationOptions = {}): Promise<boolean> {
    const response = await this.guarded(options.signal, async () => {
      this.ensureReady();
      return this.exchange(
        { type: MessageType.ClearSlotRequest, slot },
        this.timeouts.clearSlot,
        (error) => error
      );
    });
    return response.accepted;
  }

  /**
   * Run `work` once every earlier operation has settled.
   */
  private exclusive<T>(work: () => Promise<T>): Promise<T> {
    const run = this.lock.then(work);
    // The lock only orders operations; failures reach the caller through `run`
    this.lock = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Queue `work` behind earlier operations, letting the caller stop waiting on abort.
   */
  private guarded<T>(signal: AbortSignal | undefined, work: () => Promise<T>): Promise<T> {
    const run = this.exclusive(async () => {
      throwIfAborted(signal);
      return work();
    });
    if (!signal) {
      return run;
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => reject(new OperationAbortedError());
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }

      run.then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  /**
   * Send one request and await its response. Must run inside {@link exclusive}.
   */
  private async exchange<R extends RequestMessage>(
    request: R,
    timeoutMs: number,
    onTimeout: (error: BLETimeoutError) => Error,
    onSent?: () => void
  ): Promise<ResponseTo<R>> {
    const requestType: R['type'] = request.type;
    const expected = RESPONSE_FOR[requestType];

    const stale = this.responses.drain();
    if (stale > 0) {
      console.debug(`[${this.deviceId}] Dropped ${stale} stale response(s)`);
    }

    this.awaiting = expected;
    try {
      await this.sendMessage(request);
      onSent?.();
      return await this.awaitResponse(expected, timeoutMs);
    } catch (error) {
      if (error instanceof BLETimeoutError) {
        throw onTimeout(error);
      }
      throw error;
    } finally {
      this.awaiting = null;
    }
  }

  private async awaitResponse<T extends MessageType>(
    type: T,
    timeoutMs: number
  ): Promise<MessageOfType<T>> {
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new BLETimeoutError(`No ${MessageType[type]} within ${timeoutMs}ms timeout`);
      }

      const message = await this.responses.dequeue(remaining);
      if (isMessageOfType(message, type)) {
        return message;
      }
      console.warn(
        `[${this.deviceId}] Discarding ${MessageType[message.type]} while awaiting ${MessageType[type]}`
      );
    }
  }

  /**
   * Frame a message and write it in packets of at most the hub's packet size.
   */
  private async sendMessage(message: HubMessage): Promise<void> {
    const frame = pack(serializeMessage(message));
    const packetSize = this._info?.maxPacketSize ?? frame.length;

    for (let offset = 0; offset < frame.length; offset += packetSize) {
      await this.transport.writePacket(frame.subarray(offset, offset + packetSize));
    }
  }

  private handlePacket(packet: Uint8Array): void {
    for (const frame of this.frames.push(packet)) {
      let message: HubMessage;
      try {
        message = deserializeMessage(unpack(frame));
      } catch (error) {
        if (error instanceof FrameError || error instanceof ProtocolError) {
          console.warn(`[${this.deviceId}] Dropped inbound frame: ${error.message}`);
          continue;
        }
        throw error;
      }
      this.dispatch(message);
    }
  }

  /**
   * Route an inbound message by its type: console output to listeners,
   * responses to the pending exchange, everything else to the log.
   */
  private dispatch(message: HubMessage): void {
    switch (message.type) {
      case MessageType.ConsoleNotification:
        for (const listener of this.consoleListeners) {
          try {
            listener(message.text, this.deviceId);
          } catch (error) {
            console.warn(`[${this.deviceId}] Console listener failed: ${describe(error)}`);
          }
        }
        return;

      case MessageType.ProgramFlowNotification:
        console.debug(
          `[${this.deviceId}] Program ${message.stop ? 'stopped' : 'started'}`
        );
        if (message.stop) {
          this.runningSlot = null;
        }
        this.onProgramFlow?.(message.stop);
        return;

      case MessageType.InfoResponse:
      case MessageType.StartFileUploadResponse:
      case MessageType.TransferChunkResponse:
      case MessageType.ProgramFlowResponse:
      case MessageType.ClearSlotResponse:
        if (this.awaiting === message.type) {
          this.responses.enqueue(message);
        } else {
          console.warn(`[${this.deviceId}] Discarding unexpected ${MessageType[message.type]}`);
        }
        return;

      case MessageType.InfoRequest:
      case MessageType.StartFileUploadRequest:
      case MessageType.TransferChunkRequest:
      case MessageType.ProgramFlowRequest:
      case MessageType.ClearSlotRequest:
        console.warn(`[${this.deviceId}] Ignoring host-side ${MessageType[message.type]} from hub`);
        return;
    }
  }

  private trackFlow(slot: number, stop: boolean): void {
    if (stop) {
      if (this.runningSlot === slot) {
        this.runningSlot = null;
      }
    } else {
      this.runningSlot = slot;
    }
  }

  private ensureReady(): Readonly<InfoResponse> {
    if (!this._info || !this.transport.isConnected || this._state === HubState.DISCONNECTED) {
      throw new BLEConnectionError(`Session ${this.deviceId} is not connected`);
    }
    return this._info;
  }

  private setState(state: HubState): void {
    if (state !== this._state) {
      console.debug(`[${this.deviceId}] State: ${this._state} -> ${state}`);
      this._state = state;
    }
  }

  private async closeTransport(): Promise<void> {
    try {
      await this.transport.disconnect();
    } finally {
      this.resetSession('Session closed');
    }
  }

  private handleLinkLoss(): void {
    if (this._state !== HubState.DISCONNECTED) {
      console.warn(`[${this.deviceId}] Link lost`);
      this.resetSession('Hub disconnected');
    }
  }

  private resetSession(reason: string): void {
    this.responses.clear(reason);
    this.frames.clear();
    this.awaiting = null;
    this._info = null;
    this.runningSlot = null;
    this.setState(HubState.DISCONNECTED);
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
