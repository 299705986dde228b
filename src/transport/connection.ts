/**
 * Bluetooth LE connection wrapper for SPIKE Prime class hubs.
 *
 * Provides a clean interface for BLE operations:
 * - Device selection and GATT connection
 * - Packet writes on the RX characteristic
 * - Packet delivery from the TX characteristic notifications
 *
 * Uses the Web Bluetooth API, provided on Node.js by the `webbluetooth`
 * package.
 */

import { BLEConnectionError } from '../exceptions';
import { RX_CHAR_UUID, SERVICE_UUID, TX_CHAR_UUID } from '../protocol/constants';

export type PacketHandler = (packet: Uint8Array) => void;

/**
 * Physical link the session drives. {@link BLEConnection} is the BLE
 * implementation; tests supply an in-process hub.
 */
export interface HubTransport {
  readonly isConnected: boolean;
  readonly deviceName: string | undefined;
  connect(): Promise<void>;
  disconnect(): Promise<void>;

  /** Write one BLE packet (at most the hub's max packet size). */
  writePacket(packet: Uint8Array): Promise<void>;

  /** Install the receiver for raw notification packets. */
  setPacketHandler(handler: PacketHandler | null): void;

  /** Install a callback for link loss. */
  setDisconnectHandler(handler: (() => void) | null): void;
}

/**
 * Connection options for BLE device.
 */
export interface BLEConnectionOptions {
  /**
   * Device id (address) to connect to.
   * If not provided, the first hub advertising the service is used.
   */
  address?: string;

  /**
   * Name prefix to filter devices (e.g., "Avatar")
   */
  namePrefix?: string;

  /**
   * How long to scan before giving up, in milliseconds
   */
  scanTimeMs?: number;
}

/**
 * BLE connection manager for SPIKE Prime class hubs.
 *
 * Handles all low-level Web Bluetooth operations and hands raw packets to
 * the session layer.
 */
export class BLEConnection implements HubTransport {
  static readonly DEFAULT_SCAN_TIME_MS = 10000;

  private device: BluetoothDevice | null = null;
  private gattServer: BluetoothRemoteGATTServer | null = null;
  private rxCharacteristic: BluetoothRemoteGATTCharacteristic | null = null;
  private txCharacteristic: BluetoothRemoteGATTCharacteristic | null = null;
  private packetHandler: PacketHandler | null = null;
  private linkLossHandler: (() => void) | null = null;

  private readonly notificationListener = (): void => this.handleNotification();
  private readonly disconnectListener = (): void => this.handleDisconnect();

  constructor(private readonly options: BLEConnectionOptions = {}) {}

  /**
   * Check if currently connected to a device.
   */
  get isConnected(): boolean {
    return this.gattServer?.connected ?? false;
  }

  /**
   * Get the connected device name, if available.
   */
  get deviceName(): string | undefined {
    return this.device?.name ?? this.options.address;
  }

  setPacketHandler(handler: PacketHandler | null): void {
    this.packetHandler = handler;
  }

  setDisconnectHandler(handler: (() => void) | null): void {
    this.linkLossHandler = handler;
  }

  /**
   * Scan for the hub and connect to its GATT service.
   *
   * @throws {BLEConnectionError} If no hub is found or connection fails
   */
  async connect(): Promise<void> {
    const { address, namePrefix } = this.options;
    const scanTime =
      (this.options.scanTimeMs ?? BLEConnection.DEFAULT_SCAN_TIME_MS) / 1000;

    try {
      // Loaded lazily so the native adapter is only touched when a real link is opened
      const { Bluetooth } = await import('webbluetooth');
      const bluetooth = new Bluetooth({
        scanTime,
        deviceFound: (found) => {
          if (address) {
            return found.id.toLowerCase() === address.toLowerCase();
          }
          if (namePrefix) {
            return found.name?.startsWith(namePrefix) ?? false;
          }
          return true;
        },
      });

      this.device = await bluetooth.requestDevice({
        filters: [{ services: [SERVICE_UUID] }],
        optionalServices: [SERVICE_UUID],
      });

      if (!this.device.gatt) {
        throw new BLEConnectionError('Device does not support GATT');
      }

      this.gattServer = await this.device.gatt.connect();

      const service = await this.gattServer.getPrimaryService(SERVICE_UUID);
      this.rxCharacteristic = await service.getCharacteristic(RX_CHAR_UUID);
      this.txCharacteristic = await service.getCharacteristic(TX_CHAR_UUID);

      await this.txCharacteristic.startNotifications();
      this.txCharacteristic.addEventListener(
        'characteristicvaluechanged',
        this.notificationListener
      );

      this.device.addEventListener('gattserverdisconnected', this.disconnectListener);

      console.log(`Connected to ${this.device.name || 'hub'}`);
    } catch (error) {
      this.cleanup();
      if (error instanceof BLEConnectionError) {
        throw error;
      }
      if (error instanceof Error) {
        throw new BLEConnectionError(`Failed to connect: ${error.message}`, {
          cause: error,
        });
      }
      throw new BLEConnectionError('Failed to connect to hub');
    }
  }

  /**
   * Disconnect from the device.
   */
  async disconnect(): Promise<void> {
    try {
      if (this.txCharacteristic) {
        try {
          await this.txCharacteristic.stopNotifications();
        } catch (error) {
          console.debug('Failed to stop notifications during disconnect', error);
        }
      }

      // Deliberate close is not link loss
      this.device?.removeEventListener('gattserverdisconnected', this.disconnectListener);
      if (this.gattServer?.connected) {
        this.gattServer.disconnect();
      }
    } finally {
      this.cleanup();
    }
  }

  /**
   * Write one packet to the hub without response.
   *
   * @throws {BLEConnectionError} If not connected or write fails
   */
  async writePacket(packet: Uint8Array): Promise<void> {
    if (!this.isConnected || !this.rxCharacteristic) {
      throw new BLEConnectionError('Not connected to hub');
    }

    try {
      await this.rxCharacteristic.writeValueWithoutResponse(packet as BufferSource);
    } catch (error) {
      if (error instanceof Error) {
        throw new BLEConnectionError(`Failed to write packet: ${error.message}`, {
          cause: error,
        });
      }
      throw new BLEConnectionError('Failed to write packet');
    }
  }

  private handleNotification(): void {
    const value = this.txCharacteristic?.value;
    if (!value) {
      return;
    }

    const packet = new Uint8Array(value.buffer, value.byteOffset, value.byteLength).slice();
    this.packetHandler?.(packet);
  }

  private handleDisconnect(): void {
    console.log('Hub disconnected');
    this.cleanup();
    this.linkLossHandler?.();
  }

  /**
   * Clean up resources and reset state.
   */
  private cleanup(): void {
    if (this.txCharacteristic) {
      this.txCharacteristic.removeEventListener(
        'characteristicvaluechanged',
        this.notificationListener
      );
      this.txCharacteristic = null;
    }
    this.rxCharacteristic = null;

    if (this.device) {
      this.device.removeEventListener('gattserverdisconnected', this.disconnectListener);
    }

    this.gattServer = null;
    this.device = null;
  }
}
