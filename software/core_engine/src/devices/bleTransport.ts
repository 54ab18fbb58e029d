/**
 * Lower-layer BLE contract consumed by BiometricDeviceMonitor.
 *
 * The monitor does not implement a BLE stack: an adapter (noble, a native
 * bridge, a test fake) supplies scanning, connection handles and raw
 * notification payloads through these interfaces.
 */

/** Standard GATT Heart Rate service / measurement characteristic. */
export const HEART_RATE_SERVICE_UUID = '0000180d-0000-1000-8000-00805f9b34fb';
export const HEART_RATE_MEASUREMENT_UUID = '00002a37-0000-1000-8000-00805f9b34fb';

export type ScannedPeripheral = {
	address: string;
	name: string | null;
	rssi: number | null;
};

export interface NotificationSubscription {
	remove(): void;
}

export interface BleConnection {
	readonly address: string;
	isConnected(): boolean;
	subscribe(
		serviceUuid: string,
		characteristicUuid: string,
		listener: (payload: Uint8Array) => void,
	): Promise<NotificationSubscription>;
	disconnect(): Promise<void>;
}

export interface BleTransport {
	scan(timeoutMs: number): Promise<ScannedPeripheral[]>;
	connect(address: string, options: { timeoutMs: number }): Promise<BleConnection>;
	/** Power-cycle the local radio stack; used between attempts for flaky straps. */
	resetAdapter?(): Promise<void>;
}
