export {
	BiometricDeviceMonitor,
	type MonitorConfig,
	type MonitorEvent,
	type MonitorEventHandler,
} from './BiometricDeviceMonitor';
export {
	HEART_RATE_SERVICE_UUID,
	HEART_RATE_MEASUREMENT_UUID,
	type BleTransport,
	type BleConnection,
	type NotificationSubscription,
	type ScannedPeripheral,
} from './bleTransport';
export { HEART_RATE_DEVICE_PATTERNS, FLAKY_DEVICE_PATTERNS, matchesAnyPattern } from './deviceCatalog';
