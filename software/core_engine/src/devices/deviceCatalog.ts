// Heart-rate device name patterns (case-insensitive substring match).

export const HEART_RATE_DEVICE_PATTERNS: readonly string[] = [
	'Polar', 'H808S', 'H10', 'H9', 'OH1',
	'Garmin', 'HRM-Dual', 'HRM-Pro', 'HRM-Run',
	'Wahoo', 'TICKR', 'TICKR X',
	'Suunto', 'Smart Sensor',
	'Zephyr', 'HxM',
	'RHYTHM', 'Scosche',
	'HRM', 'Heart Rate', // generic
];

// Chest straps that drop connections during setup and need an adapter reset between attempts.
export const FLAKY_DEVICE_PATTERNS: readonly string[] = ['H808S'];

export function matchesAnyPattern(name: string | null | undefined, patterns: readonly string[]): boolean {
	if (!name) return false;
	const lower = name.toLowerCase();
	return patterns.some((pattern) => lower.includes(pattern.toLowerCase()));
}
