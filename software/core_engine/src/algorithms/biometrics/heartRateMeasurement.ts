// BLE Heart Rate Measurement (characteristic 0x2A37) parsing.
//
// Layout: flags(1) | HR uint8 or uint16 LE | [energy expended uint16 LE] | [RR uint16 LE]*
// RR values are in 1/1024 s.

import { ParseError } from '../../errors';

export const HEART_RATE_FLAGS = {
	HR_UINT16: 0x01,
	SENSOR_CONTACT_DETECTED: 0x02,
	SENSOR_CONTACT_SUPPORTED: 0x04,
	ENERGY_EXPENDED_PRESENT: 0x08,
	RR_PRESENT: 0x10,
} as const;

export type SensorContact = 'unsupported' | 'not_detected' | 'detected';

export type HeartRateMeasurement = {
	heartRateBpm: number;
	rrIntervalsMs: number[];
	sensorContact: SensorContact;
	energyExpendedKj: number | null;
};

/** Convert a raw 1/1024 s RR value to milliseconds. */
export function rrUnitsToMs(raw: number): number {
	return (raw * 1000) / 1024;
}

/**
 * Parse a heart-rate measurement notification.
 *
 * @throws ParseError when the payload is shorter than the fields its flags announce
 */
export function parseHeartRateMeasurement(payload: Uint8Array): HeartRateMeasurement {
	if (payload.length < 2) {
		throw new ParseError(`Heart rate payload too short (${payload.length} bytes)`, payload);
	}

	const flags = payload[0];
	let offset = 1;

	let heartRateBpm: number;
	if (flags & HEART_RATE_FLAGS.HR_UINT16) {
		if (payload.length < 3) {
			throw new ParseError('16-bit heart rate flagged but payload has 2 bytes', payload);
		}
		heartRateBpm = payload[1] | (payload[2] << 8);
		offset = 3;
	} else {
		heartRateBpm = payload[1];
		offset = 2;
	}

	let energyExpendedKj: number | null = null;
	if (flags & HEART_RATE_FLAGS.ENERGY_EXPENDED_PRESENT) {
		if (payload.length < offset + 2) {
			throw new ParseError('Energy expended flagged but field is truncated', payload);
		}
		energyExpendedKj = payload[offset] | (payload[offset + 1] << 8);
		offset += 2;
	}

	const rrIntervalsMs: number[] = [];
	if (flags & HEART_RATE_FLAGS.RR_PRESENT) {
		// trailing odd byte is ignored
		for (; offset + 1 < payload.length; offset += 2) {
			rrIntervalsMs.push(rrUnitsToMs(payload[offset] | (payload[offset + 1] << 8)));
		}
	}

	let sensorContact: SensorContact = 'unsupported';
	if (flags & HEART_RATE_FLAGS.SENSOR_CONTACT_SUPPORTED) {
		sensorContact = flags & HEART_RATE_FLAGS.SENSOR_CONTACT_DETECTED ? 'detected' : 'not_detected';
	}

	return { heartRateBpm, rrIntervalsMs, sensorContact, energyExpendedKj };
}
