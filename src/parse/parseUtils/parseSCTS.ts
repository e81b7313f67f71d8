import moment from 'moment';
import type { Timestamp } from '../../types';
import type { ByteCursor } from '../../utils/ByteCursor';
import { decodeSemiOctets } from '../../utils/SemiOctet';

type TimestampFields = Omit<Timestamp, 'isoString'>;

/**
 * Builds the ISO 8601 string in the sender's own UTC offset, or `null` when
 * the fields do not form a valid date (e.g. month 13).
 */
export function toIsoString(fields: TimestampFields) {
	const time = moment.utc([
		fields.year > 70 ? 1900 + fields.year : 2000 + fields.year,
		fields.month - 1,
		fields.day,
		fields.hour,
		fields.minute,
		fields.second
	]);

	if (!time.isValid()) {
		return null;
	}

	return time.utcOffset(fields.timezoneQuarterHours * 15, true).format('YYYY-MM-DDTHH:mm:ssZ');
}

/**
 * Service Centre Time Stamp, 3GPP TS 23.040 section 9.2.3.11.
 * Also used for absolute validity periods and status report times.
 */
export default function parseSCTS(cursor: ByteCursor): Timestamp {
	const offset = cursor.offset;
	const bytes = cursor.readBytes(7);

	const field = (index: number) => Number(decodeSemiOctets(bytes.subarray(index, index + 1), 2, { offset: offset + index }));

	// Bit 3 of the time zone octet is the sign, the rest are semi-octets
	const zone = bytes[6];
	const quarters = Number(decodeSemiOctets(Uint8Array.of(zone & 0xf7), 2, { offset: offset + 6 }));

	const fields: TimestampFields = {
		year: field(0),
		month: field(1),
		day: field(2),
		hour: field(3),
		minute: field(4),
		second: field(5),
		timezoneQuarterHours: zone & 0x08 ? -quarters : quarters
	};

	return { ...fields, isoString: toIsoString(fields) };
}
