import type { FirstOctet, ValidityPeriod } from '../../types';
import type { ByteCursor } from '../../utils/ByteCursor';
import { Helper } from '../../utils/Helper';
import { VPF_ABSOLUTE, VPF_ENHANCED, VPF_NONE, VPF_RELATIVE } from '../../utils/PDUType';
import parseSCTS from './parseSCTS';

/**
 * TP-VP relative format to seconds, 3GPP TS 23.040 section 9.2.3.12.1
 */
export function relativeValiditySeconds(byte: number) {
	if (byte <= 143) {
		return (byte + 1) * (5 * 60);
	}

	if (byte <= 167) {
		return 12 * 3600 + (byte - 143) * (30 * 60);
	}

	if (byte <= 196) {
		return (byte - 166) * (3600 * 24);
	}

	return (byte - 192) * (3600 * 24 * 7);
}

export default function parseVP(type: FirstOctet, cursor: ByteCursor): ValidityPeriod | null {
	switch (type.validityPeriodFormat) {
		case VPF_NONE:
			return null;

		case VPF_RELATIVE: {
			const value = cursor.readByte();
			return { format: 'relative', value, seconds: relativeValiditySeconds(value) };
		}

		case VPF_ABSOLUTE:
			return { format: 'absolute', timestamp: parseSCTS(cursor) };

		case VPF_ENHANCED:
			// The enhanced format is kept as is
			return { format: 'enhanced', raw: Helper.bytesToHex(cursor.readBytes(7)) };

		default:
			throw new Error(`sms-pdu-decoder: Unknown validity period format ${type.validityPeriodFormat}!`);
	}
}
