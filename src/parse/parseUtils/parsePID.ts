import type { ProtocolIdentifier } from '../../types';
import type { ByteCursor } from '../../utils/ByteCursor';

export default function parsePID(cursor: ByteCursor): ProtocolIdentifier {
	const byte = cursor.readByte();

	return {
		value: byte,
		pid: 0x03 & (byte >> 6),
		indicates: 0x01 & (byte >> 5),
		type: 0x1f & byte
	};
}
