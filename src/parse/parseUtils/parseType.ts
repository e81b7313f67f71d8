import type { FirstOctet, MessageType } from '../../types';
import type { ByteCursor } from '../../utils/ByteCursor';
import { PduError } from '../../utils/errors';
import { SMS_DELIVER, SMS_STATUS_REPORT, SMS_SUBMIT } from '../../utils/PDUType';

function toMessageType(messageTypeIndicator: number, offset: number): MessageType {
	switch (messageTypeIndicator) {
		case SMS_DELIVER:
			return 'deliver';
		case SMS_SUBMIT:
			return 'submit';
		case SMS_STATUS_REPORT:
			return 'status-report';
		default:
			throw new PduError('UnsupportedMessageType', 'Unknown SMS type!', { offset, value: messageTypeIndicator });
	}
}

export default function parseType(cursor: ByteCursor): FirstOctet {
	const offset = cursor.offset;
	const byte = cursor.readByte();
	const messageType = toMessageType(3 & byte, offset);
	const isSubmit = messageType === 'submit';

	return {
		value: byte,
		messageType,
		messageTypeIndicator: 3 & byte,
		replyPath: !!(1 & (byte >> 7)),
		userDataHeader: !!(1 & (byte >> 6)),
		statusReport: !!(1 & (byte >> 5)),
		validityPeriodFormat: isSubmit ? 3 & (byte >> 3) : 0,
		rejectDuplicates: isSubmit && !!(1 & (byte >> 2)),
		// TP-MMS is inverted: 0 means more messages are waiting
		moreMessagesToSend: !isSubmit && !(1 & (byte >> 2)),
		loopPrevention: !isSubmit && !!(1 & (byte >> 3))
	};
}
