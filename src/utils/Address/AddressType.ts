import type { NumberingPlan, TypeOfNumber } from '../../types';

/*
 * Type-of-Address octet, 3GPP TS 23.040 section 9.1.2.5
 */

const TYPES: readonly TypeOfNumber[] = [
	'unknown',
	'international',
	'national',
	'network-specific',
	'subscriber',
	'alphanumeric',
	'abbreviated',
	'reserved'
];

const PLANS: Record<number, NumberingPlan> = {
	0x00: 'unknown',
	0x01: 'isdn',
	0x03: 'data',
	0x04: 'telex',
	0x05: 'service-centre-specific-1',
	0x06: 'service-centre-specific-2',
	0x08: 'national',
	0x09: 'private',
	0x0a: 'ermes'
};

export interface TypeOfAddress {
	type: TypeOfNumber;
	plan: NumberingPlan;
}

export function parseTypeOfAddress(value: number): TypeOfAddress {
	return {
		type: TYPES[0x07 & (value >> 4)],
		plan: PLANS[0x0f & value] ?? 'reserved'
	};
}
