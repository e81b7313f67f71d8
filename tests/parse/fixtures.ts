/*
 * Hand-built PDUs. Numbers are fictional 555 numbers.
 */

export const SMSC = '07915155000010F0'; // +15550000010
export const ADDRESS = '0B915155214365F7'; // +15551234567
export const SCTS = '42305141035480'; // 2024-03-15 14:30:45 +02:00

export const DELIVER_GSM7 = SMSC + '04' + ADDRESS + '00' + '00' + SCTS + '07' + 'D4F29C9E769F01'; // "Testing"

export const SUBMIT_NO_VP = '00' + '01' + '2A' + ADDRESS + '00' + '00' + '05' + 'C8329BFD06'; // "Hello"

export const DELIVER_UCS2_TRUNCATED = '00' + '04' + ADDRESS + '00' + '08' + SCTS + '0A' + '03A903BC03AD03B303';

export const DELIVER_GSM7_UDH = '00' + '44' + ADDRESS + '00' + '00' + SCTS + '0C' + '050003CC0201906536FB0D';

export const DELIVER_UCS2_UDH = '00' + '44' + ADDRESS + '00' + '08' + SCTS + '0B' + '06080412340302' + '00480069';

export const STATUS_REPORT = '00' + '06' + '2A' + ADDRESS + SCTS + '42305141235480' + '00';
