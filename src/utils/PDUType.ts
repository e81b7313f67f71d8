/*
 * TP-MTI and TP-VPF values, 3GPP TS 23.040 sections 9.2.3.1 and 9.2.3.3
 */

export const SMS_DELIVER = 0x00;
export const SMS_SUBMIT = 0x01;
export const SMS_STATUS_REPORT = 0x02;

export const VPF_NONE = 0x00;
export const VPF_ENHANCED = 0x01;
export const VPF_RELATIVE = 0x02;
export const VPF_ABSOLUTE = 0x03;
