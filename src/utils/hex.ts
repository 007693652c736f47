/**
 * Hex rendering shared by the formatter defaults and synthesized names.
 */

export function hex(value: number): string {
  return value < 0 ? `-0x${(-value).toString(16)}` : `0x${value.toString(16)}`;
}

/** MASM radix notation: `0FFh`, `10h`. */
export function masmHex(value: number): string {
  if (value < 0) return `-${masmHex(-value)}`;
  const digits = value.toString(16).toUpperCase();
  return /^[A-F]/.test(digits) ? `0${digits}h` : `${digits}h`;
}

/** `-0x10` becomes `-0x10`, `0x10` becomes `+0x10`. */
export function signedHex(value: number, render: (v: number) => string = hex): string {
  return value < 0 ? render(value) : `+${render(value)}`;
}

/**
 * Literals past 2^53 are read as 64-bit two's complement, so the masks
 * decoders print (`0xfffffffffffffff0`) come back as small negatives.
 */
export function parseNumber(text: string): number | null {
  const m = text.trim().match(/^(-)?(?:0x([0-9a-fA-F]+)|(\d+))$/);
  if (!m) return null;
  let value = m[2] !== undefined ? parseInt(m[2], 16) : parseInt(m[3], 10);
  if (!Number.isSafeInteger(value)) {
    value = Number(BigInt.asIntN(64, BigInt(m[2] !== undefined ? `0x${m[2]}` : m[3])));
  }
  return m[1] ? -value : value;
}
