export const MAX_PROTOCOL_SEQUENCE = 9999;

const PROTOCOL_PATTERN = /^([A-Z]{2,10})-(\d{8})-(\d{4})$/;

export interface ParsedProtocol {
  prefix: string;
  day: string; // YYYYMMDD
  sequence: number;
}

/**
 * Calendar day (UTC) used to scope the protocol counter, as `YYYYMMDD`.
 */
export function formatProtocolDay(date: Date): string {
  return date.toISOString().slice(0, 10).replace(/-/g, '');
}

export function formatProtocol(
  prefix: string,
  day: string,
  sequence: number,
): string {
  return `${prefix}-${day}-${String(sequence).padStart(4, '0')}`;
}

/**
 * Parse a protocol string. Returns null for anything that does not follow
 * `PREFIX-YYYYMMDD-NNNN` or carries sequence 0000.
 */
export function parseProtocol(value: string): ParsedProtocol | null {
  const match = PROTOCOL_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  const [, prefix, day, sequence] = match;
  const parsedSequence = parseInt(sequence, 10);
  if (parsedSequence < 1) {
    return null;
  }
  return { prefix, day, sequence: parsedSequence };
}
