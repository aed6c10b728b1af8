import {
  formatProtocol,
  formatProtocolDay,
  parseProtocol,
} from './protocol.util';

describe('protocol.util', () => {
  describe('formatProtocolDay', () => {
    it('should use the UTC calendar day', () => {
      expect(formatProtocolDay(new Date('2026-03-05T23:59:59.999Z'))).toBe(
        '20260305',
      );
      expect(formatProtocolDay(new Date('2026-03-06T00:00:00.000Z'))).toBe(
        '20260306',
      );
    });
  });

  describe('formatProtocol', () => {
    it('should zero-pad the sequence to four digits', () => {
      expect(formatProtocol('SOL', '20260305', 7)).toBe('SOL-20260305-0007');
      expect(formatProtocol('SOL', '20260305', 9999)).toBe('SOL-20260305-9999');
    });
  });

  describe('parseProtocol', () => {
    it('should split a well-formed protocol', () => {
      expect(parseProtocol('SOL-20260305-0042')).toEqual({
        prefix: 'SOL',
        day: '20260305',
        sequence: 42,
      });
    });

    it('should ignore surrounding whitespace', () => {
      expect(parseProtocol('  ACC-20260305-0001 ')).toEqual({
        prefix: 'ACC',
        day: '20260305',
        sequence: 1,
      });
    });

    it.each([
      ['SOL-20260305-0000'],
      ['sol-20260305-0001'],
      ['SOL-2026035-0001'],
      ['SOL-20260305-00001'],
      ['20260305-0001'],
      ['42'],
    ])('should reject %s', (value) => {
      expect(parseProtocol(value)).toBeNull();
    });
  });
});
