import { formatTicketNumber, generateTicketNumber, parseTicketNumber, raffleCode } from './ticket-number';

describe('ticket numbers', () => {
  it('should prefix the sequence with the raffle code', () => {
    expect(generateTicketNumber('raffle-0001', 1)).toBe('RAFFLE00-000001');
    expect(generateTicketNumber('raffle-0001', 1234567)).toBe('RAFFLE00-1234567');
  });

  it('should fall back to a generic code when the id has no alphanumerics', () => {
    expect(raffleCode('--')).toBe('RAFFLE');
    expect(raffleCode('ab')).toBe('AB');
  });

  it('should refuse a sequence below one', () => {
    expect(() => generateTicketNumber('raffle-0001', 0)).toThrow('Ticket sequence must be a positive integer, got 0');
  });

  it('should normalize a parsed ticket number', () => {
    expect(parseTicketNumber('  raffle00-000007 ')).toEqual({ ok: true, value: 'RAFFLE00-000007' });
  });

  it('should reject empty, oversized and malformed input', () => {
    const messages = ['   ', 'A'.repeat(51), 'RAFFLE00_01'].map((value) => {
      const result = parseTicketNumber(value);
      return result.ok ? null : result.error.message;
    });

    expect(messages).toEqual([
      'Ticket number cannot be empty',
      'Ticket number cannot exceed 50 characters',
      'Ticket number may only contain letters, digits and dashes',
    ]);
  });

  it('should display with a leading hash', () => {
    expect(formatTicketNumber('RAFFLE00-000001')).toBe('#RAFFLE00-000001');
  });
});
