import { ConsoleRecord, formatLocation } from '../../../src/domain/console/ConsoleRecord';

describe('ConsoleRecord', () => {
  const timestamp = new Date('2024-05-01T10:00:00.000Z');

  describe('toJSON', () => {
    it('should serialize an error with its location', () => {
      const record = ConsoleRecord.create({
        kind: 'error',
        message: 'Failed to load resource: the server responded with a status of 404',
        timestamp,
        location: 'https://example.com/app.js:12:5',
      });

      expect(record.toJSON()).toEqual({
        type: 'error',
        message: 'Failed to load resource: the server responded with a status of 404',
        timestamp: '2024-05-01T10:00:00.000Z',
        location: 'https://example.com/app.js:12:5',
      });
    });

    it('should omit location when there is none', () => {
      const record = ConsoleRecord.create({
        kind: 'page_error',
        message: 'ReferenceError: foo is not defined',
        timestamp,
      });

      const json = record.toJSON();

      expect(json).toEqual({
        type: 'page_error',
        message: 'ReferenceError: foo is not defined',
        timestamp: '2024-05-01T10:00:00.000Z',
      });
      expect('location' in json).toBe(false);
    });
  });

  describe('immutability', () => {
    it('should not be affected by changes to the input date', () => {
      const input = new Date(timestamp.getTime());
      const record = ConsoleRecord.create({ kind: 'error', message: 'x', timestamp: input });

      input.setUTCFullYear(2000);

      expect(record.timestamp.toISOString()).toBe('2024-05-01T10:00:00.000Z');
    });

    it('should not be affected by changes to a returned date', () => {
      const record = ConsoleRecord.create({ kind: 'error', message: 'x', timestamp });

      record.timestamp.setUTCFullYear(2000);

      expect(record.timestamp.toISOString()).toBe('2024-05-01T10:00:00.000Z');
    });
  });
});

describe('formatLocation', () => {
  it('should format url, line and column', () => {
    expect(
      formatLocation({ url: 'https://example.com/app.js', lineNumber: 12, columnNumber: 5 })
    ).toBe('https://example.com/app.js:12:5');
  });

  it('should return undefined without a url', () => {
    expect(formatLocation({ url: '', lineNumber: 0, columnNumber: 0 })).toBeUndefined();
    expect(formatLocation(undefined)).toBeUndefined();
  });
});
