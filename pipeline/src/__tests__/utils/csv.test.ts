import { parseCsvLine, resolveHeader, toRecord } from '../../utils/csv';

describe('CSV parsing', () => {
  describe('parseCsvLine', () => {
    it('should split a plain line on the delimiter', () => {
      expect(parseCsvLine('C1,2024-01-19,140')).toEqual(['C1', '2024-01-19', '140']);
    });

    it('should keep delimiters and escaped quotes inside quoted cells', () => {
      expect(parseCsvLine('C1,"AAPL Jan 19, 2024 140 Call","say ""hi"""')).toEqual([
        'C1',
        'AAPL Jan 19, 2024 140 Call',
        'say "hi"',
      ]);
    });

    it('should keep empty cells', () => {
      expect(parseCsvLine('C1,,')).toEqual(['C1', '', '']);
    });

    it('should honour a custom delimiter', () => {
      expect(parseCsvLine('C1;1,5;x', ';')).toEqual(['C1', '1,5', 'x']);
    });

    it('should treat a quote inside an unquoted cell as a literal character', () => {
      expect(parseCsvLine('C1,AAPL 5" note,140')).toEqual(['C1', 'AAPL 5" note', '140']);
      expect(parseCsvLine('C1,"quoted"tail,140')).toEqual(['C1', 'quotedtail', '140']);
    });

    it('should return null for an unterminated quoted cell', () => {
      expect(parseCsvLine('C1,"open')).toBeNull();
    });
  });

  describe('resolveHeader', () => {
    it('should drop a blank leading index column', () => {
      expect(resolveHeader(['', 'id', 'description'])).toEqual({
        columns: ['id', 'description'],
        skip: 1,
        width: 3,
      });
    });

    it('should drop an "Unnamed: 0" leading index column', () => {
      expect(resolveHeader(['Unnamed: 0', 'contract_id'])).toEqual({
        columns: ['contract_id'],
        skip: 1,
        width: 2,
      });
    });

    it('should keep headers without an index column unchanged', () => {
      expect(resolveHeader([' id ', 'description'])).toEqual({
        columns: ['id', 'description'],
        skip: 0,
        width: 2,
      });
    });
  });

  describe('toRecord', () => {
    it('should map cells onto columns, trimming and nulling blanks', () => {
      const header = resolveHeader(['', 'id', 'description']);
      expect(toRecord(header, ['0', ' C1 ', ''])).toEqual({ id: 'C1', description: null });
    });
  });
});
