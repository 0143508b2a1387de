import { isContractType, normalizeContractType } from '../../types/index';

describe('normalizeContractType', () => {
  it('should map call and put in any casing', () => {
    expect(normalizeContractType('call')).toBe('Call');
    expect(normalizeContractType(' PUT ')).toBe('Put');
    expect(normalizeContractType('Call')).toBe('Call');
  });

  it('should pass unknown types through trimmed', () => {
    expect(normalizeContractType(' Straddle ')).toBe('Straddle');
  });

  it('should return null for empty values', () => {
    expect(normalizeContractType(null)).toBeNull();
    expect(normalizeContractType('  ')).toBeNull();
  });
});

describe('isContractType', () => {
  it('should accept only the canonical spellings', () => {
    expect(isContractType('Call')).toBe(true);
    expect(isContractType('Put')).toBe(true);
    expect(isContractType('call')).toBe(false);
    expect(isContractType(null)).toBe(false);
  });
});
