import { normalizeName, looseNameKey, normalizeWeightClass } from '@/lib/roster/names';

describe('normalizeName', () => {
  it('should strip accents, apostrophes, periods and suffixes', () => {
    expect(normalizeName("José O'Neil Jr.")).toBe('jose oneil');
    expect(normalizeName('jose oneil')).toBe('jose oneil');
  });

  it('should turn other punctuation into single spaces', () => {
    expect(normalizeName('  Smith-Jones, Bo ')).toBe('smith jones bo');
  });

  it('should drop roman numeral suffixes', () => {
    expect(normalizeName('John Smith III')).toBe('john smith');
    expect(normalizeName('John Smith II Jr')).toBe('john smith');
  });

  it('should keep a lone token even when it looks like a suffix', () => {
    expect(normalizeName('Jr')).toBe('jr');
  });

  it('should return an empty key for blank input', () => {
    expect(normalizeName(' .. ')).toBe('');
  });
});

describe('looseNameKey', () => {
  it('should reduce a name to first initial and last name', () => {
    expect(looseNameKey('Michael Jones')).toBe('m jones');
    expect(looseNameKey('Mike Jones')).toBe('m jones');
  });

  it('should handle single and empty names', () => {
    expect(looseNameKey('Cher')).toBe('cher');
    expect(looseNameKey('')).toBe('');
  });
});

describe('normalizeWeightClass', () => {
  it('should keep only the digits of numeric weights', () => {
    expect(normalizeWeightClass('125 lbs')).toBe('125');
    expect(normalizeWeightClass(' 133 ')).toBe('133');
    expect(normalizeWeightClass(149)).toBe('149');
    expect(normalizeWeightClass('0157')).toBe('157');
  });

  it('should map heavyweight spellings to 285', () => {
    expect(normalizeWeightClass('HWT')).toBe('285');
    expect(normalizeWeightClass('heavyweight')).toBe('285');
    expect(normalizeWeightClass('Hvy.')).toBe('285');
  });

  it('should return text without digits as written', () => {
    expect(normalizeWeightClass(' Open ')).toBe('Open');
  });
});
