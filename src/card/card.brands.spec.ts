import { CARD_COMPANIES, CARD_TYPE, cardTypeCode, hasText } from './card.brands';

describe('card brands', () => {
  it('knows every brand that has a type code', () => {
    for (const brand of Object.keys(CARD_TYPE)) {
      expect(CARD_COMPANIES.has(brand)).toBe(true);
    }
  });

  it('recognizes brands that have no type code', () => {
    expect(CARD_COMPANIES.has('maestro')).toBe(true);
    expect(cardTypeCode('maestro')).toBeUndefined();
  });

  it('does not look up blank brands', () => {
    expect(cardTypeCode(undefined)).toBeUndefined();
    expect(cardTypeCode(null)).toBeUndefined();
    expect(cardTypeCode(' ')).toBeUndefined();
  });

  it('maps american express', () => {
    expect(cardTypeCode('american_express')).toBe('AX');
  });

  it.each([
    [undefined, false],
    [null, false],
    ['', false],
    ['\t ', false],
    ['visa', true],
  ])('hasText(%p) is %p', (value, expected) => {
    expect(hasText(value)).toBe(expected);
  });
});
