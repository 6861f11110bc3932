import { describe, expect, it } from 'vitest';
import { inferPackaging, NO_MATCH_RULE } from '../../../src/services/packaging';

describe('inferPackaging', () => {
  it('BANANE 18,5KG CARTON -> 18.5 KGM (certain)', () => {
    expect(inferPackaging('BANANE 18,5KG CARTON')).toEqual({
      packagingCount: 18.5,
      unit: 'KGM',
      rule: '18,5KG → KGM',
      isCertain: true,
    });
  });

  it.each(['18.5KG', '18,5 KG', 'banane 18.5  kg', '  Banane cat1 18,5Kg  '])(
    'reads %s as the 18.5 kg carton',
    (label) => {
      const r = inferPackaging(label);
      expect(r.packagingCount).toBe(18.5);
      expect(r.unit).toBe('KGM');
      expect(r.isCertain).toBe(true);
    }
  );

  it('6,5 KG -> 6.5 KGM (certain)', () => {
    expect(inferPackaging('POMME GALA 6,5 KG')).toEqual({
      packagingCount: 6.5,
      unit: 'KGM',
      rule: '6,5KG → KGM',
      isCertain: true,
    });
  });

  it('12 SACHETS -> 12 PCE, flagged for review', () => {
    expect(inferPackaging('12 SACHETS FRUITS SECS')).toEqual({
      packagingCount: 12,
      unit: 'PCE',
      rule: '12 SACHETS → PCE (verify)',
      isCertain: false,
    });
  });

  it('N MAINS is always uncertain, even glued to the number', () => {
    expect(inferPackaging('BANANE 5MAINS')).toEqual({
      packagingCount: 5,
      unit: 'PCE',
      rule: '5 MAINS → PCE (verify)',
      isCertain: false,
    });
  });

  it('SACHETS wins over MAINS when a label has both', () => {
    expect(inferPackaging('3 MAINS 10 SACHETS').packagingCount).toBe(10);
  });

  it('fixed weights win over counts', () => {
    const r = inferPackaging('18,5KG 12 SACHETS');
    expect(r.packagingCount).toBe(18.5);
    expect(r.isCertain).toBe(true);
  });

  it('falls back to any <number>KG token, uncertain', () => {
    expect(inferPackaging('CAISSE 22KG')).toEqual({
      packagingCount: 22,
      unit: 'KGM',
      rule: '22 KG → KGM (uncertain)',
      isCertain: false,
    });
    expect(inferPackaging('CAISSE 12,75 KG').packagingCount).toBe(12.75);
  });

  it('returns no packaging when nothing matches', () => {
    const expected = { packagingCount: null, unit: '', rule: NO_MATCH_RULE, isCertain: false };
    expect(inferPackaging('MANGUE AVION')).toEqual(expected);
    expect(inferPackaging('')).toEqual(expected);
    expect(inferPackaging(null)).toEqual(expected);
  });
});
