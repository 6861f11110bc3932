import { formatPackagingCount, parseDecimalLike } from '../../utils/numberParsing';
import { UnitCode, type InferenceResult } from './types';

/**
 * Packaging rules, tried in order against the upper-cased label. First match wins.
 *
 * The two fixed weights are the only patterns trusted outright. Counts read from
 * "N SACHETS" / "N MAINS" and any other "<number>KG" token are suggestions a
 * reviewer must confirm: for "N MAINS" in particular, N is frequently not the
 * real number of units per carton.
 */
type PackagingRule = {
  pattern: RegExp;
  infer: (match: RegExpMatchArray) => InferenceResult | null;
};

const fixedWeight = (value: number, display: string): PackagingRule['infer'] => () => ({
  packagingCount: value,
  unit: UnitCode.WEIGHT,
  rule: `${display} → ${UnitCode.WEIGHT}`,
  isCertain: true,
});

const countToVerify = (word: string): PackagingRule['infer'] => (match) => {
  const n = parseInt(match[1], 10);
  return {
    packagingCount: n,
    unit: UnitCode.COUNT,
    rule: `${n} ${word} → ${UnitCode.COUNT} (verify)`,
    isCertain: false,
  };
};

export const PACKAGING_RULES: readonly PackagingRule[] = [
  { pattern: /18[,.]5\s*KG/, infer: fixedWeight(18.5, '18,5KG') },
  { pattern: /6[,.]5\s*KG/, infer: fixedWeight(6.5, '6,5KG') },
  // SACHETS before MAINS: labels carrying both report the sachet count
  { pattern: /(\d+)\s*SACHETS/, infer: countToVerify('SACHETS') },
  { pattern: /(\d+)\s*MAINS/, infer: countToVerify('MAINS') },
  {
    pattern: /(\d+[,.]?\d*)\s*KG/,
    infer: (match) => {
      const value = parseDecimalLike(match[1]);
      if (value === null) return null;
      return {
        packagingCount: value,
        unit: UnitCode.WEIGHT,
        rule: `${formatPackagingCount(value)} KG → ${UnitCode.WEIGHT} (uncertain)`,
        isCertain: false,
      };
    },
  },
];

export const NO_MATCH_RULE = 'no pattern matched';

export function inferPackaging(label: string | null | undefined): InferenceResult {
  const text = String(label ?? '').trim().toUpperCase();

  for (const rule of PACKAGING_RULES) {
    const match = text.match(rule.pattern);
    if (!match) continue;
    const result = rule.infer(match);
    if (result) return result;
  }

  return { packagingCount: null, unit: '', rule: NO_MATCH_RULE, isCertain: false };
}
