import { clean } from '../utils/text';

export interface ParsedAmount {
  amountRaw: string;
  amountNum: number | null;
}

/**
 * Keep the display string and, when the residue is a number, its magnitude.
 * "SGD 1,234.50" -> 1234.5, "1.2.3" -> null
 */
export function parseAmount(s: string | null | undefined): ParsedAmount {
  const amountRaw = clean(s);

  // Only digits, dot and minus survive (drops currency codes, commas, spaces)
  const residue = amountRaw.replace(/[^\d.-]/g, '');
  if (!residue) {
    return { amountRaw, amountNum: null };
  }

  const amountNum = Number(residue);
  return { amountRaw, amountNum: Number.isFinite(amountNum) ? amountNum : null };
}
