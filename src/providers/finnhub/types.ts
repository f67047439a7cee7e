/**
 * Finnhub API response types
 */

/** `/quote`; Finnhub answers an unknown symbol with zeros. */
export interface FinnhubQuote {
  c: number | null; // Current price
  d: number | null; // Change
  dp: number | null; // Percent change
  h: number | null; // High of the day
  l: number | null; // Low of the day
  o: number | null; // Open of the day
  pc: number | null; // Previous close
  t: number | null; // Timestamp (unix seconds)
}
