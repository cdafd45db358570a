export type PriceFilters = {
  /** The query with every recognised price phrase removed. */
  query: string;
  minPrice?: number;
  maxPrice?: number;
};

// A plain amount: "1,299.99", "1299", "15.5".
const NUM = String.raw`(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?`;
const WS = String.raw`[ \t]*`;
const AMOUNT = String.raw`(?:\$${WS})?(${NUM})(?:${WS}(?:\$|usd|dollars?))?`;

export const CHEAP_MAX_PRICE = 15;
export const PREMIUM_MIN_PRICE = 100;

const RANGE_PATTERNS = [
  String.raw`(?:between|from)${WS}${AMOUNT}${WS}(?:and|to|-)${WS}${AMOUNT}`,
  String.raw`${AMOUNT}${WS}-${WS}${AMOUNT}`,
];
const MAX_PATTERNS = [
  String.raw`(?:under|below|at\s*most)${WS}${AMOUNT}`,
  String.raw`(?:<=|<)${WS}${AMOUNT}`,
  String.raw`(?:up\s*to)${WS}${AMOUNT}`,
];
const MIN_PATTERNS = [
  String.raw`(?:over|above|at\s*least)${WS}${AMOUNT}`,
  String.raw`(?:>=|>)${WS}${AMOUNT}`,
];
const APPROX_PATTERN = String.raw`(around|about|approx(?:\.|imately)?|exactly)${WS}${AMOUNT}`;

const CHEAP_WORDS = /\b(?:cheap|inexpensive|budget)\b/g;
const PREMIUM_WORDS = /\b(?:expensive|premium|high-end)\b/g;

function toNumber(s: string): number {
  return Number(s.replace(/,/g, ''));
}

/**
 * Pulls price constraints such as "under $10", "between 5 and 15", "20-30 dollars",
 * "around 50" or "premium" out of a free-text query.
 *
 * Repeated constraints only ever tighten the range. If nothing but price words is left,
 * the original query is kept so there is still something to embed.
 */
export function extractPriceFilters(q: string): PriceFilters {
  let s = ` ${q.toLowerCase().trim()} `;
  const bounds: { min?: number; max?: number } = {};

  const raiseMin = (v: number) => {
    bounds.min = bounds.min === undefined ? v : Math.max(bounds.min, v);
  };
  const lowerMax = (v: number) => {
    bounds.max = bounds.max === undefined ? v : Math.min(bounds.max, v);
  };
  // Matches are taken from the text as it was before this pattern ran.
  const consume = (pattern: string, onMatch: (m: RegExpMatchArray) => void) => {
    for (const m of s.matchAll(new RegExp(pattern, 'g'))) {
      onMatch(m);
      s = s.replaceAll(m[0], ' ');
    }
  };

  for (const pattern of RANGE_PATTERNS) {
    consume(pattern, (m) => {
      const a = toNumber(m[1]);
      const b = toNumber(m[2]);
      raiseMin(Math.min(a, b));
      lowerMax(Math.max(a, b));
    });
  }
  for (const pattern of MAX_PATTERNS) {
    consume(pattern, (m) => lowerMax(toNumber(m[1])));
  }
  for (const pattern of MIN_PATTERNS) {
    consume(pattern, (m) => raiseMin(toNumber(m[1])));
  }
  consume(APPROX_PATTERN, (m) => {
    const v = toNumber(m[2]);
    if (m[1] === 'exactly') {
      raiseMin(v);
      lowerMax(v);
    } else {
      raiseMin(0.9 * v);
      lowerMax(1.1 * v);
    }
  });

  if (s.match(CHEAP_WORDS)) {
    bounds.max ??= CHEAP_MAX_PRICE;
    s = s.replace(CHEAP_WORDS, ' ');
  }
  if (s.match(PREMIUM_WORDS)) {
    bounds.min ??= PREMIUM_MIN_PRICE;
    s = s.replace(PREMIUM_WORDS, ' ');
  }

  const cleaned = s.split(/\s+/).filter(Boolean).join(' ');
  return {
    query: cleaned || q,
    ...(bounds.min !== undefined && { minPrice: bounds.min }),
    ...(bounds.max !== undefined && { maxPrice: bounds.max }),
  };
}
