/**
 * Quantities, weights and conversion factors are held as integer thousandths,
 * money as integer cents. Conversion happens only at the HTTP boundary.
 */
export const QUANTITY_SCALE = 1000;
export const MONEY_SCALE = 100;

export const toMilli = (value: number): number => Math.round(value * QUANTITY_SCALE);

export const fromMilli = (milli: number): number => milli / QUANTITY_SCALE;

export const toCents = (amount: number): number => Math.round(amount * MONEY_SCALE);

export const fromCents = (cents: number): number => cents / MONEY_SCALE;

// Exact product of two scaled integers, rounded half away from zero back onto
// the milli scale. Throws when the result leaves the safe integer range.
const scaleProduct = (left: number, right: number): number => {
  const scale = BigInt(QUANTITY_SCALE);
  const half = scale / 2n;
  const product = BigInt(left) * BigInt(right);
  const rounded = product >= 0n ? (product + half) / scale : -((-product + half) / scale);
  const result = Number(rounded);
  if (!Number.isSafeInteger(result)) {
    throw new RangeError(`Scaled product of ${left} and ${right} is out of range`);
  }
  return result;
};

/** Product of two milli values, rounded back onto the milli scale. */
export const multiplyMilli = (leftMilli: number, rightMilli: number): number => scaleProduct(leftMilli, rightMilli);

export const lineTotalCents = (quantityMilli: number, unitPriceCents: number): number =>
  scaleProduct(quantityMilli, unitPriceCents);

/** Ordered cost of procurement lines in cents. */
export const calculateTotalCostCents = (
  items: Array<{ quantityOrderedMilli: number; unitCostCents: number }>,
): number => items.reduce((total, item) => total + lineTotalCents(item.quantityOrderedMilli, item.unitCostCents), 0);

// pg hands BIGINT and NUMERIC columns back as strings; SQLite hands back numbers.
export const readInteger = (value: unknown): number => {
  if (typeof value === 'number') {
    return value;
  }

  if (typeof value === 'bigint') {
    return Number(value);
  }

  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (Number.isInteger(parsed)) {
      return parsed;
    }
  }

  throw new TypeError(`Expected an integer column value, received ${String(value)}`);
};

export const readOptionalInteger = (value: unknown): number | null =>
  value === null || value === undefined ? null : readInteger(value);
