import { Decimal } from 'decimal.js';

// Balances are u128; keep enough significant digits to scale any of them exactly.
Decimal.set({
  maxE: 9e15,
  minE: -9e15,
  modulo: Decimal.ROUND_HALF_UP,
  precision: 80,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -40,
  toExpPos: 80,
});

/**
 * Convert an integer amount in smallest units to a Decimal in whole units.
 */
export function scaleAmount(raw: bigint, decimals: number): Decimal {
  return new Decimal(raw.toString()).dividedBy(new Decimal(10).pow(decimals));
}

/**
 * Check if a Decimal value can be converted to number without precision loss
 */
export function canSafelyConvertToNumber(decimal: Decimal): boolean {
  const asNumber = decimal.toNumber();
  if (!Number.isFinite(asNumber)) {
    return false;
  }
  return decimal.equals(new Decimal(asNumber));
}

/**
 * Convert Decimal to number, reporting precision loss through the callback
 */
export function safeDecimalToNumber(
  decimal: Decimal,
  options?: {
    allowPrecisionLoss?: boolean | undefined;
    warningCallback?: ((message: string) => void) | undefined;
  }
): number {
  const { allowPrecisionLoss = false, warningCallback } = options || {};

  if (!canSafelyConvertToNumber(decimal)) {
    const message = `Precision loss detected converting Decimal to number: ${decimal.toString()} -> ${decimal.toNumber()}`;

    if (warningCallback) {
      warningCallback(message);
    }

    if (!allowPrecisionLoss) {
      throw new Error(message);
    }
  }

  return decimal.toNumber();
}
