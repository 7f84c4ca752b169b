export const EXCLUDED_CURRENCIES: readonly string[] = ['TRY', 'PLN', 'THB', 'MXN'];

export const CURRENCY_CODE_PATTERN = /^[A-Z]{3}$/;

export type RateTable = Record<string, number>;

export function isExcludedCurrency(currency: string): boolean {
  return EXCLUDED_CURRENCIES.includes(currency.toUpperCase());
}

/**
 * Copy of `rates` without the excluded currencies. The input is left untouched.
 */
export function withoutExcludedCurrencies(rates: RateTable): RateTable {
  return Object.fromEntries(
    Object.entries(rates).filter(([currency]) => !isExcludedCurrency(currency))
  );
}

/**
 * Canonical text for a positive decimal amount: "0100.50" -> "100.5", "100.00" -> "100".
 * The value never passes through a float, so no precision is lost.
 */
export function normalizeAmount(amount: string): string {
  const [integerPart, fractionPart = ''] = amount.trim().split('.');
  const integer = integerPart.replace(/^0+(?=\d)/, '') || '0';
  const fraction = fractionPart.replace(/0+$/, '');
  return fraction ? `${integer}.${fraction}` : integer;
}
