/**
 * Amount in integer cents. Balances are kept in cents to avoid floating-point
 * drift; conversion to a decimal string happens only for display.
 */
export class Money {
  private constructor(public readonly cents: number) {}

  static fromCents(cents: number): Money {
    if (!Number.isSafeInteger(cents)) {
      throw new RangeError(`Amount must be a whole number of cents, got ${cents}`);
    }
    return new Money(cents);
  }

  /**
   * Two-decimal representation, e.g. `1000.00` or `-12.05`.
   */
  toDecimalString(): string {
    const sign = this.cents < 0 ? '-' : '';
    const abs = Math.abs(this.cents);
    const units = Math.floor(abs / 100);
    const fraction = String(abs % 100).padStart(2, '0');
    return `${sign}${units}.${fraction}`;
  }
}
