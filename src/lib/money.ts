/** Round to the minor currency unit (cents). */
export function roundMoney(amount: number): number {
  return Math.round((amount + Math.sign(amount) * Number.EPSILON) * 100) / 100;
}

/**
 * Level payment that amortizes `balance` over `periods` at `periodicRate`:
 *   A = B · r / (1 − (1 + r)^−n)
 * A zero rate spreads the balance evenly.
 */
export function annuityPayment(balance: number, periodicRate: number, periods: number): number {
  if (periods <= 0) return 0;
  if (periodicRate === 0) return balance / periods;
  return (balance * periodicRate) / (1 - Math.pow(1 + periodicRate, -periods));
}
