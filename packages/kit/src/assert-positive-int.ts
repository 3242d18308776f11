/** Throws unless value is a positive safe integer (budgets, counts). */
export function assertPositiveInt(value: number, label: string): number {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new Error(`${label}: expected positive integer, got ${value}`);
  }
  return value;
}
