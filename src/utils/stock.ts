export type LedgerAdjustment = {
  variantId: number;
  deltaMilli: number;
};

export type StockRequirement = {
  variantId: number;
  requiredMilli: number;
};

/**
 * Folds adjustments that touch the same variant into one delta, keeping the
 * order in which each variant first appeared.
 */
export const combineAdjustments = (entries: LedgerAdjustment[]): LedgerAdjustment[] => {
  const totals = entries.reduce<Map<number, number>>((accumulator, entry) => {
    accumulator.set(entry.variantId, (accumulator.get(entry.variantId) ?? 0) + entry.deltaMilli);
    return accumulator;
  }, new Map());

  return Array.from(totals, ([variantId, deltaMilli]) => ({ variantId, deltaMilli }));
};

export const calculateOnHand = (startingMilli: number, entries: LedgerAdjustment[]): number =>
  entries.reduce((total, entry) => total + entry.deltaMilli, startingMilli);

export const toRequirements = (entries: LedgerAdjustment[]): StockRequirement[] =>
  combineAdjustments(entries).map((entry) => ({ variantId: entry.variantId, requiredMilli: -entry.deltaMilli }));

export const findShortfall = (
  requirements: StockRequirement[],
  onHand: ReadonlyMap<number, number>,
): StockRequirement | undefined =>
  requirements.find((requirement) => (onHand.get(requirement.variantId) ?? 0) < requirement.requiredMilli);
