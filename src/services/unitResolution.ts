import { UnitConfigurationError } from '../domain/errors';
import { ProductVariant } from '../types/entities';
import { multiplyMilli, QUANTITY_SCALE } from '../utils/fixedPoint';

export type UnitVariant = Pick<ProductVariant, 'id' | 'familyId' | 'conversionFactorMilli'>;

export type ResolvedQuantity = {
  baseVariantId: number;
  baseQuantityMilli: number;
};

// A factor of zero predates the conversion column and is read as 1.
export const isBaseUnit = (variant: Pick<ProductVariant, 'conversionFactorMilli'>): boolean =>
  variant.conversionFactorMilli === 0 || variant.conversionFactorMilli === QUANTITY_SCALE;

export const findBaseUnits = <T extends UnitVariant>(familyId: number, variants: readonly T[]): T[] =>
  variants
    .filter((candidate) => candidate.familyId === familyId && isBaseUnit(candidate))
    .sort((left, right) => left.id - right.id);

/**
 * Maps a quantity of `variant` onto the ledger row that holds its family's
 * stock. Non-base variants require exactly one base-unit sibling.
 */
export const resolveBaseQuantity = (
  variant: UnitVariant,
  requestedMilli: number,
  siblings: readonly UnitVariant[],
): ResolvedQuantity => {
  if (isBaseUnit(variant)) {
    return { baseVariantId: variant.id, baseQuantityMilli: requestedMilli };
  }

  const baseUnits = findBaseUnits(variant.familyId, siblings);
  const [baseUnit] = baseUnits;

  if (baseUnits.length !== 1 || !baseUnit) {
    throw new UnitConfigurationError(variant.familyId, baseUnits.length);
  }

  return {
    baseVariantId: baseUnit.id,
    baseQuantityMilli: multiplyMilli(requestedMilli, variant.conversionFactorMilli),
  };
};
