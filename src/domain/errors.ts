export type DomainErrorCode =
  | 'WAREHOUSE_NOT_FOUND'
  | 'PRODUCT_VARIANT_NOT_FOUND'
  | 'PRODUCT_FAMILY_NOT_FOUND'
  | 'CATEGORY_NOT_FOUND'
  | 'SUPPLIER_NOT_FOUND'
  | 'PROCUREMENT_NOT_FOUND'
  | 'TRANSFER_NOT_FOUND'
  | 'SALE_NOT_FOUND'
  | 'INVALID_INPUT'
  | 'INVALID_STATUS_TRANSITION'
  | 'UNIT_CONFIGURATION'
  | 'INSUFFICIENT_STOCK'
  | 'SAME_WAREHOUSE'
  | 'CONFLICT';

export class DomainError extends Error {
  readonly code: DomainErrorCode;

  readonly statusCode: number;

  readonly details?: Record<string, string>;

  constructor(code: DomainErrorCode, statusCode: number, message: string, details?: Record<string, string>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

export type NotFoundCode = Extract<DomainErrorCode, `${string}_NOT_FOUND`>;

export class NotFoundError extends DomainError {
  constructor(code: NotFoundCode, message: string) {
    super(code, 404, message);
  }
}

export class InvalidInputError extends DomainError {
  constructor(message: string, details?: Record<string, string>) {
    super('INVALID_INPUT', 400, message, details);
  }
}

export class InvalidTransitionError extends DomainError {
  constructor(from: string, to: string) {
    super('INVALID_STATUS_TRANSITION', 409, `Cannot move from ${from} to ${to}`, { from, to });
  }
}

/** The catalog does not identify exactly one base unit for a family. */
export class UnitConfigurationError extends DomainError {
  constructor(familyId: number, baseUnitCount: number) {
    super(
      'UNIT_CONFIGURATION',
      422,
      baseUnitCount === 0
        ? `Product family ${familyId} has no base unit variant`
        : `Product family ${familyId} has ${baseUnitCount} base unit variants`,
      { familyId: String(familyId), baseUnitCount: String(baseUnitCount) },
    );
  }
}

export class InsufficientStockError extends DomainError {
  readonly warehouseId: number;

  readonly variantId: number;

  constructor(warehouseId: number, variantId: number) {
    super('INSUFFICIENT_STOCK', 409, `Insufficient stock for variant ${variantId} in warehouse ${warehouseId}`, {
      warehouseId: String(warehouseId),
      variantId: String(variantId),
    });
    this.warehouseId = warehouseId;
    this.variantId = variantId;
  }
}

export class SameWarehouseError extends DomainError {
  constructor() {
    super('SAME_WAREHOUSE', 400, 'Source and destination warehouse cannot be the same');
  }
}

export class ConflictError extends DomainError {
  constructor(message: string) {
    super('CONFLICT', 409, message);
  }
}

export const warehouseNotFound = (id: number) => new NotFoundError('WAREHOUSE_NOT_FOUND', `Warehouse ${id} not found`);

export const variantNotFound = (id: number) =>
  new NotFoundError('PRODUCT_VARIANT_NOT_FOUND', `Product variant ${id} not found`);

export const familyNotFound = (id: number) =>
  new NotFoundError('PRODUCT_FAMILY_NOT_FOUND', `Product family ${id} not found`);

export const categoryNotFound = (id: number) => new NotFoundError('CATEGORY_NOT_FOUND', `Category ${id} not found`);

export const supplierNotFound = (id: number) => new NotFoundError('SUPPLIER_NOT_FOUND', `Supplier ${id} not found`);
