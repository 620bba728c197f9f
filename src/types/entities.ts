// Domain records as the services hand them around. Quantity fields ending in
// `Milli` are integer thousandths; fields ending in `Cents` are integer cents.

export const WarehouseTypeValues = ['store', 'factory', 'distribution_center'] as const;
export type WarehouseType = (typeof WarehouseTypeValues)[number];

export const PaymentMethodValues = ['cash', 'card', 'upi', 'credit', 'other'] as const;
export type PaymentMethod = (typeof PaymentMethodValues)[number];

export const ProcurementStatusValues = ['pending', 'approved', 'ordered', 'partial', 'received', 'cancelled'] as const;
export type ProcurementStatus = (typeof ProcurementStatusValues)[number];

export const TransferStatusValues = ['pending', 'in_transit', 'completed', 'cancelled'] as const;
export type TransferStatus = (typeof TransferStatusValues)[number];

export type Warehouse = {
  id: number;
  name: string;
  type: WarehouseType;
  address: string | null;
};

export type Supplier = {
  id: number;
  name: string;
  phone: string | null;
  location: string | null;
};

export type Category = {
  id: number;
  name: string;
};

export type ProductFamily = {
  id: number;
  categoryId: number;
  name: string;
  description: string | null;
};

export type ProductVariant = {
  id: number;
  familyId: number;
  name: string;
  sku: string;
  barcode: string | null;
  unit: string;
  costPriceCents: number;
  sellingPriceCents: number;
  isManufactured: boolean;
  conversionFactorMilli: number;
};

export type InventoryLevel = {
  id: number;
  warehouseId: number;
  variantId: number;
  quantityMilli: number;
  batchNumber: string | null;
  expiryDate: string | null;
};

export type SaleItem = {
  id: number;
  saleId: number;
  variantId: number;
  quantityMilli: number;
  unitPriceCents: number;
  lineTotalCents: number;
};

export type Sale = {
  id: number;
  warehouseId: number;
  customerName: string | null;
  subtotalCents: number;
  taxCents: number;
  discountCents: number;
  totalCents: number;
  paymentMethod: PaymentMethod;
  processedByUserId: number;
  createdAt: Date;
  items: SaleItem[];
};

export type ProcurementItem = {
  id: number;
  procurementId: number;
  variantId: number;
  quantityOrderedMilli: number;
  quantityReceivedMilli: number;
  unitCostCents: number;
};

export type Procurement = {
  id: number;
  supplierId: number;
  warehouseId: number;
  orderedByUserId: number;
  createdAt: Date;
  expectedDelivery: string | null;
  status: ProcurementStatus;
  items: ProcurementItem[];
};

export type Collection = {
  id: number;
  variantId: number;
  supplierId: number;
  agentId: number;
  warehouseId: number;
  weightMilli: number;
  collectedAt: Date;
  notes: string | null;
};

export type InventoryTransferItem = {
  id: number;
  transferId: number;
  variantId: number;
  quantityMilli: number;
};

export type InventoryTransfer = {
  id: number;
  sourceWarehouseId: number;
  destinationWarehouseId: number;
  authorizedByUserId: number;
  transferredAt: Date;
  status: TransferStatus;
  items: InventoryTransferItem[];
};

export type Page<T> = {
  items: T[];
  total: number;
};
