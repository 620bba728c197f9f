import {
  Collection,
  InventoryLevel,
  InventoryTransfer,
  Procurement,
  ProductVariant,
  Sale,
} from '../types/entities';
import { calculateTotalCostCents, fromCents, fromMilli } from './fixedPoint';

// Response bodies carry decimals; the services work in thousandths and cents.

export const presentSale = (sale: Sale) => ({
  id: sale.id,
  warehouseId: sale.warehouseId,
  customerName: sale.customerName,
  subtotalAmount: fromCents(sale.subtotalCents),
  taxAmount: fromCents(sale.taxCents),
  discountAmount: fromCents(sale.discountCents),
  totalAmount: fromCents(sale.totalCents),
  paymentMethod: sale.paymentMethod,
  processedByUserId: sale.processedByUserId,
  createdAt: sale.createdAt.toISOString(),
  items: sale.items.map((item) => ({
    id: item.id,
    variantId: item.variantId,
    quantity: fromMilli(item.quantityMilli),
    unitPrice: fromCents(item.unitPriceCents),
    lineTotal: fromCents(item.lineTotalCents),
  })),
});

export const presentProcurement = (procurement: Procurement) => ({
  id: procurement.id,
  supplierId: procurement.supplierId,
  warehouseId: procurement.warehouseId,
  orderedByUserId: procurement.orderedByUserId,
  createdAt: procurement.createdAt.toISOString(),
  expectedDelivery: procurement.expectedDelivery,
  status: procurement.status,
  totalCost: fromCents(calculateTotalCostCents(procurement.items)),
  items: procurement.items.map((item) => ({
    id: item.id,
    variantId: item.variantId,
    quantityOrdered: fromMilli(item.quantityOrderedMilli),
    quantityReceived: fromMilli(item.quantityReceivedMilli),
    unitCost: fromCents(item.unitCostCents),
  })),
});

export const presentCollection = (collection: Collection) => ({
  id: collection.id,
  variantId: collection.variantId,
  supplierId: collection.supplierId,
  agentId: collection.agentId,
  warehouseId: collection.warehouseId,
  weight: fromMilli(collection.weightMilli),
  collectedAt: collection.collectedAt.toISOString(),
  notes: collection.notes,
});

export const presentLevel = (level: InventoryLevel) => ({
  warehouseId: level.warehouseId,
  variantId: level.variantId,
  quantity: fromMilli(level.quantityMilli),
  batchNumber: level.batchNumber,
  expiryDate: level.expiryDate,
});

export const presentTransfer = (transfer: InventoryTransfer) => ({
  id: transfer.id,
  sourceWarehouseId: transfer.sourceWarehouseId,
  destinationWarehouseId: transfer.destinationWarehouseId,
  authorizedByUserId: transfer.authorizedByUserId,
  transferredAt: transfer.transferredAt.toISOString(),
  status: transfer.status,
  items: transfer.items.map((item) => ({
    id: item.id,
    variantId: item.variantId,
    quantity: fromMilli(item.quantityMilli),
  })),
});

export const presentVariant = (variant: ProductVariant) => ({
  id: variant.id,
  familyId: variant.familyId,
  name: variant.name,
  sku: variant.sku,
  barcode: variant.barcode,
  unit: variant.unit,
  costPrice: fromCents(variant.costPriceCents),
  sellingPrice: fromCents(variant.sellingPriceCents),
  isManufactured: variant.isManufactured,
  conversionFactor: fromMilli(variant.conversionFactorMilli),
});
