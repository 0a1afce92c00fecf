import { z } from "zod";

// Idempotency token generated by the client for each queued operation
const localIdSchema = z.string().min(1).max(100);

const moneySchema = z.number().finite().nonnegative();

export const saleItemSchema = z.object({
  network: z.string().min(1).max(50),
  quantity: z.number().int().positive(),
  unitPrice: moneySchema.nullable(),
});

export const saleSchema = z.object({
  localId: localIdSchema,
  clientChoice: z.enum(["existing", "new"]),
  existingClientId: z.string().max(100).nullable(),
  newClientName: z.string().max(200).nullable(),
  // Display label kept by the client for its pending rows
  displayClient: z.string().max(200).optional(),
  cashPaid: moneySchema,
  items: z.array(saleItemSchema).min(1).max(100),
});

export type SaleRequest = z.infer<typeof saleSchema>;

export const stockPurchaseSchema = z.object({
  localId: localIdSchema,
  network: z.string().min(1).max(50),
  amountPurchased: z.number().int().min(1),
  buyingPriceChoice: z.string().max(50),
  customBuyingPrice: moneySchema.nullable(),
  sellingPriceChoice: z.string().max(50),
  customSellingPrice: moneySchema.nullable(),
});

export type StockPurchaseRequest = z.infer<typeof stockPurchaseSchema>;

export const cashOutflowSchema = z.object({
  localId: localIdSchema,
  amount: z.number().finite().positive(),
  category: z.string().max(100),
  description: z.string().max(1000),
});

export type CashOutflowRequest = z.infer<typeof cashOutflowSchema>;
