/**
 * Shared types for the Stockline offline client.
 */

export type OperationKind = "sale" | "stockPurchase" | "cashOutflow";

export type OperationStatus = "pending" | "synced" | "failed";

export interface SaleItem {
  network: string;
  quantity: number;
  unitPrice: number | null;
}

export interface SalePayload {
  clientChoice: "existing" | "new";
  existingClientId: string | null;
  newClientName: string | null;
  // Shown in pending rows only; the server resolves the client itself.
  displayClient: string;
  cashPaid: number;
  items: SaleItem[];
}

export interface StockPurchasePayload {
  network: string;
  amountPurchased: number;
  buyingPriceChoice: string;
  customBuyingPrice: number | null;
  sellingPriceChoice: string;
  customSellingPrice: number | null;
}

export interface CashOutflowPayload {
  amount: number;
  category: string;
  description: string;
}

export interface OperationPayloads {
  sale: SalePayload;
  stockPurchase: StockPurchasePayload;
  cashOutflow: CashOutflowPayload;
}

interface QueuedOperationBase<K extends OperationKind> {
  id: number;
  localId: string;
  kind: K;
  payload: OperationPayloads[K];
  status: OperationStatus;
  queuedAt: string;
  updatedAt: string;
}

/**
 * A business operation captured locally, waiting for the server.
 */
export type QueuedOperation =
  | QueuedOperationBase<"sale">
  | QueuedOperationBase<"stockPurchase">
  | QueuedOperationBase<"cashOutflow">;

/**
 * Submission endpoint per operation kind.
 */
export type EndpointMap = Record<OperationKind, string>;

export const DEFAULT_ENDPOINTS: EndpointMap = {
  sale: "/api/v1/sales",
  stockPurchase: "/api/v1/stock-purchases",
  cashOutflow: "/api/v1/cash-outflows",
};

export const DEFAULT_AUTH_PATH_PREFIX = "/auth/login";
