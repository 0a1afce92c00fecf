/**
 * Stockline offline client for the server-rendered pages.
 *
 * This library provides:
 * - A durable IndexedDB queue for sales, stock purchases and cash outflows
 * - Connectivity classification that tells a dead network from a login bounce
 * - Replay of queued operations with idempotency tokens
 * - Form capture, pending rows and a status toast for the page
 *
 * The service worker lives under the `./sw` entry.
 */

export {
  backgroundSyncFor,
  OfflineClient,
  type OfflineClientOptions,
  type WorkerContainer,
  type WorkerRegistrationOptions,
} from "./offline-client.ts";

export * from "./offline/index.ts";

export {
  DEFAULT_FORM_ROUTES,
  FormInterceptor,
  type CaptureResult,
  type FormInterceptorOptions,
  type FormRoute,
} from "./forms/form-interceptor.ts";
export { collectCashOutflow, collectSale, collectStockPurchase } from "./forms/form-data.ts";

export {
  renderPendingRows,
  renderPendingSaleRow,
  renderPendingStockRow,
} from "./ui/pending-rows.ts";
export { StatusSurface, type StatusSurfaceOptions, type ToastVariant } from "./ui/status-surface.ts";

// Types
export type {
  CashOutflowPayload,
  EndpointMap,
  OperationKind,
  OperationStatus,
  QueuedOperation,
  SaleItem,
  SalePayload,
  StockPurchasePayload,
} from "./types.ts";
export { DEFAULT_AUTH_PATH_PREFIX, DEFAULT_ENDPOINTS } from "./types.ts";
