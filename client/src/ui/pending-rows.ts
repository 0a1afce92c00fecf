/**
 * Rows shown in the history tables for operations captured offline, so the
 * user sees what was saved before the server has it.
 */

import type {
  OperationKind,
  QueuedOperation,
  SalePayload,
  StockPurchasePayload,
} from "../types.ts";

export const USER_META_NAME = "stockline-user";
export const SALES_TBODY_ID = "sales-history-tbody";
export const STOCK_TBODY_ID = "stock-purchase-tbody";

const PENDING_ROW_STYLE = "background:#fffbea;border-left:3px solid #fb6340;";

/**
 * Display name of the signed-in user, injected by the page layout.
 */
export function currentUserName(doc: Document = document): string {
  const meta = doc.querySelector(`meta[name="${USER_META_NAME}"]`);
  return meta?.getAttribute("content") || "—";
}

export function saleTotals(payload: SalePayload): { total: number; debt: number } {
  const total = payload.items.reduce(
    (sum, item) => sum + item.quantity * (item.unitPrice ?? 0),
    0,
  );
  return { total, debt: Math.max(0, total - payload.cashPaid) };
}

function formatTimestamp(now: Date): string {
  return `${now.toLocaleDateString()} ${now.toLocaleTimeString([], {
    hour: "2-digit",
    minute: "2-digit",
  })}`;
}

function hasPendingRow(tbody: HTMLElement, localId: string): boolean {
  for (const row of Array.from(tbody.querySelectorAll("tr[data-pending-id]"))) {
    if (row.getAttribute("data-pending-id") === localId) return true;
  }
  return false;
}

function buildRow(doc: Document, localId: string, cells: (string | HTMLElement)[]): HTMLTableRowElement {
  const row = doc.createElement("tr");
  row.setAttribute("data-pending-id", localId);
  row.style.cssText = PENDING_ROW_STYLE;

  for (const content of cells) {
    const cell = doc.createElement("td");
    if (typeof content === "string") {
      cell.textContent = content;
    } else {
      cell.appendChild(content);
    }
    row.appendChild(cell);
  }
  return row;
}

function badge(doc: Document, text: string, className: string): HTMLElement {
  const span = doc.createElement("span");
  span.className = `badge ${className}`;
  span.textContent = text;
  return span;
}

function offlineLabel(doc: Document): HTMLElement {
  const small = doc.createElement("small");
  small.className = "text-warning font-weight-bold";
  small.textContent = "Offline";
  return small;
}

// Pending rows go above the first server-rendered row.
function insertRow(tbody: HTMLElement, row: HTMLTableRowElement): void {
  const first = tbody.querySelector("tr:not([data-pending-id])");
  if (first) {
    tbody.insertBefore(row, first);
  } else {
    tbody.appendChild(row);
  }
}

export function renderPendingSaleRow(
  doc: Document,
  localId: string,
  payload: SalePayload,
  now: Date = new Date(),
): HTMLTableRowElement | null {
  const tbody = doc.getElementById(SALES_TBODY_ID);
  if (!tbody || hasPendingRow(tbody, localId)) return null;

  const summary = payload.items
    .map((item) => `${item.quantity}×${item.network.toUpperCase()}`)
    .join(", ");
  const { total, debt } = saleTotals(payload);

  const row = buildRow(doc, localId, [
    badge(doc, "⏳", "badge-warning"),
    payload.displayClient || "Client",
    currentUserName(doc),
    summary,
    total.toFixed(2),
    payload.cashPaid.toFixed(2),
    debt > 0 ? badge(doc, debt.toFixed(2), "badge-danger") : "0.00",
    formatTimestamp(now),
    offlineLabel(doc),
  ]);
  insertRow(tbody, row);
  return row;
}

export function renderPendingStockRow(
  doc: Document,
  localId: string,
  payload: StockPurchasePayload,
  now: Date = new Date(),
): HTMLTableRowElement | null {
  const tbody = doc.getElementById(STOCK_TBODY_ID);
  if (!tbody || hasPendingRow(tbody, localId)) return null;

  const row = buildRow(doc, localId, [
    badge(doc, "⏳", "badge-warning"),
    payload.network.toUpperCase(),
    `${payload.amountPurchased} units`,
    "—",
    currentUserName(doc),
    formatTimestamp(now),
    offlineLabel(doc),
  ]);
  insertRow(tbody, row);
  return row;
}

/**
 * Render a row for each queued operation of the given kind.
 * Returns the number of rows added.
 */
export function renderPendingRows(
  doc: Document,
  operations: QueuedOperation[],
  kind: OperationKind,
): number {
  let rendered = 0;
  for (const operation of operations) {
    if (operation.kind !== kind) continue;

    let row: HTMLTableRowElement | null = null;
    if (operation.kind === "sale") {
      row = renderPendingSaleRow(doc, operation.localId, operation.payload);
    } else if (operation.kind === "stockPurchase") {
      row = renderPendingStockRow(doc, operation.localId, operation.payload);
    }
    if (row) rendered++;
  }
  return rendered;
}
