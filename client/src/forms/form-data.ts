/**
 * Read and validate the business forms locally, before anything is queued.
 * Each collector throws FormValidationError with a message fit for the user.
 */

import { FormValidationError } from "../offline/errors.ts";
import type {
  CashOutflowPayload,
  OperationKind,
  OperationPayloads,
  SaleItem,
  SalePayload,
  StockPurchasePayload,
} from "../types.ts";

function field(data: FormData, name: string): string | null {
  const value = data.get(name);
  return typeof value === "string" ? value : null;
}

function optionalNumber(data: FormData, name: string): number | null {
  const raw = field(data, name);
  if (!raw) return null;
  const value = Number.parseFloat(raw);
  return Number.isNaN(value) ? null : value;
}

function selectedOptionText(form: HTMLFormElement, name: string): string {
  const select = form.querySelector(`[name="${name}"]`);
  if (select instanceof HTMLSelectElement && select.selectedIndex >= 0) {
    return select.options[select.selectedIndex]?.text ?? "";
  }
  return "";
}

/**
 * Line items are numbered `sale_items-0-*`, `sale_items-1-*`, ...; rows with
 * a missing or non-positive quantity are skipped.
 */
export function collectSale(form: HTMLFormElement): SalePayload {
  const data = new FormData(form);
  const items: SaleItem[] = [];

  for (let i = 0; ; i++) {
    const network = field(data, `sale_items-${i}-network`);
    if (network === null) break;

    const quantity = Number.parseInt(field(data, `sale_items-${i}-quantity`) ?? "", 10);
    if (Number.isNaN(quantity) || quantity <= 0) continue;

    items.push({
      network,
      quantity,
      unitPrice: optionalNumber(data, `sale_items-${i}-price_per_unit_applied`),
    });
  }

  if (items.length === 0) {
    throw new FormValidationError("Add at least one item.");
  }

  const cashPaid = optionalNumber(data, "cash_paid") ?? 0;
  if (cashPaid < 0) {
    throw new FormValidationError("Cash paid cannot be negative.");
  }

  const clientChoice = field(data, "client_choice") === "new" ? "new" : "existing";
  const newClientName = field(data, "new_client_name") || null;
  const displayClient =
    clientChoice === "new"
      ? newClientName ?? "New client"
      : selectedOptionText(form, "existing_client_id") || "Client";

  return {
    clientChoice,
    existingClientId: field(data, "existing_client_id") || null,
    newClientName,
    displayClient,
    cashPaid,
    items,
  };
}

export function collectStockPurchase(form: HTMLFormElement): StockPurchasePayload {
  const data = new FormData(form);
  const network = field(data, "network");
  const amountPurchased = Number.parseInt(field(data, "amount_purchased") ?? "", 10);

  if (!network || Number.isNaN(amountPurchased) || amountPurchased < 1) {
    throw new FormValidationError("Please fill in the required fields.");
  }

  return {
    network,
    amountPurchased,
    buyingPriceChoice: field(data, "buying_price_choice") ?? "",
    customBuyingPrice: optionalNumber(data, "custom_buying_price"),
    sellingPriceChoice: field(data, "intended_selling_price_choice") ?? "",
    customSellingPrice: optionalNumber(data, "custom_intended_selling_price"),
  };
}

export function collectCashOutflow(form: HTMLFormElement): CashOutflowPayload {
  const data = new FormData(form);
  const amount = optionalNumber(data, "amount");

  if (amount === null || amount <= 0) {
    throw new FormValidationError("Invalid amount.");
  }

  return {
    amount,
    category: field(data, "category") ?? "",
    description: field(data, "description") ?? "",
  };
}

/**
 * A validated form, tagged with the kind of operation it becomes.
 */
export type OperationDraft = {
  [K in OperationKind]: { kind: K; payload: OperationPayloads[K] };
}[OperationKind];

export function collectDraft(kind: OperationKind, form: HTMLFormElement): OperationDraft {
  switch (kind) {
    case "sale":
      return { kind, payload: collectSale(form) };
    case "stockPurchase":
      return { kind, payload: collectStockPurchase(form) };
    case "cashOutflow":
      return { kind, payload: collectCashOutflow(form) };
  }
}
