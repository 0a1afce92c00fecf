/**
 * Page-level form interception.
 *
 * When the connectivity service does not report the server as reachable,
 * submits of the business forms are captured into the local queue instead of
 * going to the server. Online submits are left alone.
 */

import type { ConnectivityManager } from "../offline/connectivity-manager.ts";
import { describeError, FormValidationError } from "../offline/errors.ts";
import { generateLocalId, type OperationSink } from "../offline/operation-queue.ts";
import type { OperationKind } from "../types.ts";
import { renderPendingSaleRow, renderPendingStockRow } from "../ui/pending-rows.ts";
import type { StatusSurface } from "../ui/status-surface.ts";
import { collectDraft, type OperationDraft } from "./form-data.ts";

export interface FormRoute {
  /** Page path the form lives on. */
  path: string;
  kind: OperationKind;
  selector: string;
}

export const DEFAULT_FORM_ROUTES: readonly FormRoute[] = [
  { path: "/vente_stock", kind: "sale", selector: 'form[action*="vente_stock"]' },
  { path: "/achat_stock", kind: "stockPurchase", selector: 'form[action*="achat_stock"]' },
  {
    path: "/enregistrer_sortie",
    kind: "cashOutflow",
    selector: 'form[action*="enregistrer_sortie"]',
  },
];

export type CaptureResult =
  | { status: "queued"; id: number; localId: string; pending: number | null }
  | { status: "invalid"; message: string }
  | { status: "error"; message: string };

export interface FormInterceptorOptions {
  sink: OperationSink;
  connectivity: Pick<ConnectivityManager, "isOnline">;
  surface: Pick<StatusSurface, "showSavedOffline" | "flash">;
  document?: Document;
  routes?: readonly FormRoute[];
}

const SUBMIT_SELECTOR = 'button[type="submit"], input[type="submit"]';

export function findFormRoute(
  pathname: string,
  routes: readonly FormRoute[] = DEFAULT_FORM_ROUTES,
): FormRoute | null {
  return routes.find((route) => route.path === pathname) ?? null;
}

export class FormInterceptor {
  private sink: OperationSink;
  private connectivity: Pick<ConnectivityManager, "isOnline">;
  private surface: Pick<StatusSurface, "showSavedOffline" | "flash">;
  private doc: Document;
  private routes: readonly FormRoute[];
  private detachers: Set<() => void> = new Set();
  private captures: Set<Promise<CaptureResult>> = new Set();

  constructor(options: FormInterceptorOptions) {
    this.sink = options.sink;
    this.connectivity = options.connectivity;
    this.surface = options.surface;
    this.doc = options.document ?? document;
    this.routes = options.routes ?? DEFAULT_FORM_ROUTES;
  }

  /**
   * Intercept the form configured for the given page path, if any.
   */
  attachForPath(pathname: string): FormRoute | null {
    const route = findFormRoute(pathname, this.routes);
    if (!route) return null;

    const form = this.doc.querySelector(route.selector);
    if (!(form instanceof HTMLFormElement)) return null;

    this.attach(form, route.kind);
    return route;
  }

  attach(form: HTMLFormElement, kind: OperationKind): () => void {
    rememberSubmitLabels(form);

    const onSubmit = (event: Event): void => {
      if (this.connectivity.isOnline()) return;
      event.preventDefault();

      const capture = this.capture(form, kind);
      this.captures.add(capture);
      void capture.finally(() => this.captures.delete(capture));
    };

    form.addEventListener("submit", onSubmit);
    const detach = () => {
      form.removeEventListener("submit", onSubmit);
      this.detachers.delete(detach);
    };
    this.detachers.add(detach);
    return detach;
  }

  /**
   * Validate the form and queue it. Never rejects; the outcome is shown on
   * the status surface and returned.
   */
  async capture(form: HTMLFormElement, kind: OperationKind): Promise<CaptureResult> {
    let draft: OperationDraft;
    try {
      draft = collectDraft(kind, form);
    } catch (error) {
      const message = describeError(error, "Invalid form");
      this.surface.flash(message, error instanceof FormValidationError ? "warning" : "danger");
      return { status: "invalid", message };
    }

    const localId = generateLocalId();
    let id: number;
    try {
      id = await this.sink.enqueue(draft.kind, draft.payload, { localId });
    } catch (error) {
      const message = describeError(error, "Unknown error");
      this.surface.flash(`Could not save offline: ${message}`, "danger");
      restoreSubmitButtons(form);
      return { status: "error", message };
    }

    // Queued from here on, whatever happens to the display below.
    form.reset();
    restoreSubmitButtons(form);

    let pending: number | null = null;
    try {
      pending = await this.sink.count("pending");
    } catch (error) {
      console.error("[stockline] Failed to count pending operations:", error);
    }
    this.surface.showSavedOffline(pending);

    try {
      this.renderRow(draft, localId);
    } catch (error) {
      console.error("[stockline] Failed to render pending row:", error);
    }

    return { status: "queued", id, localId, pending };
  }

  private renderRow(draft: OperationDraft, localId: string): void {
    switch (draft.kind) {
      case "sale":
        renderPendingSaleRow(this.doc, localId, draft.payload);
        break;
      case "stockPurchase":
        renderPendingStockRow(this.doc, localId, draft.payload);
        break;
      case "cashOutflow":
        // No history table on the outflow page.
        break;
    }
  }

  /**
   * Resolve once every capture started by a submit has settled.
   */
  async settled(): Promise<void> {
    await Promise.all(this.captures);
  }

  destroy(): void {
    for (const detach of Array.from(this.detachers)) {
      detach();
    }
  }
}

// Page scripts swap the submit label for a spinner; keep the original.
function rememberSubmitLabels(form: HTMLFormElement): void {
  for (const button of Array.from(form.querySelectorAll<HTMLElement>(SUBMIT_SELECTOR))) {
    if (button.dataset.origText === undefined) {
      button.dataset.origText =
        button instanceof HTMLInputElement ? button.value : button.innerHTML;
    }
  }
}

function restoreSubmitButtons(form: HTMLFormElement): void {
  for (const button of Array.from(form.querySelectorAll<HTMLElement>(SUBMIT_SELECTOR))) {
    if (button instanceof HTMLButtonElement) {
      button.disabled = false;
      if (button.dataset.origText !== undefined) button.innerHTML = button.dataset.origText;
    } else if (button instanceof HTMLInputElement) {
      button.disabled = false;
      if (button.dataset.origText !== undefined) button.value = button.dataset.origText;
    }
  }
}
