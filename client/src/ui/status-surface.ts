/**
 * Non-blocking toast reflecting queue depth and sync progress, plus the
 * inline flash messages used for form errors.
 *
 * Purely a projection of state handed in by callers.
 */

export type ToastVariant = "offline" | "saved" | "syncing" | "synced" | "error";

export type FlashLevel = "info" | "success" | "warning" | "danger";

export const TOAST_DURATIONS_MS = {
  offline: 5500,
  saved: 3500,
  synced: 4000,
} as const;

const FLASH_DURATION_MS = 6000;
const FADE_MS = 330;

const TOAST_BACKGROUNDS: Record<ToastVariant, string> = {
  offline: "#f5365c",
  saved: "#fb6340",
  syncing: "#2dce89",
  synced: "#2dce89",
  error: "#fb6340",
};

export interface StatusSurfaceOptions {
  document?: Document;
  /** Element the toast is appended to. Defaults to `document.body`. */
  mount?: HTMLElement;
  /** Container flash messages are prepended to. */
  flashContainerSelector?: string;
}

export class StatusSurface {
  private doc: Document;
  private mount: HTMLElement | null;
  private flashContainerSelector: string;
  private toast: HTMLElement | null = null;
  private dismissTimer: ReturnType<typeof setTimeout> | null = null;
  private fadeTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(options: StatusSurfaceOptions = {}) {
    this.doc = options.document ?? document;
    this.mount = options.mount ?? null;
    this.flashContainerSelector = options.flashContainerSelector ?? ".container-fluid";
  }

  private getToast(): HTMLElement {
    if (!this.toast) {
      const toast = this.doc.createElement("div");
      toast.id = "stockline-net-toast";
      toast.setAttribute("role", "status");
      toast.setAttribute("aria-live", "polite");
      toast.style.cssText =
        "position:fixed;bottom:4.5rem;left:50%;transform:translateX(-50%);" +
        "z-index:9998;width:min(310px,calc(100vw - 2rem));border-radius:10px;" +
        "padding:11px 16px;font-size:13px;font-weight:600;color:#fff;" +
        "display:none;align-items:center;gap:8px;transition:opacity 0.3s ease;";
      (this.mount ?? this.doc.body).appendChild(toast);
      this.toast = toast;
    }
    return this.toast;
  }

  private clearTimers(): void {
    if (this.dismissTimer) {
      clearTimeout(this.dismissTimer);
      this.dismissTimer = null;
    }
    if (this.fadeTimer) {
      clearTimeout(this.fadeTimer);
      this.fadeTimer = null;
    }
  }

  private show(
    message: string,
    variant: ToastVariant,
    autoDismissMs: number | null,
    action?: { label: string; onClick: () => void },
  ): void {
    const toast = this.getToast();
    this.clearTimers();

    toast.replaceChildren();
    const text = this.doc.createElement("span");
    text.textContent = message;
    toast.appendChild(text);

    if (action) {
      const button = this.doc.createElement("button");
      button.type = "button";
      button.textContent = action.label;
      button.addEventListener("click", action.onClick);
      toast.appendChild(button);
    }

    toast.dataset.variant = variant;
    toast.style.background = TOAST_BACKGROUNDS[variant];
    toast.style.opacity = "1";
    toast.style.display = "flex";

    if (autoDismissMs !== null) {
      this.dismissTimer = setTimeout(() => {
        this.dismissTimer = null;
        this.hide();
      }, autoDismissMs);
    }
  }

  showOffline(pendingCount: number): void {
    const extra = pendingCount > 0 ? ` (${pendingCount} pending)` : "";
    this.show(`Offline${extra}`, "offline", TOAST_DURATIONS_MS.offline);
  }

  showSavedOffline(pendingCount: number | null): void {
    const extra = pendingCount === null ? "" : ` (${pendingCount} pending)`;
    this.show(`Saved offline${extra}`, "saved", TOAST_DURATIONS_MS.saved);
  }

  showSyncing(): void {
    this.show("Syncing…", "syncing", null);
  }

  showSynced(count: number): void {
    this.show(`${count} record(s) synced`, "synced", TOAST_DURATIONS_MS.synced);
  }

  /**
   * Stays on screen until replaced; failed operations need attention.
   */
  showSyncError(failedCount: number, onRetry?: () => void): void {
    this.show(
      `${failedCount} record(s) not synced`,
      "error",
      null,
      onRetry ? { label: "Retry", onClick: onRetry } : undefined,
    );
  }

  hide(): void {
    this.clearTimers();
    const toast = this.toast;
    if (!toast) return;

    toast.style.opacity = "0";
    this.fadeTimer = setTimeout(() => {
      this.fadeTimer = null;
      toast.style.display = "none";
      delete toast.dataset.variant;
    }, FADE_MS);
  }

  /**
   * Current toast variant, or null when nothing is shown.
   */
  currentVariant(): ToastVariant | null {
    const variant = this.toast?.dataset.variant;
    switch (variant) {
      case "offline":
      case "saved":
      case "syncing":
      case "synced":
      case "error":
        return variant;
      default:
        return null;
    }
  }

  currentMessage(): string {
    return this.toast?.firstElementChild?.textContent ?? "";
  }

  /**
   * Inline alert at the top of the page, removed after a few seconds.
   */
  flash(message: string, level: FlashLevel = "info"): HTMLElement {
    const container = this.doc.querySelector(this.flashContainerSelector) ?? this.doc.body;
    const alert = this.doc.createElement("div");
    alert.className = `alert alert-${level} alert-dismissible fade show mt-2`;
    alert.setAttribute("role", "alert");
    alert.textContent = message;

    const close = this.doc.createElement("button");
    close.type = "button";
    close.className = "close";
    close.setAttribute("aria-label", "Close");
    close.textContent = "×";
    close.addEventListener("click", () => alert.remove());
    alert.appendChild(close);

    container.insertBefore(alert, container.firstChild);

    setTimeout(() => {
      alert.classList.remove("show");
      setTimeout(() => alert.remove(), 300);
    }, FLASH_DURATION_MS);

    return alert;
  }

  destroy(): void {
    this.clearTimers();
    this.toast?.remove();
    this.toast = null;
  }
}
