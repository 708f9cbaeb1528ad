/**
 * Notification banner (`#yg-notice`) for notices and transient errors.
 */

import type { WireError } from "yoguido-shared";

export const NOTICE_ELEMENT_ID = "yg-notice";

export interface NoticeBannerConfig {
  /** Hide a notice after this many ms (0 keeps it until replaced, default 6000) */
  autoHideMs?: number;
}

export class NoticeBanner {
  private hideTimer: ReturnType<typeof setTimeout> | null = null;
  private readonly autoHideMs: number;

  constructor(
    private readonly element: HTMLElement,
    config: NoticeBannerConfig = {},
  ) {
    this.autoHideMs = config.autoHideMs ?? 6000;
  }

  /**
   * Banner over the document's `#yg-notice`, created at the top of the body
   * when the page has none.
   */
  static forDocument(document: Document, config?: NoticeBannerConfig): NoticeBanner {
    let element = document.getElementById(NOTICE_ELEMENT_ID);
    if (!element) {
      element = document.createElement("div");
      element.id = NOTICE_ELEMENT_ID;
      element.setAttribute("role", "alert");
      element.hidden = true;
      document.body.prepend(element);
    }
    return new NoticeBanner(element, config);
  }

  show(notice: WireError, options: { sticky?: boolean } = {}): void {
    this.cancelHide();
    this.element.textContent = notice.message;
    this.element.dataset.code = notice.code;
    this.element.hidden = false;
    if (this.autoHideMs > 0 && !options.sticky) {
      this.hideTimer = setTimeout(() => this.hide(), this.autoHideMs);
    }
  }

  hide(): void {
    this.cancelHide();
    this.element.hidden = true;
    this.element.textContent = "";
    delete this.element.dataset.code;
  }

  get visible(): boolean {
    return !this.element.hidden;
  }

  get code(): string | undefined {
    return this.element.dataset.code;
  }

  private cancelHide(): void {
    if (this.hideTimer) {
      clearTimeout(this.hideTimer);
      this.hideTimer = null;
    }
  }
}
