/**
 * Collects keyboard edges and the quit signal into a queue that the frame
 * loop drains once per iteration.
 *
 * Lives on the main thread; wraps DOM events into engine-friendly signals.
 */

export type InputSignal =
  | { readonly kind: 'keydown'; readonly code: string }
  | { readonly kind: 'quit' };

export class InputManager {
  private readonly keysDown = new Set<string>();
  private pending: InputSignal[] = [];

  // DOM attachment state
  private attachedTarget: EventTarget | null = null;
  private closeTarget: EventTarget | null = null;
  private readonly boundHandlers = {
    keydown: (e: Event) => this.onDomKeyDown(e),
    keyup: (e: Event) => this.onDomKeyUp(e),
    pagehide: () => this.requestQuit(),
  };

  // ── Keyboard ──────────────────────────────────────────────────────

  /** Whether a keyboard key is currently held down. */
  isKeyDown(code: string): boolean {
    return this.keysDown.has(code);
  }

  /**
   * Record a key press edge. Every call queues one signal, so a source that
   * auto-repeats produces one signal per repeat.
   */
  handleKeyDown(code: string): void {
    this.keysDown.add(code);
    this.pending.push({ kind: 'keydown', code });
  }

  /** Record a key release. */
  handleKeyUp(code: string): void {
    this.keysDown.delete(code);
  }

  // ── Lifecycle signals ─────────────────────────────────────────────

  /** Queue a quit signal; the loop stops when it drains it. */
  requestQuit(): void {
    this.pending.push({ kind: 'quit' });
  }

  /** Pending signals in arrival order. Empties the queue. */
  drain(): InputSignal[] {
    const signals = this.pending;
    this.pending = [];
    return signals;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  // ── DOM attachment ────────────────────────────────────────────────

  /**
   * Attach keyboard listeners to `target` (typically the canvas) and, when
   * given, a `pagehide` listener on `closeTarget` (typically `window`) that
   * queues a quit. Calling attach again detaches the previous targets.
   */
  attach(target: EventTarget, closeTarget?: EventTarget): void {
    if (this.attachedTarget) {
      this.detach();
    }
    this.attachedTarget = target;

    // Ensure the target is focusable so it receives keyboard events.
    // Elements like <canvas> are not focusable by default.
    if (typeof HTMLElement !== 'undefined' && target instanceof HTMLElement) {
      if (!target.hasAttribute('tabindex')) {
        target.setAttribute('tabindex', '0');
      }
      target.style.outline = 'none';
      target.focus();
    }

    target.addEventListener('keydown', this.boundHandlers.keydown);
    target.addEventListener('keyup', this.boundHandlers.keyup);

    if (closeTarget) {
      this.closeTarget = closeTarget;
      closeTarget.addEventListener('pagehide', this.boundHandlers.pagehide);
    }
  }

  /** Remove all DOM event listeners from the attached targets. */
  detach(): void {
    const target = this.attachedTarget;
    if (target) {
      target.removeEventListener('keydown', this.boundHandlers.keydown);
      target.removeEventListener('keyup', this.boundHandlers.keyup);
      this.attachedTarget = null;
    }
    const closeTarget = this.closeTarget;
    if (closeTarget) {
      closeTarget.removeEventListener('pagehide', this.boundHandlers.pagehide);
      this.closeTarget = null;
    }
  }

  /** Detach from DOM and clear all state. */
  destroy(): void {
    this.detach();
    this.keysDown.clear();
    this.pending = [];
  }

  // ── Internal: DOM event handlers ──────────────────────────────────

  private onDomKeyDown(e: Event): void {
    const code = keyCode(e);
    if (code !== null) this.handleKeyDown(code);
  }

  private onDomKeyUp(e: Event): void {
    const code = keyCode(e);
    if (code !== null) this.handleKeyUp(code);
  }
}

function keyCode(e: Event): string | null {
  return 'code' in e && typeof e.code === 'string' ? e.code : null;
}
