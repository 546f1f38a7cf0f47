/**
 * Keeps at most one in-flight turn per session id and hands out the
 * AbortController that cancels it.
 */
export class SessionTurnGuard {
  private readonly inFlight = new Map<string, AbortController>();

  /** Null when the session already has a turn running. */
  begin(sessionId: string): AbortController | null {
    if (this.inFlight.has(sessionId)) return null;
    const controller = new AbortController();
    this.inFlight.set(sessionId, controller);
    return controller;
  }

  end(sessionId: string, controller: AbortController): void {
    if (this.inFlight.get(sessionId) === controller) {
      this.inFlight.delete(sessionId);
    }
  }

  cancel(sessionId: string): boolean {
    const controller = this.inFlight.get(sessionId);
    if (!controller) return false;
    controller.abort();
    return true;
  }

  isBusy(sessionId: string): boolean {
    return this.inFlight.has(sessionId);
  }
}
