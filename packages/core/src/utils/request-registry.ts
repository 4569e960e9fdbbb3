import { RequestConflictError } from "../errors.js";

/**
 * In-flight rental requests by id. Ids are client-chosen, so a second
 * request under a running id is refused rather than replacing the first.
 */
export class RequestRegistry {
  private readonly active = new Map<string, AbortController>();

  get size(): number {
    return this.active.size;
  }

  has(requestId: string): boolean {
    return this.active.has(requestId);
  }

  /** @throws RequestConflictError when the id is already running */
  register(requestId: string): AbortController {
    if (this.active.has(requestId)) throw new RequestConflictError(requestId);
    const controller = new AbortController();
    this.active.set(requestId, controller);
    return controller;
  }

  /** Aborts a running request. False when no request holds the id. */
  cancel(requestId: string): boolean {
    const controller = this.active.get(requestId);
    if (!controller) return false;
    this.active.delete(requestId);
    controller.abort();
    return true;
  }

  /** Drops the entry, but only while it still belongs to `controller`. */
  release(requestId: string, controller: AbortController): void {
    if (this.active.get(requestId) === controller) this.active.delete(requestId);
  }
}
