/**
 * Name → handler table with forgiving lookup.
 *
 * Names are compared after normalization (lowercase; whitespace, "_", "-"
 * and "." removed). Lookup tries an exact match first, then the first
 * registered name that contains the query.
 */

import { UnknownCapabilityError } from "@switchboard/errors";
import type { CapabilityHandler, CapabilityKind } from "./types.js";

export function normalizeCapabilityName(name: string): string {
  return name.toLowerCase().replace(/[\s_.-]+/g, "");
}

export class CapabilityRegistry {
  private readonly handlers: CapabilityHandler[] = [];
  private readonly byKey = new Map<string, CapabilityHandler>();

  /**
   * Add a handler. Returns false, leaving the earlier registration in place,
   * when a handler with the same normalized name exists.
   */
  register(handler: CapabilityHandler): boolean {
    const key = normalizeCapabilityName(handler.name);
    const existing = this.byKey.get(key);
    if (existing) {
      console.warn(
        `[CapabilityRegistry] ${handler.kind} "${handler.name}" conflicts with ${existing.kind} "${existing.name}"; keeping the first`,
      );
      return false;
    }
    this.byKey.set(key, handler);
    this.handlers.push(handler);
    return true;
  }

  /**
   * Find the handler for `name`. With `kind`, only handlers of that kind are
   * candidates.
   */
  resolve(name: string, kind?: CapabilityKind): CapabilityHandler {
    const candidates = kind ? this.handlers.filter((h) => h.kind === kind) : this.handlers;
    const available = (): readonly string[] => candidates.map((h) => h.name);
    const query = normalizeCapabilityName(name);
    if (query === "") {
      throw new UnknownCapabilityError(name, available());
    }

    const exact = this.byKey.get(query);
    if (exact && (!kind || exact.kind === kind)) return exact;

    const matches = candidates.filter((h) => normalizeCapabilityName(h.name).includes(query));
    const [first] = matches;
    if (!first) {
      throw new UnknownCapabilityError(name, available());
    }
    if (matches.length > 1) {
      console.warn(
        `[CapabilityRegistry] "${name}" matches ${matches.map((h) => `"${h.name}"`).join(", ")}; using "${first.name}"`,
      );
    }
    return first;
  }

  /** Registered names in registration order */
  names(): readonly string[] {
    return Object.freeze(this.handlers.map((h) => h.name));
  }

  list(): readonly CapabilityHandler[] {
    return Object.freeze([...this.handlers]);
  }

  get size(): number {
    return this.handlers.length;
  }
}
