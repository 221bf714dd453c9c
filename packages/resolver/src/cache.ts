import { debug } from "@macro-deps/shared";
import type { CallNode, TemplateNode } from "@macro-deps/template";

export interface ParsedTemplate {
  ast: TemplateNode;
  calls: readonly CallNode[];
}

/**
 * Memo of parsed templates keyed by exact template text.
 *
 * Purely an optimization: resolving with or without a cache gives the same
 * result. The caller owns its lifetime (typically one per build or worker).
 */
export interface ParseCache {
  load(text: string): ParsedTemplate | null;
  store(text: string, parsed: ParsedTemplate): void;
}

/** In-memory parse cache with hit/miss counters. */
export class MemoryParseCache implements ParseCache {
  #store = new Map<string, ParsedTemplate>();
  #hits = 0;
  #misses = 0;

  load(text: string): ParsedTemplate | null {
    const parsed = this.#store.get(text) ?? null;
    if (parsed) {
      this.#hits++;
      debug.cache("hit", { length: text.length, calls: parsed.calls.length });
    } else {
      this.#misses++;
      debug.cache("miss", { length: text.length });
    }
    return parsed;
  }

  store(text: string, parsed: ParsedTemplate): void {
    this.#store.set(text, parsed);
  }

  clear(): void {
    this.#store.clear();
    this.#hits = 0;
    this.#misses = 0;
  }

  get size(): number {
    return this.#store.size;
  }

  get stats(): { hits: number; misses: number } {
    return { hits: this.#hits, misses: this.#misses };
  }
}
