/**
 * Short-lived response cache keyed by a request fingerprint.
 *
 * Bounded by entry count (least recently used evicted); expiry is checked
 * against the entry's own timestamp on read.
 */

import { createHash } from "node:crypto";
import { LRUCache } from "lru-cache";
import type { CacheScope, DispatchResponse, ResolvedDispatchRequest } from "./types.js";

interface CacheEntry {
  readonly response: DispatchResponse;
  readonly cachedAt: number;
}

export interface ResponseCacheOptions {
  /** Entry lifetime; 0 disables the cache */
  readonly ttlMs?: number;
  readonly maxEntries?: number;
  readonly scope?: CacheScope;
}

/**
 * Fingerprint of the fields that determine a completion. Provider identity
 * is never part of it; the caller only under the "caller" scope.
 */
export function fingerprint(
  request: Pick<
    ResolvedDispatchRequest,
    "callerId" | "prompt" | "maxTokens" | "temperature" | "systemMessage"
  >,
  scope: CacheScope = "global",
): string {
  const parts: (string | number)[] = [
    request.prompt,
    request.maxTokens,
    request.temperature,
    request.systemMessage ?? "",
  ];
  if (scope === "caller") parts.unshift(request.callerId);
  return createHash("sha256").update(JSON.stringify(parts)).digest("hex");
}

export class ResponseCache {
  private readonly ttlMs: number;
  private readonly scope: CacheScope;
  private readonly entries: LRUCache<string, CacheEntry>;

  constructor(options: ResponseCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? 300_000;
    this.scope = options.scope ?? "global";
    this.entries = new LRUCache<string, CacheEntry>({ max: options.maxEntries ?? 1000 });
  }

  get enabled(): boolean {
    return this.ttlMs > 0;
  }

  keyFor(request: ResolvedDispatchRequest): string {
    return fingerprint(request, this.scope);
  }

  get(key: string, now: number = Date.now()): DispatchResponse | undefined {
    if (!this.enabled) return undefined;

    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (now - entry.cachedAt < this.ttlMs) return entry.response;

    this.entries.delete(key);
    return undefined;
  }

  set(key: string, response: DispatchResponse, now: number = Date.now()): void {
    if (!this.enabled) return;
    this.entries.set(key, { response, cachedAt: now });
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
