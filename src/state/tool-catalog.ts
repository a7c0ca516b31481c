/**
 * Tool Catalog
 *
 * Caches the server's tool list for the session. The cache is an immutable
 * snapshot that is swapped whole on refresh, so a reader holding the previous
 * snapshot (for example a callback running mid-refresh) never sees a partial set.
 */

import type { StructuredLogger } from "../logging.js";
import type { ToolDescriptor } from "../types.js";

/**
 * Frozen view of the catalog at one point in time
 */
export interface CatalogSnapshot {
  readonly tools: readonly ToolDescriptor[];
  readonly byName: ReadonlyMap<string, ToolDescriptor>;
  readonly fetchedAt: Date;
}

/**
 * Fetches the complete tool list from the server (all pages)
 */
export type ToolFetcher = () => Promise<ToolDescriptor[]>;

export class ToolCatalog {
  private snapshot: CatalogSnapshot | null = null;
  private inflight: Promise<CatalogSnapshot> | null = null;
  private readonly fetcher: ToolFetcher;
  private readonly logger?: StructuredLogger;

  constructor(fetcher: ToolFetcher, logger?: StructuredLogger) {
    this.fetcher = fetcher;
    this.logger = logger;
  }

  /**
   * Return the cached tools, fetching on first use or when forced.
   */
  public async list(options: { forceRefresh?: boolean } = {}): Promise<readonly ToolDescriptor[]> {
    if (this.snapshot && !options.forceRefresh) {
      return this.snapshot.tools;
    }
    const snapshot = await this.refresh();
    return snapshot.tools;
  }

  /**
   * Whether a snapshot has been fetched yet.
   */
  public isLoaded(): boolean {
    return this.snapshot !== null;
  }

  /**
   * Current snapshot without any fetch. Null before the first fetch.
   */
  public getSnapshot(): CatalogSnapshot | null {
    return this.snapshot;
  }

  public get(name: string): ToolDescriptor | undefined {
    return this.snapshot?.byName.get(name);
  }

  public has(name: string): boolean {
    return this.snapshot?.byName.has(name) ?? false;
  }

  /**
   * Drop the snapshot (session teardown).
   */
  public clear(): void {
    this.snapshot = null;
  }

  private refresh(): Promise<CatalogSnapshot> {
    // Concurrent callers share one fetch
    if (this.inflight) {
      return this.inflight;
    }

    const pending = this.fetcher()
      .then((tools) => {
        const frozen = Object.freeze(tools.map((tool) => Object.freeze({ ...tool })));
        const snapshot: CatalogSnapshot = Object.freeze({
          tools: frozen,
          byName: new Map(frozen.map((tool) => [tool.name, tool] as const)),
          fetchedAt: new Date(),
        });
        this.snapshot = snapshot;
        this.logger?.info("tool_catalog_refreshed", {
          count: frozen.length,
          tools: frozen.map((tool) => tool.name),
        });
        return snapshot;
      })
      .finally(() => {
        this.inflight = null;
      });

    this.inflight = pending;
    return pending;
  }
}
