import { describe, expect, it, vi } from "vitest";
import { ToolCatalog } from "../src/state/tool-catalog.js";
import type { ToolDescriptor } from "../src/types.js";

function tool(name: string): ToolDescriptor {
  return { name, description: `${name} tool`, inputSchema: { type: "object", properties: {} } };
}

describe("ToolCatalog", () => {
  it("fetches once and serves the cache afterwards", async () => {
    const fetcher = vi.fn(() => Promise.resolve([tool("a"), tool("b")]));
    const catalog = new ToolCatalog(fetcher);

    expect(catalog.isLoaded()).toBe(false);
    const first = await catalog.list();
    const second = await catalog.list();

    expect(first.map((t) => t.name)).toEqual(["a", "b"]);
    expect(second).toBe(first);
    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(catalog.has("a")).toBe(true);
    expect(catalog.get("b")?.description).toBe("b tool");
  });

  it("re-fetches when forced", async () => {
    const fetcher = vi
      .fn<() => Promise<ToolDescriptor[]>>()
      .mockResolvedValueOnce([tool("a")])
      .mockResolvedValueOnce([tool("a"), tool("c")]);
    const catalog = new ToolCatalog(fetcher);

    await catalog.list();
    const refreshed = await catalog.list({ forceRefresh: true });

    expect(refreshed.map((t) => t.name)).toEqual(["a", "c"]);
    expect(catalog.has("c")).toBe(true);
  });

  it("shares one fetch between concurrent callers", async () => {
    const fetcher = vi.fn(() => Promise.resolve([tool("a")]));
    const catalog = new ToolCatalog(fetcher);

    const [one, two] = await Promise.all([catalog.list(), catalog.list({ forceRefresh: true })]);

    expect(one).toBe(two);
    expect(fetcher).toHaveBeenCalledTimes(1);
  });

  it("swaps the snapshot whole so earlier readers keep a consistent view", async () => {
    const fetcher = vi
      .fn<() => Promise<ToolDescriptor[]>>()
      .mockResolvedValueOnce([tool("a"), tool("b")])
      .mockResolvedValueOnce([tool("c")]);
    const catalog = new ToolCatalog(fetcher);

    await catalog.list();
    const before = catalog.getSnapshot();
    await catalog.list({ forceRefresh: true });

    expect(before?.tools.map((t) => t.name)).toEqual(["a", "b"]);
    expect(before?.byName.has("c")).toBe(false);
    expect(Object.isFrozen(before?.tools)).toBe(true);
    expect(catalog.getSnapshot()?.tools.map((t) => t.name)).toEqual(["c"]);
  });

  it("keeps the previous snapshot when a refresh fails", async () => {
    const fetcher = vi
      .fn<() => Promise<ToolDescriptor[]>>()
      .mockResolvedValueOnce([tool("a")])
      .mockRejectedValueOnce(new Error("server went away"));
    const catalog = new ToolCatalog(fetcher);

    await catalog.list();
    await expect(catalog.list({ forceRefresh: true })).rejects.toThrow("server went away");
    expect(catalog.has("a")).toBe(true);
  });

  it("forgets everything on clear", async () => {
    const catalog = new ToolCatalog(() => Promise.resolve([tool("a")]));
    await catalog.list();
    catalog.clear();

    expect(catalog.isLoaded()).toBe(false);
    expect(catalog.has("a")).toBe(false);
  });
});
