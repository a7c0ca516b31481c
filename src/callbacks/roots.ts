/**
 * Roots callback: answers roots/list with the roots fixed at session configuration.
 */

import type { ListRootsResult } from "@modelcontextprotocol/sdk/types.js";
import type { Root } from "../types.js";

export class RootsHandler {
  public readonly kind = "roots";
  private readonly roots: readonly Root[];

  constructor(roots: readonly Root[]) {
    this.roots = Object.freeze(roots.map((root) => Object.freeze({ uri: root.uri, name: root.name })));
  }

  public handle(): Promise<ListRootsResult> {
    return Promise.resolve({
      roots: this.roots.map((root) => ({ uri: root.uri, name: root.name })),
    });
  }

  public list(): readonly Root[] {
    return this.roots;
  }
}
