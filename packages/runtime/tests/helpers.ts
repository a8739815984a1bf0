/**
 * Test helpers for @petledger/runtime.
 */

import type { Command } from "@petledger/types";
import { LedgerNode } from "../src/ledger-node.js";
import type { LedgerNodeOptions } from "../src/ledger-node.js";
import type { NodeLogEntry } from "../src/types.js";

export function createNode(overrides: Partial<LedgerNodeOptions> = {}): {
  node: LedgerNode;
  logs: NodeLogEntry[];
} {
  const logs: NodeLogEntry[] = [];
  const node = new LedgerNode({
    maxNameLength: 32,
    log: (entry) => logs.push(entry),
    ...overrides,
  });
  return { node, logs };
}

export function mint(id: number, name = "Shelly"): Command {
  return { kind: "mint", name, species: "Turtle", id };
}

export async function collect<T>(stream: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const value of stream) {
    out.push(value);
  }
  return out;
}
