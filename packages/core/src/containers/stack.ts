/**
 * packages/core/src/containers/stack.ts — Ordered record of open containers.
 *
 * Why: The stack is the single source of truth for what is currently open.
 * Record order mirrors call nesting: the last record is the innermost
 * container, and every record above depth d was opened after it and must
 * close before it.
 */

import { UiStackError } from "../errors.js";
import type { ContainerKind, ContainerRef } from "./kinds.js";

/** Sentinel column width meaning "fill the remaining space". */
export const FILL_WIDTH = -1;

export type ContainerRecord = {
  readonly kind: ContainerKind;
  readonly name: string;
  layoutWidths: number[];
  layoutHeight: number;
};

export function createContainerRecord(kind: ContainerKind, name: string): ContainerRecord {
  return { kind, name, layoutWidths: [FILL_WIDTH], layoutHeight: 0 };
}

export class ContainerStack {
  private readonly records: ContainerRecord[] = [];

  get size(): number {
    return this.records.length;
  }

  push(kind: ContainerKind, name: string): ContainerRecord {
    const record = createContainerRecord(kind, name);
    this.records.push(record);
    return record;
  }

  peek(): ContainerRecord | undefined {
    return this.records[this.records.length - 1];
  }

  pop(): ContainerRecord {
    const record = this.records.pop();
    if (record === undefined) {
      throw new UiStackError("PANELSTACK_INVALID_STATE", "pop() called on an empty container stack");
    }
    return record;
  }

  /** Record at `depth` (0 = innermost). */
  at(depth: number): ContainerRecord | undefined {
    return this.records[this.records.length - 1 - depth];
  }

  /**
   * Depth (0 = innermost) of the innermost record matching `kind`/`name`.
   */
  findFromTop(kind: ContainerKind, name: string): number | undefined {
    for (let depth = 0; depth < this.records.length; depth++) {
      const record = this.records[this.records.length - 1 - depth];
      if (record !== undefined && record.kind === kind && record.name === name) return depth;
    }
    return undefined;
  }

  /** Records from the innermost outward, as refs. */
  refs(limit = this.records.length): ContainerRef[] {
    const out: ContainerRef[] = [];
    const n = Math.min(limit, this.records.length);
    for (let depth = 0; depth < n; depth++) {
      const record = this.records[this.records.length - 1 - depth];
      if (record !== undefined) out.push({ kind: record.kind, name: record.name });
    }
    return out;
  }

  clear(): void {
    this.records.length = 0;
  }
}
