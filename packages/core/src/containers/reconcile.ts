/**
 * packages/core/src/containers/reconcile.ts — Open/close matching and recovery.
 *
 * Why: Caller code may close containers out of order, twice, or under a
 * misspelled name. Each close is resolved here in one deterministic pass so
 * the engine stack and the backend's mirrored stack never diverge: every
 * record popped gets exactly one backend end call, issued before the pop.
 *
 * Diagnostics are reported only after the stack reaches its final state; a
 * listener may call back into the interface.
 */

import type { InterfaceBackend } from "../backend.js";
import type { DiagnosticDetail } from "../diagnostics/types.js";
import { syncLayout } from "../layout/layoutState.js";
import { type ContainerKind, type ContainerRef, closeOnBackend, sameContainer } from "./kinds.js";
import type { ContainerRecord, ContainerStack } from "./stack.js";

/** What the reconciler needs from its owner. */
export interface ReconcileHost {
  readonly backend: InterfaceBackend;
  readonly stack: ContainerStack;
  report(detail: DiagnosticDetail): void;
  flagError(): void;
}

export type CloseOutcome =
  | Readonly<{ kind: "closed" }>
  | Readonly<{ kind: "unwound"; closed: readonly ContainerRef[] }>
  | Readonly<{ kind: "orphan" }>;

/**
 * Record a container the backend reported as open. Opens are never
 * validated; a closed container (backendOpened=false) leaves the stack as is.
 */
export function openContainer(
  host: ReconcileHost,
  kind: ContainerKind,
  name: string,
  backendOpened: boolean,
): void {
  if (backendOpened) host.stack.push(kind, name);
  syncLayout(host.backend, host.stack);
}

/** End the innermost container on the backend, pop it, and re-sync layout. */
function popWithBackend(host: ReconcileHost): ContainerRecord {
  const top = host.stack.peek();
  if (top !== undefined) closeOnBackend(host.backend, top.kind);
  const popped = host.stack.pop();
  syncLayout(host.backend, host.stack);
  return popped;
}

function toRef(record: ContainerRecord): ContainerRef {
  return { kind: record.kind, name: record.name };
}

export function closeContainer(host: ReconcileHost, kind: ContainerKind, name: string): CloseOutcome {
  const container: ContainerRef = { kind, name };
  const { stack } = host;
  const top = stack.peek();

  if (top === undefined) {
    host.report({ code: "orphanClose", container, expected: null });
    host.flagError();
    return { kind: "orphan" };
  }

  if (sameContainer(top, container)) {
    popWithBackend(host);
    return { kind: "closed" };
  }

  host.flagError();
  const depth = stack.findFromTop(kind, name);
  const target = depth === undefined ? undefined : stack.at(depth);
  if (depth === undefined || target === undefined) {
    host.report({ code: "orphanClose", container, expected: toRef(top) });
    return { kind: "orphan" };
  }

  const unclosed = stack.refs(depth);
  const closed: ContainerRef[] = [];
  while (stack.size > 0) {
    const popped = popWithBackend(host);
    closed.push(toRef(popped));
    if (popped === target) break;
  }
  host.report({ code: "prematureClose", container, unclosed });
  return { kind: "unwound", closed };
}

/**
 * Close everything still open, innermost first, reporting each container.
 * The stack is empty afterwards.
 */
export function forceCloseAll(host: ReconcileHost): readonly ContainerRef[] {
  const closed: ContainerRef[] = [];
  while (host.stack.size > 0) {
    const ref = toRef(popWithBackend(host));
    closed.push(ref);
    host.flagError();
    host.report({ code: "unclosedAtDraw", container: ref });
  }
  return closed;
}
