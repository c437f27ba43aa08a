/**
 * Row layout of the innermost container.
 *
 * Every mutator edits the top record and pushes the result to the backend
 * before returning. With no container open there is nothing to configure
 * and each call is a no-op.
 */

import type { InterfaceBackend } from "../backend.js";
import { type ContainerStack, FILL_WIDTH } from "../containers/stack.js";
import { invalidProps } from "../errors.js";

export type LayoutSnapshot = Readonly<{
  widths: readonly number[];
  height: number;
}>;

function requireInt(name: string, v: number): number {
  if (!Number.isInteger(v)) invalidProps(`${name} must be an integer`);
  return v;
}

function requireFinite(name: string, v: number): number {
  if (!Number.isFinite(v)) invalidProps(`${name} must be a finite number`);
  return v;
}

/** Push the top record's layout to the backend. */
export function syncLayout(backend: InterfaceBackend, stack: ContainerStack): void {
  const top = stack.peek();
  if (top === undefined) return;
  backend.setLayout(top.layoutWidths.slice(), top.layoutHeight);
}

export function currentLayout(stack: ContainerStack): LayoutSnapshot | null {
  const top = stack.peek();
  if (top === undefined) return null;
  return Object.freeze({ widths: Object.freeze(top.layoutWidths.slice()), height: top.layoutHeight });
}

export function resetLayout(backend: InterfaceBackend, stack: ContainerStack): void {
  const top = stack.peek();
  if (top === undefined) return;
  top.layoutWidths = [FILL_WIDTH];
  syncLayout(backend, stack);
}

/** Clear the columns; callers then add them one at a time. */
export function clearColumns(backend: InterfaceBackend, stack: ContainerStack): void {
  const top = stack.peek();
  if (top === undefined) return;
  top.layoutWidths = [];
  syncLayout(backend, stack);
}

export function addColumn(backend: InterfaceBackend, stack: ContainerStack, width: number): void {
  requireInt("column width", width);
  const top = stack.peek();
  if (top === undefined) return;
  top.layoutWidths.push(width);
  syncLayout(backend, stack);
}

/** Append a column sized as a fraction of the container's pixel width. */
export function addColumnRelative(
  backend: InterfaceBackend,
  stack: ContainerStack,
  fraction: number,
): void {
  requireFinite("column fraction", fraction);
  const top = stack.peek();
  if (top === undefined) return;
  const { width } = backend.getContainerPixelSize();
  top.layoutWidths.push(Math.floor(width * fraction));
  syncLayout(backend, stack);
}

/** Fixed label column followed by a fill column. */
export function twoColumnLayout(
  backend: InterfaceBackend,
  stack: ContainerStack,
  labelWidth: number,
): void {
  const top = stack.peek();
  if (top === undefined) return;
  top.layoutWidths = [labelWidth, FILL_WIDTH];
  syncLayout(backend, stack);
}

export function setLayoutHeight(
  backend: InterfaceBackend,
  stack: ContainerStack,
  height: number,
): void {
  requireInt("layout height", height);
  const top = stack.peek();
  if (top === undefined) return;
  top.layoutHeight = height;
  syncLayout(backend, stack);
}
