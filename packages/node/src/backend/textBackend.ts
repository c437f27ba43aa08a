/**
 * packages/node/src/backend/textBackend.ts — Outline-writing backend.
 *
 * Why: Gives Node hosts a backend that needs no renderer: each drawn frame
 * is written to a stream as an indented outline, which makes interface code
 * easy to inspect from a terminal or a log file.
 */

import type { Writable } from "node:stream";
import {
  type HeadlessBackend,
  type HeadlessBackendOptions,
  type HeadlessFrame,
  type HeadlessNode,
  createHeadlessBackend,
} from "@panelstack/core";

const INDENT = "  ";

export type TextBackendOptions = Readonly<
  Omit<HeadlessBackendOptions, "onDraw"> & {
    output: Pick<Writable, "write">;
  }
>;

function describeNode(node: HeadlessNode): string {
  let line: string = node.kind;
  if (node.label !== "") line += ` ${JSON.stringify(node.label)}`;
  if (node.value !== undefined) line += ` = ${JSON.stringify(node.value)}`;
  return line;
}

function appendNode(lines: string[], node: HeadlessNode, depth: number): void {
  lines.push(`${INDENT.repeat(depth)}${describeNode(node)}`);
  for (const child of node.children) appendNode(lines, child, depth + 1);
}

/**
 * Render a frame as one line per element, two spaces per nesting level,
 * preceded by a `frame <index>` line.
 */
export function renderFrameOutline(frame: HeadlessFrame): string {
  const lines = [`frame ${String(frame.index)}`];
  for (const child of frame.root.children) appendNode(lines, child, 1);
  return lines.join("\n");
}

export function createTextBackend(opts: TextBackendOptions): HeadlessBackend {
  const { output, ...headless } = opts;
  return createHeadlessBackend({
    ...headless,
    onDraw: (frame) => {
      output.write(`${renderFrameOutline(frame)}\n\n`);
    },
  });
}
