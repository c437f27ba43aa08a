/**
 * packages/core/src/interface/createInterface.ts — Public immediate-mode API.
 *
 * Why: Binds one backend, one container stack and one diagnostic reporter
 * into a context object. Every public call runs the frame guard first, then
 * forwards to the backend and keeps the stack in step with it.
 *
 * Usage:
 *   const ui = createInterface(backend);
 *   ui.beginFrame();
 *   if (ui.startPanel("settings", { x: 0, y: 0, width: 300, height: 200 })) {
 *     ui.checkbox("Sound", "Enabled", sound);
 *     ui.endPanel("settings");
 *   }
 *   ui.draw();
 */

import type { InterfaceBackend, InterfaceStyle, Rect } from "../backend.js";
import {
  type InterfaceConfig,
  type ResolvedInterfaceConfig,
  requireFontName,
  requireNonNegativeInt,
  requirePositiveInt,
  resolveInterfaceConfig,
} from "../config.js";
import type { ContainerRef } from "../containers/kinds.js";
import { closeContainer, openContainer } from "../containers/reconcile.js";
import { DiagnosticReporter } from "../diagnostics/reporter.js";
import { type FrameReport, FrameController } from "../frame/frameController.js";
import * as layout from "../layout/layoutState.js";

export class InterfaceContext {
  private readonly backend: InterfaceBackend;
  private readonly frames: FrameController;
  private labelWidth: number;
  private font: string | null;
  private fontSize: number | null;

  constructor(backend: InterfaceBackend, config: ResolvedInterfaceConfig) {
    this.backend = backend;
    this.frames = new FrameController(
      backend,
      new DiagnosticReporter({ log: config.logDiagnostics, listener: config.onDiagnostic }),
    );
    this.labelWidth = config.labelWidth;
    this.font = config.font;
    this.fontSize = config.fontSize;

    if (this.font !== null) backend.setFont(this.font);
    if (this.fontSize !== null) backend.setFontSize(this.fontSize);
  }

  // ===========================================================================
  // Frame lifecycle
  // ===========================================================================

  /** Call once per frame before any other interface call. */
  beginFrame(): void {
    this.frames.beginFrame();
  }

  /**
   * Close anything left open, report the frame's errors, and draw. Call
   * exactly once per frame after all container calls.
   */
  draw(): FrameReport {
    return this.frames.draw(this.style());
  }

  /** True when a nesting error was detected since the last draw. */
  get errorsOccurred(): boolean {
    return this.frames.errorsOccurred;
  }

  /** Number of containers currently open. */
  get depth(): number {
    return this.frames.stack.size;
  }

  /** Open containers, innermost first. */
  openContainers(): readonly ContainerRef[] {
    return this.frames.stack.refs();
  }

  currentLayout(): layout.LayoutSnapshot | null {
    return layout.currentLayout(this.frames.stack);
  }

  style(): InterfaceStyle {
    return Object.freeze({ font: this.font, fontSize: this.fontSize, labelWidth: this.labelWidth });
  }

  // ===========================================================================
  // Containers
  // ===========================================================================

  startPanel(name: string, rect: Rect): boolean {
    this.frames.guard();
    const open = this.backend.startPanel(name, rect);
    openContainer(this.frames, "panel", name, open);
    return open;
  }

  endPanel(name: string): void {
    this.frames.guard();
    closeContainer(this.frames, "panel", name);
  }

  startPopup(name: string): boolean {
    this.frames.guard();
    const open = this.backend.startPopup(name);
    openContainer(this.frames, "popup", name, open);
    if (open) this.singleLineLayout();
    return open;
  }

  endPopup(name: string): void {
    this.frames.guard();
    closeContainer(this.frames, "popup", name);
  }

  /** Mark a popup as open; the next startPopup(name) will return true. */
  openPopup(name: string): void {
    this.frames.guard();
    this.backend.openPopup(name);
  }

  /**
   * Start an always-open inset. `height` is applied to the enclosing
   * container's row so the inset occupies that many pixels.
   */
  startInset(name: string, height: number): void {
    this.frames.guard();
    this.setLayoutHeight(height);
    this.backend.startInset(name);
    openContainer(this.frames, "inset", name, true);
  }

  endInset(name: string): void {
    this.frames.guard();
    closeContainer(this.frames, "inset", name);
  }

  startTreenode(name: string): boolean {
    this.frames.guard();
    const open = this.backend.startTreenode(name);
    openContainer(this.frames, "treenode", name, open);
    return open;
  }

  endTreenode(name: string): void {
    this.frames.guard();
    closeContainer(this.frames, "treenode", name);
  }

  enterColumn(): void {
    this.frames.guard();
    this.backend.startColumn();
    openContainer(this.frames, "column", "", true);
  }

  leaveColumn(): void {
    this.frames.guard();
    closeContainer(this.frames, "column", "");
  }

  // ===========================================================================
  // Layout
  // ===========================================================================

  /** One column filling the whole row. */
  resetLayout(): void {
    this.frames.guard();
    layout.resetLayout(this.backend, this.frames.stack);
  }

  /** Place every following element on a single row. */
  singleLineLayout(): void {
    this.frames.guard();
    layout.clearColumns(this.backend, this.frames.stack);
  }

  /** Clear the columns so they can be added with addColumn(). */
  startCustomLayout(): void {
    this.frames.guard();
    layout.clearColumns(this.backend, this.frames.stack);
  }

  addColumn(width: number): void {
    this.frames.guard();
    layout.addColumn(this.backend, this.frames.stack, width);
  }

  /** Add a column `fraction` of the container's width wide. */
  addColumnRelative(fraction: number): void {
    this.frames.guard();
    layout.addColumnRelative(this.backend, this.frames.stack, fraction);
  }

  setLayoutHeight(height: number): void {
    this.frames.guard();
    layout.setLayoutHeight(this.backend, this.frames.stack, height);
  }

  private twoColumnLayout(): void {
    layout.twoColumnLayout(this.backend, this.frames.stack, this.labelWidth);
  }

  /** Run `control` in a column laid out as [label | control]. */
  private labeled<T>(label: string, control: () => T): T {
    this.enterColumn();
    this.twoColumnLayout();
    this.backend.label(label);
    const result = control();
    this.leaveColumn();
    return result;
  }

  // ===========================================================================
  // Widgets
  // ===========================================================================

  /** Collapsible header; returns true while expanded. */
  header(label: string): boolean {
    this.frames.guard();
    const open = this.backend.header(label);
    layout.syncLayout(this.backend, this.frames.stack);
    return open;
  }

  label(text: string): void {
    this.frames.guard();
    this.backend.label(text);
  }

  paragraph(text: string): void {
    this.frames.guard();
    this.backend.text(text);
  }

  button(text: string): boolean;
  button(label: string, text: string): boolean;
  button(first: string, second?: string): boolean {
    this.frames.guard();
    if (second === undefined) return this.backend.button(first);
    return this.labeled(first, () => this.button(second));
  }

  checkbox(text: string, value: boolean): boolean;
  checkbox(label: string, text: string, value: boolean): boolean;
  checkbox(first: string, second: string | boolean, third?: boolean): boolean {
    this.frames.guard();
    if (typeof second === "boolean") return this.backend.checkbox(first, second);
    const value = third === true;
    return this.labeled(first, () => this.checkbox(second, value));
  }

  slider(value: number, min: number, max: number): number;
  slider(label: string, value: number, min: number, max: number): number;
  slider(first: string | number, second: number, third: number, fourth?: number): number {
    this.frames.guard();
    if (typeof first === "number") return this.backend.slider(first, second, third);
    const max = fourth ?? third;
    return this.labeled(first, () => this.slider(second, third, max));
  }

  numberBox(value: number, step: number): number;
  numberBox(label: string, value: number, step: number): number;
  numberBox(first: string | number, second: number, third?: number): number {
    this.frames.guard();
    if (typeof first === "number") return this.backend.numberBox(first, second);
    const step = third ?? 1;
    return this.labeled(first, () => this.numberBox(second, step));
  }

  textBox(value: string): string;
  textBox(label: string, value: string): string;
  textBox(first: string, second?: string): string {
    this.frames.guard();
    if (second === undefined) return this.backend.textBox(first);
    return this.labeled(first, () => this.textBox(second));
  }

  lastElementChanged(): boolean {
    return this.backend.lastChanged();
  }

  lastElementConfirmed(): boolean {
    return this.backend.lastConfirmed();
  }

  // ===========================================================================
  // Style
  // ===========================================================================

  setFont(name: string): void {
    this.font = requireFontName(name);
    this.backend.setFont(name);
  }

  setFontSize(size: number): void {
    this.fontSize = requirePositiveInt("fontSize", size);
    this.backend.setFontSize(size);
  }

  setLabelWidth(width: number): void {
    this.labelWidth = requireNonNegativeInt("labelWidth", width);
  }
}

export function createInterface(
  backend: InterfaceBackend,
  config?: InterfaceConfig,
): InterfaceContext {
  return new InterfaceContext(backend, resolveInterfaceConfig(config));
}
