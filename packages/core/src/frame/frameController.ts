/**
 * packages/core/src/frame/frameController.ts — Per-frame lifecycle.
 *
 * Why: Owns the state one interface context carries between calls (the
 * container stack, the error flag, the frame counter) and the two frame
 * boundaries: the guard run before every public call, and draw().
 *
 * Guard:
 *   - backend frame not started: start it and warn
 *   - backend capacity exhausted: restart the backend, drop every engine
 *     record (the restart already discarded the backend's mirror of them)
 *     and flag the frame
 *
 * Draw:
 *   - close whatever is still open, innermost first
 *   - emit the summary banner when the flag is set, then clear it
 *   - call backend.draw() exactly once
 */

import type { InterfaceBackend, InterfaceStyle } from "../backend.js";
import type { ContainerRef } from "../containers/kinds.js";
import { type ReconcileHost, forceCloseAll } from "../containers/reconcile.js";
import { ContainerStack } from "../containers/stack.js";
import type { DiagnosticReporter } from "../diagnostics/reporter.js";
import type { DiagnosticDetail, InterfaceDiagnostic } from "../diagnostics/types.js";

export type FrameReport = Readonly<{
  /** Zero-based index of the frame that was drawn. */
  frame: number;
  hadErrors: boolean;
  /** Containers force-closed at draw, innermost first. */
  closedAtDraw: readonly ContainerRef[];
  /** Every diagnostic emitted since the previous draw, oldest first. */
  diagnostics: readonly InterfaceDiagnostic[];
}>;

export class FrameController implements ReconcileHost {
  readonly backend: InterfaceBackend;
  readonly stack = new ContainerStack();
  private readonly reporter: DiagnosticReporter;
  private errorFlag = false;
  private frameIndex = 0;

  constructor(backend: InterfaceBackend, reporter: DiagnosticReporter) {
    this.backend = backend;
    this.reporter = reporter;
  }

  get errorsOccurred(): boolean {
    return this.errorFlag;
  }

  get frame(): number {
    return this.frameIndex;
  }

  report(detail: DiagnosticDetail): void {
    this.reporter.report(this.frameIndex, detail);
  }

  flagError(): void {
    this.errorFlag = true;
  }

  /** Start the backend frame unless it is already running. */
  beginFrame(): void {
    if (this.backend.isFrameStarted()) return;
    this.backend.startFrame();
  }

  /** Run before every public interface call. */
  guard(): void {
    if (!this.backend.isFrameStarted()) {
      this.report({ code: "frameNotStarted" });
      this.backend.startFrame();
    }
    if (this.backend.isCapacityExhausted()) {
      const discarded = this.stack.refs();
      this.backend.startFrame();
      this.stack.clear();
      this.report({ code: "capacityExceeded", discarded });
      this.flagError();
    }
  }

  draw(style: InterfaceStyle): FrameReport {
    this.guard();

    const closedAtDraw = forceCloseAll(this);
    const hadErrors = this.errorFlag;
    if (hadErrors) this.report({ code: "frameErrors" });
    this.errorFlag = false;

    const frame = this.frameIndex;
    const diagnostics = this.reporter.takeFrameLog();
    this.backend.draw(style);
    this.frameIndex++;

    return Object.freeze({ frame, hadErrors, closedAtDraw, diagnostics });
  }
}
