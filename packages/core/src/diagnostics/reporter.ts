/**
 * packages/core/src/diagnostics/reporter.ts — Diagnostic fan-out.
 *
 * Why: Nesting mistakes are developer-facing warnings, not exceptions. The
 * reporter formats each one, writes it to the console (unless disabled),
 * hands it to the optional listener, and keeps the current frame's log for
 * the FrameReport returned by draw().
 */

import { formatDiagnostic } from "./format.js";
import type { DiagnosticDetail, DiagnosticListener, InterfaceDiagnostic } from "./types.js";

export const LOG_PREFIX = "[panelstack]";

export function warnDev(message: string): void {
  const c = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  c?.warn?.(message);
}

function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  return String(v);
}

export type DiagnosticReporterOptions = Readonly<{
  log: boolean;
  listener?: DiagnosticListener | undefined;
}>;

export class DiagnosticReporter {
  private readonly log: boolean;
  private readonly listener: DiagnosticListener | undefined;
  private frameLog: InterfaceDiagnostic[] = [];

  constructor(opts: DiagnosticReporterOptions) {
    this.log = opts.log;
    this.listener = opts.listener;
  }

  report(frame: number, detail: DiagnosticDetail): InterfaceDiagnostic {
    const diagnostic: InterfaceDiagnostic = {
      ...detail,
      severity: "warn",
      frame,
      message: formatDiagnostic(detail),
    };
    Object.freeze(diagnostic);
    this.frameLog.push(diagnostic);

    if (this.log) warnDev(`${LOG_PREFIX} ${diagnostic.message}`);
    if (this.listener !== undefined) {
      try {
        this.listener(diagnostic);
      } catch (e: unknown) {
        warnDev(`${LOG_PREFIX} onDiagnostic listener threw: ${describeThrown(e)}`);
      }
    }
    return diagnostic;
  }

  /** Diagnostics emitted since the last call, oldest first. */
  takeFrameLog(): readonly InterfaceDiagnostic[] {
    const out = this.frameLog;
    this.frameLog = [];
    return Object.freeze(out);
  }

  peekFrameLog(): readonly InterfaceDiagnostic[] {
    return this.frameLog.slice();
  }
}
