import type { ContainerRef } from "../containers/kinds.js";

export type DiagnosticCode =
  | "orphanClose"
  | "prematureClose"
  | "unclosedAtDraw"
  | "capacityExceeded"
  | "frameNotStarted"
  | "frameErrors";

/**
 * Code-specific payload of a diagnostic.
 *
 * `orphanClose.expected` is the innermost open container at the time of
 * the call, or null when nothing was open at all.
 * `prematureClose.unclosed` lists the containers that should have been
 * closed first, innermost first.
 */
export type DiagnosticDetail =
  | Readonly<{ code: "orphanClose"; container: ContainerRef; expected: ContainerRef | null }>
  | Readonly<{
      code: "prematureClose";
      container: ContainerRef;
      unclosed: readonly ContainerRef[];
    }>
  | Readonly<{ code: "unclosedAtDraw"; container: ContainerRef }>
  | Readonly<{ code: "capacityExceeded"; discarded: readonly ContainerRef[] }>
  | Readonly<{ code: "frameNotStarted" }>
  | Readonly<{ code: "frameErrors" }>;

export type DiagnosticSeverity = "warn";

export type InterfaceDiagnostic = DiagnosticDetail &
  Readonly<{
    severity: DiagnosticSeverity;
    /** Number of draws completed before this diagnostic was emitted. */
    frame: number;
    message: string;
  }>;

export type DiagnosticListener = (diagnostic: InterfaceDiagnostic) => void;
