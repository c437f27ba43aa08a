import type { InterfaceBackend } from "../backend.js";

export type ContainerKind = "panel" | "inset" | "treenode" | "column" | "popup";

/** Identifies one container in diagnostics and reports. */
export type ContainerRef = Readonly<{
  kind: ContainerKind;
  name: string;
}>;

type ContainerKindInfo = Readonly<{
  displayName: string;
  endPrefix: "end" | "leave";
  /** Whether the end call takes the container name. */
  named: boolean;
}>;

export const CONTAINER_KINDS: Readonly<Record<ContainerKind, ContainerKindInfo>> = Object.freeze({
  panel: { displayName: "Panel", endPrefix: "end", named: true },
  inset: { displayName: "Inset", endPrefix: "end", named: true },
  treenode: { displayName: "Treenode", endPrefix: "end", named: true },
  column: { displayName: "Column", endPrefix: "leave", named: false },
  popup: { displayName: "Popup", endPrefix: "end", named: true },
});

const BACKEND_CLOSERS: Readonly<Record<ContainerKind, (backend: InterfaceBackend) => void>> =
  Object.freeze({
    panel: (backend) => backend.endPanel(),
    inset: (backend) => backend.endInset(),
    treenode: (backend) => backend.endTreenode(),
    column: (backend) => backend.endColumn(),
    popup: (backend) => backend.endPopup(),
  });

/** Issue the backend end call matching `kind`. */
export function closeOnBackend(backend: InterfaceBackend, kind: ContainerKind): void {
  BACKEND_CLOSERS[kind](backend);
}

/** Lower-case noun used in prose ("panel", "treenode"). */
export function kindNoun(kind: ContainerKind): string {
  return CONTAINER_KINDS[kind].displayName.toLowerCase();
}

/**
 * Render the call that closes a container, e.g. `endPanel("p")` or
 * `leaveColumn()`.
 */
export function formatEndCall(ref: ContainerRef): string {
  const info = CONTAINER_KINDS[ref.kind];
  const fn = `${info.endPrefix}${info.displayName}`;
  if (!info.named && ref.name === "") return `${fn}()`;
  return `${fn}(${JSON.stringify(ref.name)})`;
}

export function sameContainer(a: ContainerRef, b: ContainerRef): boolean {
  return a.kind === b.kind && a.name === b.name;
}
