/**
 * @panelstack/core
 *
 * Runtime-agnostic container-stack engine for immediate-mode interfaces.
 * This package MUST NOT use Node-specific APIs (Buffer, node:* imports).
 */

// =============================================================================
// Errors
// =============================================================================

export { UiStackError, type UiStackErrorCode } from "./errors.js";

// =============================================================================
// Backend contract
// =============================================================================

export type { InterfaceBackend, InterfaceStyle, PixelSize, Rect } from "./backend.js";

// =============================================================================
// Configuration
// =============================================================================

export {
  DEFAULT_LABEL_WIDTH,
  resolveInterfaceConfig,
  type InterfaceConfig,
  type ResolvedInterfaceConfig,
} from "./config.js";

// =============================================================================
// Containers
// =============================================================================

export {
  CONTAINER_KINDS,
  formatEndCall,
  type ContainerKind,
  type ContainerRef,
} from "./containers/kinds.js";
export {
  ContainerStack,
  FILL_WIDTH,
  type ContainerRecord,
} from "./containers/stack.js";
export {
  closeContainer,
  forceCloseAll,
  openContainer,
  type CloseOutcome,
  type ReconcileHost,
} from "./containers/reconcile.js";
export type { LayoutSnapshot } from "./layout/layoutState.js";

// =============================================================================
// Diagnostics
// =============================================================================

export { FRAME_ERRORS_BANNER, formatDiagnostic } from "./diagnostics/format.js";
export { LOG_PREFIX } from "./diagnostics/reporter.js";
export type {
  DiagnosticCode,
  DiagnosticDetail,
  DiagnosticListener,
  DiagnosticSeverity,
  InterfaceDiagnostic,
} from "./diagnostics/types.js";

// =============================================================================
// Headless backend (also used by host packages, e.g. the Node text backend)
// =============================================================================

export {
  DEFAULT_HEADLESS_CAPACITY,
  DEFAULT_HEADLESS_CONTAINER_SIZE,
  HeadlessBackend,
  createHeadlessBackend,
  type HeadlessBackendOptions,
  type HeadlessCall,
  type HeadlessFrame,
  type HeadlessNode,
  type HeadlessOp,
  type HeadlessWidgetKind,
} from "./testing/headlessBackend.js";

// =============================================================================
// Interface context
// =============================================================================

export type { FrameReport } from "./frame/frameController.js";
export { InterfaceContext, createInterface } from "./interface/createInterface.js";
