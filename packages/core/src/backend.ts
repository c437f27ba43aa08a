/**
 * Backend interface for engine-driver communication.
 *
 * The engine is backend-agnostic. A backend owns widget drawing and keeps
 * its own container stack that mirrors the engine's start/end calls 1:1;
 * it holds no engine state. The engine guarantees that every end call it
 * issues closes the backend's innermost container.
 */

/** Panel placement in backend pixels. */
export type Rect = Readonly<{
  x: number;
  y: number;
  width: number;
  height: number;
}>;

export type PixelSize = Readonly<{
  width: number;
  height: number;
}>;

/**
 * Style snapshot handed to the backend with each draw call.
 */
export type InterfaceStyle = Readonly<{
  font: string | null;
  fontSize: number | null;
  labelWidth: number;
}>;

export interface InterfaceBackend {
  // ---------------------------------------------------------------------------
  // Frame lifecycle
  // ---------------------------------------------------------------------------

  /** True once startFrame() ran and draw() has not been called since. */
  isFrameStarted(): boolean;

  /**
   * Start (or restart) the frame. Restarting discards every element and
   * every open container the backend holds for the current frame.
   */
  startFrame(): void;

  /** True when too many items were created since the frame started. */
  isCapacityExhausted(): boolean;

  /** Render the frame and end it. */
  draw(style: InterfaceStyle): void;

  // ---------------------------------------------------------------------------
  // Layout
  // ---------------------------------------------------------------------------

  /**
   * Apply row layout to the innermost container.
   *
   * @param widths - Column widths in pixels; -1 fills the remaining space
   */
  setLayout(widths: readonly number[], height: number): void;

  /** Pixel size of the innermost container's content area. */
  getContainerPixelSize(): PixelSize;

  // ---------------------------------------------------------------------------
  // Containers
  // ---------------------------------------------------------------------------

  /** Returns false when the panel is closed; no end call follows then. */
  startPanel(name: string, rect: Rect): boolean;
  endPanel(): void;

  /** Returns true only while the popup is open (see openPopup). */
  startPopup(name: string): boolean;
  endPopup(): void;
  openPopup(name: string): void;

  /** Insets are always open. */
  startInset(name: string): void;
  endInset(): void;

  /** Returns true while the node is expanded. */
  startTreenode(name: string): boolean;
  endTreenode(): void;

  /** Columns are always open. */
  startColumn(): void;
  endColumn(): void;

  // ---------------------------------------------------------------------------
  // Widgets
  // ---------------------------------------------------------------------------

  /** Returns true while the header is expanded. */
  header(label: string): boolean;
  label(text: string): void;
  text(text: string): void;
  button(text: string): boolean;
  checkbox(text: string, value: boolean): boolean;
  slider(value: number, min: number, max: number): number;
  numberBox(value: number, step: number): number;
  textBox(value: string): string;

  /** Whether the most recent widget changed its value this frame. */
  lastChanged(): boolean;
  /** Whether the most recent widget was confirmed (e.g. Enter in a text box). */
  lastConfirmed(): boolean;

  // ---------------------------------------------------------------------------
  // Style
  // ---------------------------------------------------------------------------

  setFont(name: string): void;
  setFontSize(size: number): void;
}
