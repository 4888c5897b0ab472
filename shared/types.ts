// --- Geometry ---

/** horizontal = children stacked top/bottom, vertical = children side-by-side */
export type Orientation = "horizontal" | "vertical";

export type Direction = "left" | "right" | "top" | "bottom";

export const DIRECTIONS: readonly Direction[] = ["left", "right", "top", "bottom"];

export function parseDirection(value: string): Direction | undefined {
  return DIRECTIONS.find((d) => d === value.toLowerCase());
}

// --- Persisted layout document ---

export const LAYOUT_VERSION = "2.0";

export interface PanelDocument {
  type: "panel";
  id: string;
  title: string;
  contentRef: string;
  minSize: number;
  closable?: boolean;
}

export interface SplitDocument {
  type: "split";
  id: string;
  orientation: Orientation;
  splitRatio: number;
  minSize: number;
  first?: NodeDocument;
  second?: NodeDocument;
}

export type NodeDocument = PanelDocument | SplitDocument;

export interface LayoutDocument {
  version: string;
  minPanelSize: number;
  root?: NodeDocument;
}

// --- Panels ---

export interface PanelSpec {
  id: string;
  title?: string;
  contentRef?: string;
  minSize?: number;
  closable?: boolean;
}

export interface PanelSummary {
  id: string;
  title: string;
  contentRef: string;
  minSize: number;
  closable: boolean;
}

// --- Change notifications ---

export type LayoutEvent =
  | { type: "root_changed" }
  | { type: "panel_count_changed"; count: number }
  | { type: "panel_added"; panelId: string }
  | { type: "panel_removed"; panelId: string }
  | { type: "ratio_changed"; splitId: string; ratio: number }
  | { type: "min_panel_size_changed"; minPanelSize: number }
  | { type: "layout_cleared" }
  | { type: "layout_loaded" }
  | { type: "layout_changed" };

// --- Validation ---

export interface ValidationReport {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}
