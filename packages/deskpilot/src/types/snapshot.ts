export interface ImageHandle {
  id: string;
  width: number;
  height: number;
  /** Lazily loads the encoded image for vision-capable endpoints. */
  loadBase64?: () => Promise<string>;
}

export interface Bounds {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface TextRegion {
  text: string;
  bounds: Bounds;
  confidence: number;
}

export interface UiElement {
  id: string;
  role: string;
  label: string;
  bounds: Bounds;
}

export interface Snapshot {
  id: string;
  capturedAtMs: number;
  image: ImageHandle;
  textRegions: TextRegion[];
  elements: UiElement[];
  /** Optional natural-language description from a vision model. */
  description?: string;
}

/** What survives of a snapshot once the reasoning step has consumed it. */
export interface SnapshotSummary {
  snapshotId: string;
  capturedAtMs: number;
  text: string;
  elementCount: number;
  elements: Array<Pick<UiElement, "id" | "role" | "label">>;
  description?: string;
}
