/**
 * Analysis output and the ordered narrative handed to the renderer.
 */

export type AnalysisStatus = "analysed" | "failed";

export interface AnalysisResult {
  index: number;
  text: string;
  status: AnalysisStatus;
  attempts: number;
  error?: string;
}

export interface NarrativeSection {
  index: number;
  heading: string;
  body: string;
  status: AnalysisStatus;
}

export interface NarrativeDocument {
  /** Only present when the change was split into several sections. */
  overview?: string;
  /** Informational degradation notes (missing or truncated context). */
  notes: string[];
  sections: NarrativeSection[];
  chunkCount: number;
  failedCount: number;
}

export interface RenderableSection {
  heading: string;
  body: string;
}
