import type { ScrapeFailureKind } from "../errors.js";

export type PipelineStage =
  | "Idle"
  | "Resolving"
  | "Navigating"
  | "Inventorying"
  | "CheckingVideos"
  | "ExtractingImages";

/** Failed carries the kind that ended the run */
export type PipelineState = PipelineStage | "Assembled" | { failed: ScrapeFailureKind };

export type PipelineTransition = {
  runId: string;
  from: PipelineState;
  to: PipelineState;
  at: number;
};

export type ScrapeResult = {
  advertiser_id: string;
  /** Distinct lowercase tag names in document order */
  tags: string[];
  /** Non-empty OCR texts, in image discovery order */
  image_text: string[];
  /** Present only when video detection ran */
  has_videos?: boolean;
  /** null when the video page could not be checked */
  video_count?: number | null;
};

export type ScrapeRunOptions = {
  signal?: AbortSignal;
  navigationTimeoutMs?: number;
  contentTimeoutMs?: number;
  /** Also visit the video-format page and count video creatives */
  detectVideos?: boolean;
};
