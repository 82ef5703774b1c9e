/**
 * ScrapePipeline: advertiser name → { advertiser_id, tags, image_text }.
 *
 * One run walks the stages strictly in order:
 *   Idle → Resolving → Navigating → Inventorying → [CheckingVideos] → ExtractingImages → Assembled
 * and any stage may end in Failed(kind). CheckingVideos runs only when video
 * detection is on; its failures are logged and reported as an unknown count.
 * The browser session is held only for the browser stages; it is released
 * before image extraction starts, since OCR works from downloaded bytes and
 * needs no page.
 *
 * Every failure leaving run() is a ScrapeError. Errors a stage did not classify
 * itself are mapped by the stage they escaped from.
 */

import { randomUUID } from "node:crypto";
import { advertiserPageUrl, advertiserVideoPageUrl } from "../advertiser/advertiserId.js";
import type { AdvertiserResolver } from "../advertiser/AdvertiserResolver.js";
import type { AdvertiserQuery } from "../advertiser/types.js";
import type { SessionPool } from "../browser/SessionPool.js";
import type { BrowserSession } from "../browser/types.js";
import { ScrapeError, describeAbortReason, errorMessage, isScrapeError, throwIfCancelled } from "../errors.js";
import type { ScrapeFailureKind } from "../errors.js";
import type { ImageTextExtractor } from "../ocr/ImageTextExtractor.js";
import { DomInventory } from "../page/DomInventory.js";
import { countVideoIndicators } from "../page/videoIndicators.js";
import type { PipelineStage, PipelineState, PipelineTransition, ScrapeResult, ScrapeRunOptions } from "./types.js";

/** Anything rendered under <body> counts as content on an advertiser page */
export const ADVERTISER_CONTENT_SELECTOR = "body *";

const UNCLASSIFIED_FAILURE: Record<PipelineStage, ScrapeFailureKind> = {
  Idle: "NavigationError",
  Resolving: "NavigationError",
  Navigating: "NavigationError",
  Inventorying: "EmptyDocument",
  CheckingVideos: "NavigationError",
  ExtractingImages: "EngineUnavailable",
};

export type ScrapePipelineDeps = {
  pool: SessionPool;
  resolver: AdvertiserResolver;
  extractor: ImageTextExtractor;
  inventory?: DomInventory;
  portalUrl: string;
  region: string;
  navigationTimeoutMs: number;
  contentTimeoutMs: number;
  /** Default for ScrapeRunOptions.detectVideos */
  detectVideos?: boolean;
  onTransition?: (transition: PipelineTransition) => void;
};

export function describeState(state: PipelineState): string {
  return typeof state === "string" ? state : `Failed(${state.failed})`;
}

class RunState {
  stage: PipelineStage = "Idle";
  private current: PipelineState = "Idle";

  constructor(
    readonly runId: string,
    private readonly onTransition?: (transition: PipelineTransition) => void,
  ) {}

  enter(to: PipelineStage | "Assembled" | { failed: ScrapeFailureKind }): void {
    const from = this.current;
    this.current = to;
    if (typeof to === "string" && to !== "Assembled") this.stage = to;
    console.info(`[ScrapePipeline:${this.runId}] ${describeState(from)} → ${describeState(to)}`);
    this.onTransition?.({ runId: this.runId, from, to, at: Date.now() });
  }
}

type VideoSummary = { has_videos: boolean; video_count: number | null };

export class ScrapePipeline {
  private readonly deps: ScrapePipelineDeps;
  private readonly inventory: DomInventory;

  constructor(deps: ScrapePipelineDeps) {
    this.deps = deps;
    this.inventory = deps.inventory ?? new DomInventory();
  }

  async run(query: AdvertiserQuery, options: ScrapeRunOptions = {}): Promise<ScrapeResult> {
    const state = new RunState(randomUUID().slice(0, 8), this.deps.onTransition);
    const { signal } = options;
    const timeouts = {
      navigationTimeoutMs: options.navigationTimeoutMs ?? this.deps.navigationTimeoutMs,
      contentTimeoutMs: options.contentTimeoutMs ?? this.deps.contentTimeoutMs,
    };

    try {
      const name = query.name.trim();
      if (!name) throw new ScrapeError("InvalidQuery", "advertiser name cannot be empty");
      throwIfCancelled(signal);

      const page = await this.deps.pool.withSession(async (session) => {
        state.enter("Resolving");
        const advertiser = await this.deps.resolver.resolve(session, name, timeouts);
        console.info(`[ScrapePipeline:${state.runId}] "${name}" → ${advertiser.advertiserId} (${advertiser.source})`);
        throwIfCancelled(signal);

        state.enter("Navigating");
        const url = advertiserPageUrl(this.deps.portalUrl, advertiser.advertiserId, this.deps.region);
        await session.navigate(url, timeouts.navigationTimeoutMs);
        try {
          await session.waitForContent(ADVERTISER_CONTENT_SELECTOR, timeouts.contentTimeoutMs);
        } catch (err) {
          if (!isScrapeError(err, "ContentTimeout")) throw err;
          console.warn(`[ScrapePipeline:${state.runId}] advertiser page still empty, inventorying anyway: ${err.detail}`);
        }
        throwIfCancelled(signal);

        state.enter("Inventorying");
        const inventory = this.inventory.inventory(await session.snapshot());

        let videos: VideoSummary | undefined;
        if (options.detectVideos ?? this.deps.detectVideos ?? false) {
          state.enter("CheckingVideos");
          videos = await this.checkVideos(session, advertiser.advertiserId, timeouts, state.runId, signal);
        }
        return { advertiserId: advertiser.advertiserId, inventory, videos };
      }, signal);

      state.enter("ExtractingImages");
      const outcomes = await this.deps.extractor.extractAll(page.inventory.images, signal);
      const imageText: string[] = [];
      for (const outcome of outcomes) {
        if (outcome.text) imageText.push(outcome.text);
      }

      state.enter("Assembled");
      console.info(
        `[ScrapePipeline:${state.runId}] done: ${page.inventory.tags.length} tags, ` +
          `${imageText.length}/${outcomes.length} images with text`,
      );
      return { advertiser_id: page.advertiserId, tags: page.inventory.tags, image_text: imageText, ...page.videos };
    } catch (err) {
      const failure = this.classify(err, state.stage, signal);
      state.enter({ failed: failure.kind });
      console.error(`[ScrapePipeline:${state.runId}] failed in ${state.stage}: ${failure.message}`);
      throw failure;
    }
  }

  /** Best effort: anything but cancellation becomes has_videos false, video_count null */
  private async checkVideos(
    session: BrowserSession,
    advertiserId: string,
    timeouts: { navigationTimeoutMs: number; contentTimeoutMs: number },
    runId: string,
    signal?: AbortSignal,
  ): Promise<VideoSummary> {
    const url = advertiserVideoPageUrl(this.deps.portalUrl, advertiserId, this.deps.region);
    try {
      await session.navigate(url, timeouts.navigationTimeoutMs);
      try {
        await session.waitForContent(ADVERTISER_CONTENT_SELECTOR, timeouts.contentTimeoutMs);
      } catch (err) {
        if (!isScrapeError(err, "ContentTimeout")) throw err;
      }
      const count = countVideoIndicators(await session.snapshot());
      console.info(`[ScrapePipeline:${runId}] ${count} video creatives for ${advertiserId}`);
      return { has_videos: count > 0, video_count: count };
    } catch (err) {
      throwIfCancelled(signal);
      if (isScrapeError(err, "Cancelled")) throw err;
      console.warn(`[ScrapePipeline:${runId}] video check failed for ${advertiserId}: ${errorMessage(err)}`);
      return { has_videos: false, video_count: null };
    }
  }

  private classify(err: unknown, stage: PipelineStage, signal?: AbortSignal): ScrapeError {
    if (isScrapeError(err)) return err;
    if (signal?.aborted) {
      return new ScrapeError("Cancelled", `run cancelled: ${describeAbortReason(signal.reason)}`, { cause: err });
    }
    return new ScrapeError(UNCLASSIFIED_FAILURE[stage], `${stage}: ${errorMessage(err)}`, { cause: err });
  }
}
