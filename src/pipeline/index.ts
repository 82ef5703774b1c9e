export { ADVERTISER_CONTENT_SELECTOR, ScrapePipeline, describeState } from "./ScrapePipeline.js";
export type { ScrapePipelineDeps } from "./ScrapePipeline.js";
export type { PipelineStage, PipelineState, PipelineTransition, ScrapeResult, ScrapeRunOptions } from "./types.js";
