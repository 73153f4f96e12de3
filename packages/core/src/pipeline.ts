import { aggregate } from "./aggregator.js";
import type { Aggregation, PipelineContext, RoutedItem } from "./types.js";

export interface PipelineSteps<TSource, TRenderResult> {
  collect: (ctx: PipelineContext) => Promise<TSource[]> | TSource[];
  normalize: (sources: TSource[], ctx: PipelineContext) => Promise<RoutedItem[]> | RoutedItem[];
  render: (aggregation: Aggregation, ctx: PipelineContext) => Promise<TRenderResult> | TRenderResult;
}

export interface PipelineRunResult<TRenderResult> {
  aggregation: Aggregation;
  sourceCount: number;
  output: TRenderResult;
}

export async function runPipeline<TSource, TRenderResult>(
  steps: PipelineSteps<TSource, TRenderResult>,
  ctx: PipelineContext
): Promise<PipelineRunResult<TRenderResult>> {
  const sources = await steps.collect(ctx);
  const items = await steps.normalize(sources, ctx);
  const aggregation = aggregate(items);
  const output = await steps.render(aggregation, ctx);
  return { aggregation, sourceCount: sources.length, output };
}
