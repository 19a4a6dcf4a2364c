export { executePipeline, configuredStages, type PipelineResult } from "./pipelineEngine";
export { parseTransforms, applyTransforms, stripQueryString, urlDecode, pathOnly } from "./transform";
export { parseWhere, applyWhere, referencedColumns } from "./where";
export { parseAggregates, applyGroupAggregate, aggregateValues } from "./groupAggregate";
export { parseSort, applySort } from "./sort";
export { applyColumns, applyHead } from "./columns";
export { compareValues, compareCellsNullsLast, splitList } from "./compare";
