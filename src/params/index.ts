export { validateParams } from "./paramsValidator";
export { readPipelineSpec, isEmptyPipelineSpec } from "./pipelineSpec";
export { readSaveSpec } from "./saveSpec";
export { IssueCollector } from "./issues";
export { expandSiteAlias, loadSitesConfig, getSitesConfigPath } from "./siteAlias";
export {
  loadParamsFile,
  loadParamsInline,
  parseParamsJson,
  prepareParams,
} from "./loadParams";
export type { PrepareParamsOptions } from "./loadParams";
