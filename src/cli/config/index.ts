/**
 * Configuration loading for the CLI.
 */

export {
  listTemplates,
  loadPipelineConfig,
  parsePipelineConfig,
  PipelineConfigSchema,
  provisionCommandFor,
  resolveCellsFromConfig,
  type CoverageConfig,
  type DocsConfig,
  type EnvironmentConfig,
  type LoadedPipeline,
  type PipelineConfig,
  type SnippetConfig,
} from './pipeline-config.ts';
