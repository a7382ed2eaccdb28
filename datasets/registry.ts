/**
 * Dataset registry
 *
 * Dataset modules register their pipeline definition on import; the CLI
 * looks them up by name.
 */

import type { PipelineConfig, SourceConfig } from './types'

const pipelines: Map<string, PipelineConfig> = new Map()

/**
 * Register a pipeline configuration
 */
export function registerPipeline(config: PipelineConfig): void {
  pipelines.set(config.name, config)
}

/**
 * Get a pipeline by name
 */
export function getPipeline(name: string): PipelineConfig | undefined {
  return pipelines.get(name)
}

/**
 * Get pipeline names
 */
export function getPipelineNames(): string[] {
  return Array.from(pipelines.keys())
}

/**
 * Find a source definition by entity name
 */
export function getSource(config: PipelineConfig, entity: string): SourceConfig | undefined {
  return config.sources.find((source) => source.entity === entity)
}
