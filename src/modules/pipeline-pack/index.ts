export { createPackLoader, builtInPacksDir, resolvePackPath, MANIFEST_FILE } from './pack-loader.js'
export type { PackLoader, PackInfo } from './pack-loader.js'
export { PipelinePack } from './pipeline-pack.js'
export { validateStageGraph, detectCycle } from './stage-graph.js'
export { PipelineManifestSchema, StageDefinitionSchema, STAGE_GROUPS } from './schemas.js'
export type { PipelineManifest, StageDefinition, StageGroup } from './schemas.js'
