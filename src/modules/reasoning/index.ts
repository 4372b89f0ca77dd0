export type { ReasoningCapability, ReasoningRequest, ReasoningResponse, StageOutput } from './types.js'
export { StageOutputSchema } from './output-schema.js'
export { extractYamlBlock, parseYamlResult } from './yaml-parser.js'
export type { YamlParseResult } from './yaml-parser.js'
export { ClaudeCliCapability, createClaudeCliCapability } from './claude-cli-capability.js'
export type { ClaudeCliCapabilityOptions } from './claude-cli-capability.js'
