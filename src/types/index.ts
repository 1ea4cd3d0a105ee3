/**
 * Barrel export for all shared types.
 */
export type {
    Paper,
    TallyCounts,
    TallyField,
    TallyRecord,
    EnrichedPaper,
    WorkText,
} from './paper.js';
export { TALLY_FIELDS, ZERO_TALLIES } from './paper.js';
export { EdgeRole, EDGE_ROLES, isEdgeRole, edgeKey } from './edge.js';
export type { CitationEdge, EdgeRoleResult, EdgeRoleAnnotation } from './edge.js';
export { DEFAULT_CONFIG, STAGES } from './config.js';
export type {
    RoleGraphConfig,
    LogLevel,
    StageName,
    DelayConfig,
    LlmConfig,
    RunRecord,
    StageRecord,
} from './config.js';
export type {
    MetadataSource,
    TallySource,
    EdgeRoleClassifier,
    EdgeRoleInput,
    EdgeEndpointText,
    SourceOptions,
} from './collaborators.js';
export type {
    LlmProvider,
    LlmCompletionParams,
    LlmCompletionResult,
    LlmProviderOptions,
    TokenUsage,
} from './llm-provider.js';
