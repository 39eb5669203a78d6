/**
 * Barrel export for all shared types.
 */
export type { RawWork, FetchedWork, NormalizedPaper, PaperColumn, ColumnType } from './paper.js';
export type { DateWindow, PageRequest, WorksPage, WorksSource, WorksSourceOptions } from './source.js';
export type {
    PipelineState,
    FetchProgress,
    CollectResult,
    WorkCollector,
    UpsertOutcome,
    UpsertStats,
    RunSummary,
    CheckStatus,
    QualityCheckResult,
    QualityReport,
} from './pipeline.js';
export { DEFAULT_CONFIG, AI_SUBFIELD_ID, MAX_PAGE_SIZE } from './config.js';
export type { IngestConfig, LogLevel } from './config.js';
