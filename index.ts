export * from './core/compare';
export * from './core/report';
export { DxfEntityExtractor, extractDrawing } from './core/processors/dxf';
export type { ExtractionResult } from './core/processors/dxf';
export { findDrawingPairs, runBatch, batchExitCode } from './core/batch/batch-runner';
export type { BatchOptions, BatchResult, BatchPairResult, DrawingPair } from './core/batch/batch-runner';
export { runCli } from './core/cli/run';
export { DrawingCompareError, ExtractionError, ConfigurationError } from './core/errors/types';
export { LogManager } from './core/logging/log-manager';
export { createLogger, logger } from './utils/logging/logger';
export * from './types/entities';
export * from './types/compare';
