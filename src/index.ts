// Model types
export type { ChangeKind, FileChangeRecord, LineRange } from './model/change.js';
export type { Category, CommitAnalysis, CommitTotals, SummarySource } from './model/analysis.js';
export { CATEGORY_PRIORITY, commitAnalysisSchema, shortId } from './model/analysis.js';
export { normalizeRanges } from './model/change.js';

// Engine
export { ChangelogEngine, analysisFingerprint } from './engine.js';
export type { EngineOptions, WriteResult } from './engine.js';

// Git
export { GitBridge } from './git/bridge.js';
export { splitCommitDiff } from './git/diff-reader.js';
export type { CommitDescriptor, CommitRange, CommitSource, FileDiff, FileStatus } from './git/types.js';

// Parser system
export type { SymbolDetector, Declaration, HunkLine } from './parser/detector.js';
export { DetectorRegistry } from './parser/registry.js';
export { createDefaultRegistry } from './parser/detectors/index.js';
export { parseFileDiff } from './parser/diff-parser.js';

// Analysis
export { CommitAnalyzer, breakingReasons, DEFAULT_THRESHOLDS } from './analysis/analyzer.js';
export type { AnalyzerOptions, BreakingThresholds } from './analysis/analyzer.js';
export { classifyCommit } from './analysis/classifier.js';

// AI
export type { Summarizer, SummaryRequest, SummaryResult, AiSummary } from './ai/summarizer.js';
export { AnthropicSummarizer } from './ai/anthropic.js';

// Storage
export { CommitCache } from './storage/cache.js';
export type { AnalysisStore } from './storage/cache.js';

// Changelog
export { groupSessions } from './changelog/sessions.js';
export type { ChangelogSession, GroupingPolicy, SessionEntry } from './changelog/sessions.js';
export { renderChangelog, renderSession } from './changelog/renderer.js';
export { parseDocument, mergeDocument, listDocumentedCommits } from './changelog/document.js';

// Config, errors, logging
export { loadConfig, defaultConfig } from './config/config.js';
export type { DiffscribeConfig } from './config/config.js';
export * from './errors.js';
export { createLogger, silentLogger } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
