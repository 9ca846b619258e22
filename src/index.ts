export { RepoAnalyzer, analyzeRepository, AnalyzeOptions, MAX_EXTENSIONS, MAX_TOP_DIRS } from './analyzer/RepoAnalyzer';
export { classifyLanguages, languageForExtension } from './analyzer/LanguageClassifier';
export { detectPatterns, KNOWN_PATTERNS, PatternInput } from './analyzer/PatternDetector';
export { mergeManifestResults, MergedManifests } from './analyzer/AnalysisMerger';
export { readKeyFiles, KEY_FILES, KeyFileOptions } from './analyzer/KeyFileReader';
export { ConfigLoader, toAnalyzeOptions } from './config/ConfigLoader';
export { AnalyzerConfig, DEFAULT_CONFIG } from './config/schema';
export { GitHistoryProvider } from './history/GitHistoryProvider';
export { DEFAULT_HISTORY_OPTIONS, HistoryOptions, HistoryProvider, HistorySummary } from './history/HistoryProvider';
export { classifyLicenseText, LicenseDetector } from './manifests/LicenseDetector';
export { ManifestInterpreter, PartialManifestResult } from './manifests/ManifestInterpreter';
export { MANIFEST_FILES, ManifestKind, ManifestRegistry } from './manifests/ManifestRegistry';
export {
    AnalysisIssue,
    AnalysisStage,
    CommitSummary,
    Contributor,
    InvalidRepositoryPathError,
    RepoAnalysis,
} from './models/RepoAnalysis';
export { ReportGenerator } from './reporter/ReportGenerator';
export { classifyFile } from './walker/TreeRules';
export { TreeWalker, WalkOptions } from './walker/TreeWalker';
