export { VirtualPath } from './workspace/vpath';
export { type ByteProvider, type DirEntry, type Layer, type LayerKind, MemoryProvider, PhysicalProvider, WorkspaceError, type WorkspaceErrorCode } from './workspace/layers';
export { FileHandle } from './workspace/fileHandle';
export { Workspace, type WorkspaceEntry, type WorkspaceOptions } from './workspace/workspace';

export { type Span, type Token, type TokenKind, isTrivia } from './core/tokens';
export { DIRECTIVE_KEYWORDS, Tokenizer, tokenize } from './core/tokenizer';
export { BUILTIN_MACROS, type BuiltinName, type MacroDefines, type MacroDefinition, MacroTable } from './core/macro';
export { ExpansionFrame, type ExpansionStep, type OutputToken, type SourceLocation, type SyntheticKind, formatLocation, locationChain } from './core/location';
export { type CondResult, evaluateCondition } from './core/condExpr';
export { DEFAULT_MAX_EXPANSION_DEPTH } from './core/expander';
export { type ConditionalState, type ConditionalStateKind, type PreprocessResult, Preprocessor } from './core/preproc';
export { type PreprocessOptions, preprocess, preprocessFiles, preprocessText, renderText, significantTokens } from './core/pipeline';

export { type DiagCode, type DiagKind, type Diagnostic, DiagnosticCollector, PREPROC_DIAGCODES, type RelatedLocation, type Severity, codesWithSeverity, diagKindInfo, normalizeDiagCode } from './diagnostics';
export { type DisabledDiagnostics, filterDiagnostics, parseDisabledDiagList } from './diagSettings';
export { type FileTable, renderDiagnostic, renderDiagnostics, toLspDiagnostic } from './report';
export { type LayerConfig, type WorkspaceConfig, createWorkspace, loadWorkspaceConfig, loggerFrom, parseWorkspaceConfig, preprocessOptionsFrom } from './config';
export { type LogLevel, type LogSink, type Logger, type LoggerOptions, createLogger, defaultLogger, silentLogger } from './log';
