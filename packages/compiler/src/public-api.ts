export type { CfgOverrides, CfgSet } from "./ffi/cfg.js";
export { defaultCfg, withOverrides } from "./ffi/cfg.js";
export type { Diagnostic, DiagnosticCode, DiagnosticKind, DiagnosticSeverity } from "./ffi/diagnostics.js";
export {
  DIAGNOSTIC_CODES,
  DiagnosticsCollector,
  TranslateError,
  assertDiagnosticCode,
  formatDiagnostic,
  isDiagnosticCode,
} from "./ffi/diagnostics.js";
export { parseItems } from "./ffi/items.js";
export type { LexResult } from "./ffi/lexer.js";
export { lexSource, parseSourceFile } from "./ffi/lexer.js";
export type { ProfileOverrides, PointerSyntax, TargetArch, TargetProfile } from "./ffi/profile.js";
export {
  asRecord,
  asString,
  asStringArray,
  asStringMap,
  asWidths,
  parseProfileFile,
  withProfileOverrides,
  zigProfile,
} from "./ffi/profile.js";
export type { Corpus, Delimiter, SourceFile, SourceItem, Span, TokenTree } from "./ffi/syntax.js";
export { spanText } from "./ffi/syntax.js";
export type { EmittedModule, TranslateOptions, TranslateResult, UnresolvedPolicy } from "./translate.js";
export { translate, unitFileName } from "./translate.js";
