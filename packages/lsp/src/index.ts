// @inispan/lsp
//
// Maps parse results onto Language Server Protocol shapes; `main.ts` runs them as a server.

export { createIniDocument, documentStartRange, INI_LANGUAGE_ID, spanToRange } from "./ranges.js";
export { DIAGNOSTIC_SOURCE, toLspDiagnostics, toLspSeverity } from "./diagnostics.js";
export { DEFAULTS_SYMBOL_NAME, documentSymbols } from "./symbols.js";
export { hoverAt } from "./hover.js";
export {
  IniLanguageService,
  optionsFromInitialization,
  type Analysis,
  type LanguageServiceOptions,
} from "./service.js";
export {
  formatError,
  type DiagnosticsPublisher,
  type DocumentStore,
  type FeatureContext,
  type Logger,
  type PublishContext,
  type ServerContext,
} from "./context.js";
export { handleDocumentSymbol, handleHover, registerFeatureHandlers } from "./handlers/features.js";
export {
  buildInitializeResult,
  closeDocument,
  refreshDocument,
  registerLifecycleHandlers,
  SERVER_NAME,
} from "./handlers/lifecycle.js";
