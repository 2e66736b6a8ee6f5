import type { Connection, PublishDiagnosticsParams, TextDocuments } from "vscode-languageserver/node.js";
import type { TextDocument } from "vscode-languageserver-textdocument";
import type { IniLanguageService } from "./service.js";

export interface Logger {
  log(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Open documents by URI; `TextDocuments` provides this. */
export interface DocumentStore {
  get(uri: string): TextDocument | undefined;
}

/** What feature handlers need: no connection, so they run against plain stores. */
export interface FeatureContext {
  readonly documents: DocumentStore;
  readonly logger: Logger;
  readonly service: IniLanguageService;
}

/** The part of a connection that publishes diagnostics. */
export interface DiagnosticsPublisher {
  sendDiagnostics(params: PublishDiagnosticsParams): Promise<void>;
}

/** What document-event handlers need. */
export interface PublishContext {
  readonly connection: DiagnosticsPublisher;
  readonly logger: Logger;
  readonly service: IniLanguageService;
}

/** Shared server state passed to every handler. */
export interface ServerContext extends FeatureContext, PublishContext {
  readonly connection: Connection;
  readonly documents: TextDocuments<TextDocument>;
}

export function formatError(error: unknown): string {
  return error instanceof Error ? (error.stack ?? error.message) : String(error);
}
