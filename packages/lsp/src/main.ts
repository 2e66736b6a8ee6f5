/**
 * INI language server entry point.
 *
 * Creates the connection and document store and wires the handlers:
 * - handlers/lifecycle.ts - initialize and document events (diagnostics)
 * - handlers/features.ts  - hover and document symbols
 */
import { createConnection, ProposedFeatures, TextDocuments } from "vscode-languageserver/node.js";
import { TextDocument } from "vscode-languageserver-textdocument";
import type { Logger, ServerContext } from "./context.js";
import { registerFeatureHandlers } from "./handlers/features.js";
import { registerLifecycleHandlers, SERVER_NAME } from "./handlers/lifecycle.js";
import { IniLanguageService } from "./service.js";

const connection = createConnection(ProposedFeatures.all);
const documents = new TextDocuments(TextDocument);

const logger: Logger = {
  log: (m: string) => connection.console.log(`[${SERVER_NAME}] ${m}`),
  info: (m: string) => connection.console.info(`[${SERVER_NAME}] ${m}`),
  warn: (m: string) => connection.console.warn(`[${SERVER_NAME}] ${m}`),
  error: (m: string) => connection.console.error(`[${SERVER_NAME}] ${m}`),
};

const ctx: ServerContext = {
  connection,
  documents,
  logger,
  service: new IniLanguageService(),
};

registerLifecycleHandlers(ctx);
registerFeatureHandlers(ctx);

documents.listen(connection);
connection.listen();
