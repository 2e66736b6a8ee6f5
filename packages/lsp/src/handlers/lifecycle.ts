/**
 * LSP lifecycle handlers: initialize, document events, configuration.
 */
import {
  TextDocumentSyncKind,
  type Diagnostic,
  type InitializeParams,
  type InitializeResult,
} from "vscode-languageserver/node.js";
import type { TextDocument } from "vscode-languageserver-textdocument";
import { formatError, type PublishContext, type ServerContext } from "../context.js";
import { optionsFromInitialization } from "../service.js";

export const SERVER_NAME = "inispan-lsp";

export function buildInitializeResult(): InitializeResult {
  return {
    capabilities: {
      textDocumentSync: TextDocumentSyncKind.Incremental,
      hoverProvider: true,
      documentSymbolProvider: true,
    },
    serverInfo: { name: SERVER_NAME },
  };
}

/** Parse the document and publish its diagnostics; an analysis failure publishes none. */
export async function refreshDocument(ctx: PublishContext, doc: TextDocument): Promise<void> {
  let diagnostics: Diagnostic[];
  try {
    diagnostics = ctx.service.diagnostics(doc);
  } catch (e) {
    ctx.logger.error(`refreshDocument failed: ${formatError(e)}`);
    diagnostics = [];
  }
  await publishDiagnostics(ctx, doc.uri, diagnostics);
}

/** Drop the cached analysis and clear the client's diagnostics for a closed document. */
export async function closeDocument(ctx: PublishContext, uri: string): Promise<void> {
  ctx.service.forget(uri);
  await publishDiagnostics(ctx, uri, []);
}

async function publishDiagnostics(ctx: PublishContext, uri: string, diagnostics: Diagnostic[]): Promise<void> {
  try {
    await ctx.connection.sendDiagnostics({ uri, diagnostics });
  } catch (e) {
    ctx.logger.error(`[diagnostics] publish failed for ${uri}: ${formatError(e)}`);
  }
}

export function registerLifecycleHandlers(ctx: ServerContext): void {
  ctx.connection.onInitialize((params: InitializeParams): InitializeResult => {
    try {
      ctx.service.configure(optionsFromInitialization(params.initializationOptions));
    } catch (e) {
      ctx.logger.warn(`ignoring initialization options: ${formatError(e)}`);
    }
    ctx.logger.info(`initialized (interpolation=${ctx.service.dialect.interpolation})`);
    return buildInitializeResult();
  });

  ctx.documents.onDidChangeContent(async (change) => {
    await refreshDocument(ctx, change.document);
  });

  ctx.documents.onDidClose(async (event) => {
    await closeDocument(ctx, event.document.uri);
  });
}
