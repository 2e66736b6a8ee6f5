/**
 * LSP feature handlers: hover and document symbols.
 */
import type {
  DocumentSymbol,
  DocumentSymbolParams,
  Hover,
  TextDocumentPositionParams,
} from "vscode-languageserver/node.js";
import { formatError, type FeatureContext, type ServerContext } from "../context.js";

export function handleHover(ctx: FeatureContext, params: TextDocumentPositionParams): Hover | null {
  try {
    const doc = ctx.documents.get(params.textDocument.uri);
    if (!doc) return null;
    return ctx.service.hover(doc, params.position);
  } catch (e) {
    ctx.logger.error(`[hover] failed for ${params.textDocument.uri}: ${formatError(e)}`);
    return null;
  }
}

export function handleDocumentSymbol(ctx: FeatureContext, params: DocumentSymbolParams): DocumentSymbol[] {
  try {
    const doc = ctx.documents.get(params.textDocument.uri);
    if (!doc) return [];
    return ctx.service.symbols(doc);
  } catch (e) {
    ctx.logger.error(`[documentSymbol] failed for ${params.textDocument.uri}: ${formatError(e)}`);
    return [];
  }
}

export function registerFeatureHandlers(ctx: ServerContext): void {
  ctx.connection.onHover((params) => handleHover(ctx, params));
  ctx.connection.onDocumentSymbol((params) => handleDocumentSymbol(ctx, params));
}
