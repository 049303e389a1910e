import type { Diagnostic, DiagnosticSeverity } from '../core/diagnostics.js';
import type { VoiceKey } from '../core/score.js';
import type { XmlLocation, XmlNode } from './xml-ast.js';

/** `strict` turns warnings into errors and withholds the score on any error. */
export type ParserMode = 'strict' | 'lenient';

/** Per-invocation parser state shared by the parsing passes. */
export interface ParseContext {
  mode: ParserMode;
  voiceKey: VoiceKey;
  sourceName?: string;
  diagnostics: Diagnostic[];
  failed: boolean;
}

export function createParseContext(mode: ParserMode, voiceKey: VoiceKey, sourceName?: string): ParseContext {
  return { mode, voiceKey, sourceName, diagnostics: [], failed: false };
}

/** Record a diagnostic, escalating warnings to errors in strict mode. */
export function addDiagnostic(
  ctx: ParseContext,
  code: string,
  severity: DiagnosticSeverity,
  message: string,
  node?: XmlNode,
  location?: XmlLocation
): void {
  const effective = ctx.mode === 'strict' && severity === 'warning' ? 'error' : severity;
  if (effective === 'error') {
    ctx.failed = true;
  }

  const at = location ?? node?.location;
  ctx.diagnostics.push({
    code,
    severity: effective,
    message,
    source: at ? { name: ctx.sourceName, ...at } : undefined,
    xmlPath: node?.path
  });
}

/** Append diagnostics produced outside the context (e.g. archive extraction), applying the mode. */
export function mergeDiagnostics(ctx: ParseContext, diagnostics: readonly Diagnostic[]): void {
  for (const diagnostic of diagnostics) {
    addDiagnostic(ctx, diagnostic.code, diagnostic.severity, diagnostic.message);
  }
}
