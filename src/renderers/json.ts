import { z } from 'zod';
import { MFA, formatModuleName, parseModuleName } from '../parsers/elixir/';
import { AnalysisResult } from '../graph/module-graph';

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type GraphSection = keyof AnalysisResult;

export const GRAPH_SECTIONS: GraphSection[] = [
  'modules',
  'module_edges',
  'call_nodes',
  'call_edges',
  'module_call_edges',
];

/**
 * Pretty-printed JSON with object keys in code-unit order at every depth.
 * Array order is preserved; callers are responsible for canonical ordering.
 */
export function stableStringify(value: JsonValue, indent = 2): string {
  return JSON.stringify(sortKeys(value), null, indent);
}

function sortKeys(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: { [key: string]: JsonValue } = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(value[key]);
    }
    return sorted;
  }
  return value;
}

function encodeMfa(mfa: MFA): JsonValue {
  return [formatModuleName(mfa.module), mfa.name, mfa.arity];
}

/**
 * Plain JSON form of the requested sections. Module names become text and
 * MFAs become `[module, name, arity]` triples.
 */
export function encodeGraphs(
  result: AnalysisResult,
  sections: GraphSection[] = GRAPH_SECTIONS
): { [key: string]: JsonValue } {
  const encoded: { [key: string]: JsonValue } = {};

  for (const section of sections) {
    switch (section) {
      case 'modules':
        encoded.modules = result.modules.map(m => ({
          name: formatModuleName(m.name),
          file: m.file,
          functions: m.functions.map(f => ({ name: f.name, arity: f.arity })),
        }));
        break;
      case 'module_edges':
        encoded.module_edges = result.module_edges.map(e => ({
          from: formatModuleName(e.from),
          to: formatModuleName(e.to),
          kind: e.kind,
        }));
        break;
      case 'call_nodes':
        encoded.call_nodes = result.call_nodes.map(n => ({ mfa: encodeMfa(n.mfa) }));
        break;
      case 'call_edges':
        encoded.call_edges = result.call_edges.map(e => ({
          kind: e.kind,
          from: encodeMfa(e.from),
          to: encodeMfa(e.to),
        }));
        break;
      case 'module_call_edges':
        encoded.module_call_edges = result.module_call_edges.map(e => ({
          from: formatModuleName(e.from),
          to: formatModuleName(e.to),
        }));
        break;
    }
  }

  return encoded;
}

export function renderJson(result: AnalysisResult, sections: GraphSection[] = GRAPH_SECTIONS): string {
  return stableStringify(encodeGraphs(result, sections));
}

const MfaSchema = z.tuple([z.string(), z.string(), z.number().int().nonnegative()]);

export const GraphsDocumentSchema = z.object({
  modules: z.array(
    z.object({
      name: z.string(),
      file: z.string(),
      functions: z.array(z.object({ name: z.string(), arity: z.number().int().nonnegative() })),
    })
  ),
  module_edges: z.array(
    z.object({
      from: z.string(),
      to: z.string(),
      kind: z.enum(['call', 'alias', 'import', 'use']),
    })
  ),
  call_nodes: z.array(z.object({ mfa: MfaSchema })),
  call_edges: z.array(
    z.object({
      kind: z.enum(['local', 'remote']),
      from: MfaSchema,
      to: MfaSchema,
    })
  ),
  module_call_edges: z.array(z.object({ from: z.string(), to: z.string() })),
});

export type GraphsDocument = z.infer<typeof GraphsDocumentSchema>;

export class GraphsDocumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GraphsDocumentError';
  }
}

function decodeMfa([module, name, arity]: [string, string, number]): MFA {
  return { module: parseModuleName(module), name, arity };
}

/**
 * Read back a complete `graphs.json` document.
 */
export function decodeGraphs(text: string): AnalysisResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new GraphsDocumentError(
      `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = GraphsDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new GraphsDocumentError(
      `Not a graphs document: ${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
  }

  const doc = parsed.data;
  return {
    modules: doc.modules.map(m => ({
      name: parseModuleName(m.name),
      file: m.file,
      functions: m.functions,
    })),
    module_edges: doc.module_edges.map(e => ({
      from: parseModuleName(e.from),
      to: parseModuleName(e.to),
      kind: e.kind,
    })),
    call_nodes: doc.call_nodes.map(n => ({ mfa: decodeMfa(n.mfa) })),
    call_edges: doc.call_edges.map(e => ({
      kind: e.kind,
      from: decodeMfa(e.from),
      to: decodeMfa(e.to),
    })),
    module_call_edges: doc.module_call_edges.map(e => ({
      from: parseModuleName(e.from),
      to: parseModuleName(e.to),
    })),
  };
}
