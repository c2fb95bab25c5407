import {
  CallKind,
  CallSite,
  MFA,
  ModuleRecord,
  ReferenceDirective,
  parseModuleName,
} from '../../src/parsers/elixir/';

/**
 * `mfa('App.Repo.all/1')`; the module part is parsed like a rendered name.
 */
export function mfa(text: string): MFA {
  const match = /^(.*)\.([^./]+)\/(\d+)$/.exec(text);
  if (!match) {
    throw new Error(`Malformed MFA: ${text}`);
  }
  return { module: parseModuleName(match[1]), name: match[2], arity: Number(match[3]) };
}

export function callSite(kind: CallKind, from: string, to: string): CallSite {
  return { kind, from: mfa(from), to: mfa(to) };
}

export function ref(kind: ReferenceDirective['kind'], target: string): ReferenceDirective {
  return { kind, target: parseModuleName(target) };
}

interface RecordParts {
  file?: string;
  functions?: string[];
  calls?: CallSite[];
  refs?: ReferenceDirective[];
}

export function record(name: string, parts: RecordParts = {}): ModuleRecord {
  return {
    name: parseModuleName(name),
    file: parts.file ?? `lib/${name.toLowerCase().replace(/\./g, '/')}.ex`,
    functions: (parts.functions ?? []).map(signature => {
      const [fnName, arity] = signature.split('/');
      return { name: fnName, arity: Number(arity) };
    }),
    calls: parts.calls ?? [],
    refs: parts.refs ?? [],
  };
}
