export interface QualifiedName {
  readonly kind: 'qualified';
  readonly segments: readonly string[];
}

export interface UnknownModule {
  readonly kind: 'unknown';
}

/**
 * Statically known module identity, or the sentinel for a reference that could
 * not be resolved. The sentinel never takes part in alias expansion.
 */
export type ModuleName = QualifiedName | UnknownModule;

export const UNKNOWN_MODULE: UnknownModule = Object.freeze({ kind: 'unknown' });

export const UNKNOWN_MODULE_TEXT = 'unknown';

export function qualifiedName(segments: readonly string[]): QualifiedName {
  return { kind: 'qualified', segments: [...segments] };
}

/**
 * Parse the text form produced by {@link formatModuleName}.
 * `Foo.Bar` splits on dots; an Erlang module (`:lists`) is a single segment.
 */
export function parseModuleName(text: string): ModuleName {
  if (text === UNKNOWN_MODULE_TEXT || text.length === 0) {
    return UNKNOWN_MODULE;
  }
  if (text.startsWith(':')) {
    return qualifiedName([text]);
  }
  return qualifiedName(text.split('.'));
}

export function isKnown(name: ModuleName): name is QualifiedName {
  return name.kind === 'qualified';
}

export function formatModuleName(name: ModuleName): string {
  return isKnown(name) ? name.segments.join('.') : UNKNOWN_MODULE_TEXT;
}

export function moduleNamesEqual(a: ModuleName, b: ModuleName): boolean {
  if (!isKnown(a) || !isKnown(b)) {
    return a.kind === b.kind;
  }
  return (
    a.segments.length === b.segments.length && a.segments.every((s, i) => s === b.segments[i])
  );
}

/**
 * Collision-free key for maps and sets; segment-wise equality carries over.
 */
export function moduleKey(name: ModuleName): string {
  return isKnown(name) ? name.segments.join('\u0000') : '\u0001';
}

export function lastSegment(name: QualifiedName): string {
  return name.segments[name.segments.length - 1];
}

export function appendSegments(name: ModuleName, segments: readonly string[]): ModuleName {
  return isKnown(name) ? qualifiedName([...name.segments, ...segments]) : UNKNOWN_MODULE;
}
