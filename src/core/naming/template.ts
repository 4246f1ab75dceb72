export type TemplateToken =
  | { kind: 'literal'; text: string }
  | { kind: 'iteration' }
  | { kind: 'piece' }
  | { kind: 'wildcard' };

export interface CompiledTemplate {
  source: string;
  tokens: TemplateToken[];
  hasIteration: boolean;
  hasPiece: boolean;
  hasWildcard: boolean;
  pattern: RegExp;
}

export interface TemplateMatch {
  /** Iteration text exactly as it appears in the name (may carry leading zeros). */
  iteration: string | null;
  piece: number | null;
}

const PLACEHOLDER = /\{([a-z]+)\}|\*/g;

export function compileTemplate(source: string): CompiledTemplate {
  const tokens: TemplateToken[] = [];
  let last = 0;
  for (const m of source.matchAll(PLACEHOLDER)) {
    const at = m.index ?? 0;
    if (at > last) tokens.push({ kind: 'literal', text: source.slice(last, at) });
    if (m[0] === '*') tokens.push({ kind: 'wildcard' });
    else if (m[1] === 'iteration') tokens.push({ kind: 'iteration' });
    else if (m[1] === 'piece') tokens.push({ kind: 'piece' });
    else throw new Error(`Unknown placeholder "${m[0]}" in name template "${source}"`);
    last = at + m[0].length;
  }
  if (last < source.length) tokens.push({ kind: 'literal', text: source.slice(last) });

  const body = tokens
    .map((t) => {
      switch (t.kind) {
        case 'literal':
          return escapeRegExp(t.text);
        case 'iteration':
          return '(?<iteration>\\d+)';
        case 'piece':
          return '(?<piece>\\d+)';
        case 'wildcard':
          return '.*';
      }
    })
    .join('');

  return {
    source,
    tokens,
    hasIteration: tokens.some((t) => t.kind === 'iteration'),
    hasPiece: tokens.some((t) => t.kind === 'piece'),
    hasWildcard: tokens.some((t) => t.kind === 'wildcard'),
    pattern: new RegExp(`^${body}$`, 'i')
  };
}

/** Shape match only; the caller decides whether the captured iteration is the wanted one. */
export function matchTemplate(tpl: CompiledTemplate, name: string): TemplateMatch | null {
  const m = tpl.pattern.exec(name);
  if (!m) return null;
  const groups = m.groups ?? {};
  return {
    iteration: groups.iteration ?? null,
    piece: groups.piece !== undefined ? Number(groups.piece) : null
  };
}

export function renderTemplate(tpl: CompiledTemplate, iteration: number, piece?: number): string {
  if (tpl.hasWildcard) {
    throw new Error(`Name template "${tpl.source}" contains a wildcard and can only be discovered, not resolved`);
  }
  if (tpl.hasPiece && piece === undefined) {
    throw new Error(`Name template "${tpl.source}" needs a piece index`);
  }
  if (piece !== undefined && !(Number.isInteger(piece) && piece >= 0)) {
    throw new Error(`Invalid piece index: ${piece}`);
  }
  return tpl.tokens
    .map((t) => {
      switch (t.kind) {
        case 'literal':
          return t.text;
        case 'iteration':
          return String(iteration);
        case 'piece':
          return String(piece);
        case 'wildcard':
          return '';
      }
    })
    .join('');
}

/** Literal text before the first placeholder (`splines_export_from_UE_` for `splines_export_from_UE_{iteration}.json`). */
export function templatePrefix(tpl: CompiledTemplate): string {
  let prefix = '';
  for (const t of tpl.tokens) {
    if (t.kind !== 'literal') break;
    prefix += t.text;
  }
  return prefix;
}

export function isIteration(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
