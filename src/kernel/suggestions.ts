import type { Diagnostic } from './diagnostics.js';

/** Diagnostics raised when an architecture refers to a name it never declared. */
export type UnknownNameCode =
  | 'ARCH_DEFAULT_IMPLEMENTATION_MISSING'
  | 'ARCH_LOCUS_COMPONENT_UNKNOWN'
  | 'ARCH_OVERRIDE_IMPLEMENTATION_MISSING';

const MAX_EDIT_DISTANCE = 3;

const editDistance = (from: string, to: string): number => {
  const row = Array.from({ length: to.length + 1 }, (_unused, index) => index);

  for (let fromIndex = 1; fromIndex <= from.length; fromIndex += 1) {
    let diagonal = row[0] ?? 0;
    row[0] = fromIndex;
    for (let toIndex = 1; toIndex <= to.length; toIndex += 1) {
      const above = row[toIndex] ?? 0;
      const substitution = diagonal + (from[fromIndex - 1] === to[toIndex - 1] ? 0 : 1);
      row[toIndex] = Math.min(above + 1, (row[toIndex - 1] ?? 0) + 1, substitution);
      diagonal = above;
    }
  }

  return row[to.length] ?? 0;
};

/**
 * Declared names closest to `name` by edit distance, ties in lexical order.
 * Empty when nothing is within three edits, so `QB4` suggests `QB1`..`QB3` but never `R1`.
 */
export const nearestNames = (name: string, declared: readonly string[]): readonly string[] => {
  let best = MAX_EDIT_DISTANCE + 1;
  let nearest: string[] = [];
  for (const candidate of declared) {
    const distance = editDistance(name, candidate);
    if (distance < best) {
      best = distance;
      nearest = [candidate];
    } else if (distance === best) {
      nearest.push(candidate);
    }
  }
  return nearest.sort((left, right) => left.localeCompare(right));
};

export interface UnknownNameReport {
  readonly code: UnknownNameCode;
  readonly path: string;
  readonly message: string;
  readonly name: string;
  readonly declared: readonly string[];
}

export const pushUnknownNameDiagnostic = (diagnostics: Diagnostic[], report: UnknownNameReport): void => {
  const alternatives = nearestNames(report.name, report.declared);
  const [closest] = alternatives;

  diagnostics.push({
    code: report.code,
    path: report.path,
    severity: 'error',
    message: report.message,
    suggestion: closest === undefined ? 'Use one of the declared values.' : `Did you mean "${closest}"?`,
    ...(alternatives.length > 0 ? { alternatives } : {}),
  });
};
