/**
 * Operator tables shared by every dialect. Longer operators are matched
 * first, so `>>=` wins over `>>`, which wins over `>`.
 */

export const threeCharOps = new Set([
    '...', '===', '!==', '<<=', '>>=', '>>>', '**=', '&&=', '||=', '??=', '->*', '<=>'
]);

export const twoCharOps = new Set([
    '==', '!=', '<=', '>=',
    '&&', '||',
    '++', '--',
    '+=', '-=', '*=', '/=', '%=', '&=', '|=', '^=',
    '<<', '>>',
    '->', '::', '=>',
    '?.', '??', '**', '.*'
]);

export const identifierStart = /[A-Za-z_$\u00C0-\uFFFF]/;
export const identifierPart = /[A-Za-z0-9_$\u00C0-\uFFFF]/;

/** Comment markers counted by `countTodos`. */
export const todoMarkers = /\b(?:TODO|FIXME|HACK|XXX|BUG)\b/g;
