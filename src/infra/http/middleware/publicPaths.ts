export type AllowRule =
  | { readonly kind: 'exact'; readonly path: string }
  | { readonly kind: 'prefix'; readonly prefix: string };

function normalizePath(path: string): string {
  const trimmed = path.replace(/\/+$/, '');
  return trimmed === '' ? '/' : trimmed;
}

export function exactPath(path: string): AllowRule {
  return { kind: 'exact', path: normalizePath(path) };
}

/** Matches the prefix itself and everything below it, e.g. `/static` and `/static/app.css`. */
export function pathPrefix(prefix: string): AllowRule {
  return { kind: 'prefix', prefix: normalizePath(prefix) };
}

/**
 * Paths that are served without a session. Everything else goes through the
 * session gate.
 */
export class PathAllowList {
  private readonly exact: ReadonlySet<string>;
  private readonly prefixes: readonly string[];

  constructor(rules: readonly AllowRule[]) {
    const exact = new Set<string>();
    const prefixes: string[] = [];
    for (const rule of rules) {
      if (rule.kind === 'exact') {
        exact.add(rule.path);
      } else {
        prefixes.push(rule.prefix);
      }
    }
    this.exact = exact;
    this.prefixes = prefixes;
  }

  allows(path: string): boolean {
    const normalized = normalizePath(path);
    if (this.exact.has(normalized)) {
      return true;
    }
    return this.prefixes.some(
      (prefix) =>
        normalized === prefix ||
        normalized.startsWith(prefix === '/' ? prefix : `${prefix}/`)
    );
  }
}
