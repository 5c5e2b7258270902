export type SExpr = string | SExpr[];

/**
 * S-expression reader for KiCad schematic files.
 * Handles:
 * - Nested lists: (a b)
 * - Quoted strings: "string with spaces" and escaped quotes
 * - Atoms: unquoted tokens
 *
 * Quoted strings keep their quotes in the tree so scanners can tell
 * `"1"` (a pin name) from `1` (a number); use `unquote` to read them.
 */
export class SExpressionParser {
  /**
   * Parse an S-expression string into a structured array.
   */
  static parse(input: string): SExpr[] {
    const tokens = this.tokenize(input);
    const [ast] = this.parseTokens(tokens);
    return ast;
  }

  /**
   * Helper to strip quotes from a string if present.
   */
  static unquote(s: string): string {
    if (s.length >= 2 && s.startsWith('"') && s.endsWith('"')) {
      return s.slice(1, -1).replace(/\\"/g, '"').replace(/\\\\/g, "\\");
    }
    return s;
  }

  static isList(expr: SExpr, keyword: string): expr is SExpr[] {
    return Array.isArray(expr) && expr[0] === keyword;
  }

  /** Direct children of `expr` whose keyword matches. */
  static children(expr: SExpr, keyword: string): SExpr[][] {
    if (!Array.isArray(expr)) return [];
    const out: SExpr[][] = [];
    for (const item of expr) {
      if (this.isList(item, keyword)) out.push(item);
    }
    return out;
  }

  static child(expr: SExpr, keyword: string): SExpr[] | null {
    return this.children(expr, keyword)[0] ?? null;
  }

  /** Atom at a position, unquoted. */
  static atom(expr: SExpr[], index: number): string | null {
    const value = expr[index];
    return typeof value === "string" ? this.unquote(value) : null;
  }

  /** Numeric atom at a position; null when missing or not a finite number. */
  static number(expr: SExpr[], index: number): number | null {
    const raw = this.atom(expr, index);
    if (raw === null || raw.trim() === "") return null;
    const value = Number(raw);
    return Number.isFinite(value) ? value : null;
  }

  /**
   * Value of `(property "<name>" "<value>" ...)` directly under `expr`.
   */
  static property(expr: SExpr, name: string): string | null {
    for (const prop of this.children(expr, "property")) {
      if (this.atom(prop, 1) === name) {
        return this.atom(prop, 2);
      }
    }
    return null;
  }

  private static tokenize(input: string): string[] {
    const tokens: string[] = [];
    let current = "";
    let inString = false;
    let escaped = false;

    for (let i = 0; i < input.length; i++) {
      const char = input[i];

      if (inString) {
        if (escaped) {
          current += "\\" + char;
          escaped = false;
        } else if (char === "\\") {
          escaped = true;
        } else if (char === '"') {
          inString = false;
          current += '"';
          tokens.push(current);
          current = "";
        } else {
          current += char;
        }
      } else {
        if (char === "(" || char === ")") {
          if (current.trim().length > 0) {
            tokens.push(current.trim());
          }
          current = "";
          tokens.push(char);
        } else if (char === '"') {
          if (current.trim().length > 0) {
            tokens.push(current.trim());
            current = "";
          }
          inString = true;
          current += '"';
        } else if (/\s/.test(char)) {
          if (current.trim().length > 0) {
            tokens.push(current.trim());
          }
          current = "";
        } else {
          current += char;
        }
      }
    }

    // Unterminated string: keep what we have so the scanners can still skip it
    if (inString) {
      tokens.push(current + '"');
    } else if (current.trim().length > 0) {
      tokens.push(current.trim());
    }

    return tokens;
  }

  private static parseTokens(tokens: string[], startIndex = 0): [SExpr[], number] {
    const result: SExpr[] = [];
    let i = startIndex;

    while (i < tokens.length) {
      const token = tokens[i];

      if (token === "(") {
        const [subList, nextIndex] = this.parseTokens(tokens, i + 1);
        result.push(subList);
        i = nextIndex;
      } else if (token === ")") {
        return [result, i + 1];
      } else {
        result.push(token);
        i++;
      }
    }

    return [result, i];
  }
}
