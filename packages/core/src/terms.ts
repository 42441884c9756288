// Lowercase, drop every whitespace character and every colon.
export function normalizeLabel(text: string): string {
  return text.toLowerCase().replace(/\s+/g, "").replace(/:/g, "");
}

/**
 * A label as it is printed in a report, plus the spellings authors actually use.
 *
 * Matching runs in three tiers: exact (trimmed text equals an alias), normalized
 * (see {@link normalizeLabel}) and prefix. Callers try exact first because some
 * labels are plain substrings of ordinary sentences.
 */
export class Term {
  readonly main: string;
  readonly aliases: ReadonlySet<string>;
  private readonly normalized: ReadonlySet<string>;
  // Longest first, so prefix stripping removes "Subject:" before "Subject".
  private readonly byLength: readonly string[];

  private constructor(main: string, aliases: Iterable<string>) {
    const all = new Set<string>([main]);
    for (const a of aliases) all.add(a);
    this.main = main;
    this.aliases = all;
    this.normalized = new Set(Array.from(all, normalizeLabel));
    this.byLength = Array.from(all).sort((a, b) => b.length - a.length);
    Object.freeze(this);
  }

  static single(label: string): Term {
    return new Term(label, []);
  }

  static pair(main: string, alt: string): Term {
    return new Term(main, [alt]);
  }

  static of(main: string, aliases: Iterable<string> = []): Term {
    return new Term(main, aliases);
  }

  matchesExact(text: string): boolean {
    return this.aliases.has(text.trim());
  }

  matchesNormalized(text: string): boolean {
    return this.normalized.has(normalizeLabel(text));
  }

  matches(text: string): boolean {
    return this.matchesExact(text) || this.matchesNormalized(text);
  }

  startsWith(text: string): boolean {
    return this.longestPrefix(text) !== undefined;
  }

  longestPrefix(text: string): string | undefined {
    const t = text.trim();
    return this.byLength.find((a) => t.startsWith(a));
  }

  /** Returns the value part of "Label: value". */
  strip(text: string): string {
    const t = text.trim();
    let rest: string;
    const prefix = this.longestPrefix(t);
    if (prefix !== undefined) {
      rest = t.slice(prefix.length);
    } else {
      const inner = this.byLength.find((a) => t.includes(a));
      rest = inner === undefined ? t : t.replace(inner, "");
    }
    rest = rest.trim();
    if (rest.startsWith(":")) rest = rest.slice(1).trim();
    return rest;
  }

  equals(other: Term): boolean {
    if (this.main !== other.main || this.aliases.size !== other.aliases.size) return false;
    for (const a of this.aliases) if (!other.aliases.has(a)) return false;
    return true;
  }

  toString(): string {
    return this.main;
  }
}

/** Earliest term in `terms` that matches `text` exactly, then by normalized form. */
export function ownerOf(terms: readonly Term[], text: string): Term | undefined {
  return terms.find((t) => t.matchesExact(text)) ?? terms.find((t) => t.matchesNormalized(text));
}

/**
 * Value of a "Label: value" text, or undefined when the text does not open with
 * one of the term's spellings followed by a colon. Sentences that merely start
 * with a label word ("School management teams ...") are not labelled values.
 */
export function labelledValue(term: Term, text: string): string | undefined {
  const prefix = term.longestPrefix(text);
  if (prefix === undefined) return undefined;
  const rest = text.trim().slice(prefix.length);
  if (!prefix.endsWith(":") && !rest.trimStart().startsWith(":")) return undefined;
  return term.strip(text) || undefined;
}
