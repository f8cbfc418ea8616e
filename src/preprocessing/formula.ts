/**
 * Model formula parsing.
 *
 * Supported grammar:
 *
 * ```
 * formula  := outcomes? "~" rhs
 * outcomes := name ("+" name)*
 * rhs      := ["+"|"-"] term (("+" | "-") term)*
 * term     := name | "." | fn "(" name ")"
 * fn       := "log" | "sqrt"
 * name     := identifier (dots allowed, e.g. Sepal.Length) | `backquoted name`
 * ```
 *
 * `.` stands for every column of the data that is not an outcome, and
 * `- term` removes a term. Intercepts are a blueprint setting, so `0` and
 * `1` are rejected here.
 */

export type TermTransform = "identity" | "log" | "sqrt";

export interface FormulaTerm {
  /** Column label in the encoded predictors, e.g. "disp" or "log(disp)" */
  readonly label: string;
  /** Source column in the raw data */
  readonly column: string;
  readonly transform: TermTransform;
}

export type RhsItem =
  | { readonly kind: "term"; readonly term: FormulaTerm }
  | { readonly kind: "dot" };

export interface ParsedFormula {
  readonly text: string;
  readonly outcomes: readonly string[];
  /** Added right-hand-side items in written order */
  readonly items: readonly RhsItem[];
  /** Terms removed with `-` */
  readonly removed: readonly FormulaTerm[];
}

export interface ResolvedFormula {
  readonly outcomes: readonly string[];
  readonly terms: readonly FormulaTerm[];
}

/**
 * Failure to parse a formula or to match it against the data.
 */
export class FormulaError extends Error {
  public readonly formula: string;

  constructor(message: string, formula: string) {
    super(message);
    this.name = "FormulaError";
    this.formula = formula;
  }
}

const NAME_PATTERN = /^[A-Za-z_.][A-Za-z0-9_.]*$/;
const QUOTED_NAME_PATTERN = /^`([^`]+)`$/;
const CALL_PATTERN = /^([A-Za-z_][A-Za-z0-9_]*)\s*\((.*)\)$/;

const TRANSFORMS: Record<Exclude<TermTransform, "identity">, (value: number) => number> = {
  log: Math.log,
  sqrt: Math.sqrt,
};

function isTransformName(name: string): name is Exclude<TermTransform, "identity"> {
  return name in TRANSFORMS;
}

function parseName(text: string): string | null {
  const quoted = QUOTED_NAME_PATTERN.exec(text);
  if (quoted?.[1] !== undefined) {
    return quoted[1];
  }
  if (text !== "." && NAME_PATTERN.test(text)) {
    return text;
  }
  return null;
}

function splitTopLevel(rhs: string, formula: string): Array<{ sign: "+" | "-"; text: string }> {
  const parts: Array<{ sign: "+" | "-"; text: string }> = [];
  let depth = 0;
  let inQuotes = false;
  let sign: "+" | "-" = "+";
  let current = "";

  const flush = (atEnd: boolean): void => {
    const text = current.trim();
    if (text === "") {
      // A leading sign is allowed; anything else is a dangling operator
      if (atEnd || parts.length > 0) {
        throw new FormulaError(`Empty term in formula \`${formula}\``, formula);
      }
      return;
    }
    parts.push({ sign, text });
  };

  for (const ch of rhs) {
    if (ch === "`") {
      inQuotes = !inQuotes;
    } else if (!inQuotes && ch === "(") {
      depth++;
    } else if (!inQuotes && ch === ")") {
      depth--;
      if (depth < 0) {
        throw new FormulaError(`Unbalanced parentheses in formula \`${formula}\``, formula);
      }
    } else if (!inQuotes && depth === 0 && (ch === "+" || ch === "-")) {
      flush(false);
      sign = ch;
      current = "";
      continue;
    }
    current += ch;
  }

  if (depth !== 0 || inQuotes) {
    throw new FormulaError(`Unbalanced parentheses in formula \`${formula}\``, formula);
  }
  flush(true);
  return parts;
}

function parseTerm(text: string, formula: string): RhsItem {
  if (text === ".") {
    return { kind: "dot" };
  }

  if (text === "0" || text === "1") {
    throw new FormulaError(
      `The formula \`${formula}\` must not contain an intercept term (\`${text}\`); ` +
        "set `intercept` on the blueprint instead",
      formula
    );
  }

  const name = parseName(text);
  if (name !== null) {
    return { kind: "term", term: { label: name, column: name, transform: "identity" } };
  }

  const call = CALL_PATTERN.exec(text);
  const fn = call?.[1];
  const argument = call?.[2];
  if (fn !== undefined && argument !== undefined) {
    if (!isTransformName(fn)) {
      throw new FormulaError(
        `Unsupported function \`${fn}()\` in formula term \`${text}\`; ` +
          `supported: ${Object.keys(TRANSFORMS).join(", ")}`,
        formula
      );
    }
    const column = parseName(argument.trim());
    if (column === null) {
      throw new FormulaError(
        `\`${fn}()\` must be applied to a single column name, got \`${argument.trim()}\``,
        formula
      );
    }
    return { kind: "term", term: { label: `${fn}(${column})`, column, transform: fn } };
  }

  throw new FormulaError(`Unsupported formula term \`${text}\``, formula);
}

/**
 * Parse a formula string.
 *
 * @throws FormulaError on malformed input
 */
export function parseFormula(text: string): ParsedFormula {
  const formula = text.trim();
  const sides = formula.split("~");
  const lhs = sides[0];
  const rhs = sides[1];
  if (sides.length !== 2 || lhs === undefined || rhs === undefined) {
    throw new FormulaError(`Formula \`${formula}\` must contain exactly one \`~\``, formula);
  }

  const outcomes: string[] = [];
  if (lhs.trim() !== "") {
    for (const part of lhs.split("+")) {
      const name = parseName(part.trim());
      if (name === null) {
        throw new FormulaError(
          `Outcome \`${part.trim()}\` in formula \`${formula}\` must be a plain column name`,
          formula
        );
      }
      outcomes.push(name);
    }
  }

  if (rhs.trim() === "") {
    throw new FormulaError(`Formula \`${formula}\` has no right-hand side`, formula);
  }

  const items: RhsItem[] = [];
  const removed: FormulaTerm[] = [];
  for (const { sign, text: termText } of splitTopLevel(rhs, formula)) {
    const item = parseTerm(termText, formula);
    if (sign === "+") {
      items.push(item);
    } else if (item.kind === "term") {
      removed.push(item.term);
    } else {
      throw new FormulaError(`Cannot remove \`.\` in formula \`${formula}\``, formula);
    }
  }

  return { text: formula, outcomes, items, removed };
}

/**
 * Expand `.` and removals against the data's columns and check that every
 * referenced column exists.
 *
 * @throws FormulaError when a column is missing
 */
export function resolveFormula(parsed: ParsedFormula, columns: readonly string[]): ResolvedFormula {
  for (const outcome of parsed.outcomes) {
    if (!columns.includes(outcome)) {
      throw new FormulaError(
        `Outcome \`${outcome}\` does not match any column in \`data\``,
        parsed.text
      );
    }
  }

  const expanded: FormulaTerm[] = [];
  for (const item of parsed.items) {
    if (item.kind === "term") {
      expanded.push(item.term);
      continue;
    }
    for (const column of columns) {
      if (parsed.outcomes.includes(column)) {
        continue;
      }
      expanded.push({ label: column, column, transform: "identity" });
    }
  }

  const removedLabels = new Set(parsed.removed.map((term) => term.label));
  const seen = new Set<string>();
  const terms: FormulaTerm[] = [];
  for (const term of expanded) {
    if (removedLabels.has(term.label) || seen.has(term.label)) {
      continue;
    }
    if (!columns.includes(term.column)) {
      throw new FormulaError(
        `Formula term \`${term.label}\` refers to column \`${term.column}\`, which is not in \`data\``,
        parsed.text
      );
    }
    seen.add(term.label);
    terms.push(term);
  }

  return { outcomes: parsed.outcomes, terms };
}

/**
 * Apply a term's transform to a single numeric value.
 */
export function applyTransform(transform: TermTransform, value: number): number {
  return transform === "identity" ? value : TRANSFORMS[transform](value);
}
