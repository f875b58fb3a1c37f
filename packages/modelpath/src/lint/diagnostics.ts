/**
 * Static checks for path expressions, for editors and strict evaluation.
 *
 * The evaluator never reports malformed input: it skips what it cannot use
 * and answers `false` or `undefined`. This pass lexes the path the same way
 * and reports what the evaluator would silently drop.
 */
import type { IToken, TokenType } from "chevrotain";
import {
  Bang,
  DoubleQuoted,
  EqualsEquals,
  ModelRef,
  NotEquals,
  PathLexer,
  Question,
  Reference,
  SingleQuoted,
  Stray,
  Unterminated,
} from "./lexer.js";

// ── Diagnostic types ──────────────────────────────────────────────────────

export type PathDiagnostic = {
  message: string;
  severity: "error" | "warning";
  /** Character offsets into the path, end exclusive */
  range: { start: number; end: number };
};

export type SegmentKind = "model" | "literal" | "negation" | "reference" | "comparison";

export type PathSegment = {
  kind: SegmentKind;
  text: string;
  start: number;
  end: number;
};

export type PathParseResult = {
  segments: PathSegment[];
  diagnostics: PathDiagnostic[];
};

/** Outcome of reading one operand: the token index after it, and its last token */
type OperandRead = { next: number; last: IToken | undefined };

const OPERAND_TOKENS: TokenType[] = [ModelRef, Reference, SingleQuoted, DoubleQuoted, Unterminated];

/**
 * Lex a path and report problems the evaluator would gloss over, along with
 * the top-level segments it contains.
 */
export function parsePathDiagnostics(path: string): PathParseResult {
  const diagnostics: PathDiagnostic[] = [];
  const segments: PathSegment[] = [];

  const lexResult = PathLexer.tokenize(path);
  for (const e of lexResult.errors) {
    diagnostics.push({
      message: e.message,
      severity: "error",
      range: { start: e.offset, end: e.offset + e.length },
    });
  }

  const walker = new SegmentWalker(path, lexResult.tokens, diagnostics);
  let i = 0;
  while (i < walker.tokens.length) {
    const token = walker.tokens[i];
    const type = token.tokenType;

    if (type === Stray) {
      i = walker.skipStray(i, [Stray]);
      continue;
    }
    if (type === EqualsEquals) {
      walker.report("warning", `Operator "==" outside of a comparison is ignored`, token);
      i++;
      continue;
    }

    let read: OperandRead;
    let kind: SegmentKind;
    if (type === Question) {
      kind = "comparison";
      read = walker.comparison(i);
    } else if (type === Bang || type === NotEquals) {
      kind = "negation";
      read = walker.negation(i);
    } else {
      kind = segmentKind(type);
      walker.checkOperand(token);
      read = { next: i + 1, last: token };
    }

    const end = read.last ? endOf(read.last) : endOf(token);
    segments.push({ kind, text: path.slice(token.startOffset, end), start: token.startOffset, end });
    i = read.next;
  }

  return { segments, diagnostics };
}

function endOf(token: IToken): number {
  return token.startOffset + token.image.length;
}

function segmentKind(type: TokenType): SegmentKind {
  if (type === ModelRef) return "model";
  if (type === Reference) return "reference";
  return "literal";
}

class SegmentWalker {
  constructor(
    readonly path: string,
    readonly tokens: IToken[],
    private readonly diagnostics: PathDiagnostic[],
  ) {}

  report(severity: PathDiagnostic["severity"], message: string, from: IToken, to: IToken = from): void {
    this.diagnostics.push({ message, severity, range: { start: from.startOffset, end: endOf(to) } });
  }

  /** Report a run of adjacent skipped tokens as one warning and return the index after it */
  skipStray(start: number, skippable: TokenType[]): number {
    let end = start;
    while (
      end + 1 < this.tokens.length &&
      skippable.includes(this.tokens[end + 1].tokenType) &&
      this.tokens[end + 1].startOffset === endOf(this.tokens[end])
    ) {
      end++;
    }
    const from = this.tokens[start];
    const to = this.tokens[end];
    const text = this.path.slice(from.startOffset, endOf(to));
    this.report("warning", `Unexpected "${text}" is ignored`, from, to);
    return end + 1;
  }

  checkOperand(token: IToken): void {
    if (token.tokenType === Unterminated) {
      this.report("error", "Unterminated string literal", token);
    } else if (token.tokenType === ModelRef && !bracketsClosed(token.image)) {
      this.report("error", `Missing closing "]" in model reference`, token);
    } else if (token.tokenType === Reference && token.image.length === 1) {
      this.report("warning", "Reference is missing a name", token);
    }
  }

  /**
   * Read an operand starting at token `start`. Like the evaluator, it skips
   * anything that cannot start an operand, including `?` and `==`.
   */
  operand(start: number): OperandRead {
    let i = start;
    while (i < this.tokens.length) {
      const token = this.tokens[i];
      const type = token.tokenType;
      if (OPERAND_TOKENS.includes(type)) {
        this.checkOperand(token);
        return { next: i + 1, last: token };
      }
      if (type === Bang || type === NotEquals) {
        return this.negation(i);
      }
      i = this.skipStray(i, [Stray, Question, EqualsEquals]);
    }
    return { next: i, last: undefined };
  }

  /** `!operand`. A `!=` here is a negation whose `=` gets skipped. */
  negation(start: number): OperandRead {
    const bang = this.tokens[start];
    if (bang.tokenType === NotEquals) {
      const offset = bang.startOffset + 1;
      this.diagnostics.push({
        message: `Unexpected "=" is ignored`,
        severity: "warning",
        range: { start: offset, end: offset + 1 },
      });
    }
    const read = this.operand(start + 1);
    if (!read.last) {
      this.report("error", "Negation is missing its operand", bang);
      return { next: read.next, last: bang };
    }
    return read;
  }

  /** `?left==right` with the operator directly after the left operand. */
  comparison(start: number): OperandRead {
    const question = this.tokens[start];
    const left = this.operand(start + 1);
    const operator = this.tokens[left.next];
    if (
      !left.last ||
      !operator ||
      (operator.tokenType !== EqualsEquals && operator.tokenType !== NotEquals) ||
      operator.startOffset !== endOf(left.last)
    ) {
      this.report("error", `Comparison is missing an "==" or "!=" operator`, question, left.last ?? question);
      return { next: left.next, last: left.last ?? question };
    }

    const right = this.operand(left.next + 1);
    if (!right.last) {
      this.report("error", "Comparison is missing its right-hand operand", question, operator);
      return { next: right.next, last: operator };
    }
    return right;
  }
}

/** Every '[' in a model path needs a ']' after it */
function bracketsClosed(image: string): boolean {
  let open = image.indexOf("[");
  while (open !== -1) {
    const close = image.indexOf("]", open);
    if (close === -1) return false;
    open = image.indexOf("[", close);
  }
  return true;
}
