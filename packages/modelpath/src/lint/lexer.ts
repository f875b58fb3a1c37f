/**
 * Chevrotain Lexer for path expressions.
 *
 * Splits a path into the same pieces the evaluator sees. Characters the
 * evaluator skips become `Stray` tokens instead of lexer errors, so every
 * character of the input lands in some token.
 */
import { createToken, Lexer } from "chevrotain";

export const WS = createToken({
  name: "WS",
  pattern: / +/,
  group: Lexer.SKIPPED,
});

// ── Segments ───────────────────────────────────────────────────────────────

// Model paths and reference names stop at a space, '!' or '='
export const ModelRef  = createToken({ name: "ModelRef",  pattern: /\.[^ !=]*/ });
export const Reference = createToken({ name: "Reference", pattern: /:[^ !=]*/ });

export const SingleQuoted = createToken({
  name: "SingleQuoted",
  pattern: /'(?:[^'\\]|\\[\s\S])*'/,
});

export const DoubleQuoted = createToken({
  name: "DoubleQuoted",
  pattern: /"(?:[^"\\]|\\[\s\S])*"/,
});

// Only reached when no closing quote follows, so it runs to the end
export const Unterminated = createToken({
  name: "Unterminated",
  pattern: /['"][\s\S]*/,
});

// ── Operators ──────────────────────────────────────────────────────────────

export const NotEquals    = createToken({ name: "NotEquals",    pattern: /!=/ });
export const EqualsEquals = createToken({ name: "EqualsEquals", pattern: /==/ });
export const Bang         = createToken({ name: "Bang",         pattern: /!/ });
export const Question     = createToken({ name: "Question",     pattern: /\?/ });

// ── Everything else ────────────────────────────────────────────────────────

export const Stray = createToken({ name: "Stray", pattern: /[\s\S]/ });

// ── Token ordering ─────────────────────────────────────────────────────────

export const allTokens = [
  WS,
  ModelRef,
  Reference,
  SingleQuoted,
  DoubleQuoted,
  Unterminated,
  NotEquals,
  EqualsEquals,
  Bang,
  Question,
  Stray,
];

export const PathLexer = new Lexer(allTokens, {
  positionTracking: "onlyOffset",
});
