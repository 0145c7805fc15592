// Pattern compiler: token stream to immutable plan.

import { lookupDirective } from "./directives.js";
import { PatternError, type Span } from "./error.js";
import { type Token, tokenize } from "./lexer.js";
import {
  type CompiledPlan,
  type Directive,
  type Instruction,
  isDigitStyle,
  newPlan,
} from "./plan.js";

class Compiler {
  private tokens: Token[];
  private pos: number;
  private input: string;

  constructor(tokens: Token[], input: string) {
    this.tokens = tokens;
    this.pos = 0;
    this.input = input;
  }

  error(message: string, span: Span): PatternError {
    return new PatternError(message, span, this.input);
  }

  compile(): CompiledPlan {
    if (this.tokens.length === 0) {
      throw this.error("empty pattern", { start: 0, end: 0 });
    }
    const instructions = this.parseSequence(null);
    return newPlan(withWidths(instructions, false));
  }

  private parseSequence(open: Token | null): Instruction[] {
    const out: Instruction[] = [];
    while (this.pos < this.tokens.length) {
      const tok = this.tokens[this.pos++];
      const kind = tok.kind;
      switch (kind.type) {
        case "letters": {
          const directive = lookupDirective(kind.letter, kind.count);
          if (directive === null) {
            throw this.error(
              `too many pattern letters '${kind.letter.repeat(kind.count)}'`,
              tok.span,
            );
          }
          out.push({ type: "field", directive });
          break;
        }
        case "literal":
          pushLiteral(out, kind.text);
          break;
        case "optionalStart": {
          const inner = this.parseSequence(tok);
          if (inner.length === 0) {
            throw this.error("empty optional section", {
              start: tok.span.start,
              end: tok.span.end + 1,
            });
          }
          out.push({ type: "optional", instructions: inner });
          break;
        }
        case "optionalEnd":
          if (open === null) throw this.error("unmatched ']'", tok.span);
          return out;
      }
    }
    if (open !== null) {
      throw this.error("unclosed optional section", open.span);
    }
    return out;
  }
}

function pushLiteral(out: Instruction[], text: string): void {
  const last = out[out.length - 1];
  if (last?.type === "literal") {
    out[out.length - 1] = { type: "literal", text: last.text + text };
  } else {
    out.push({ type: "literal", text });
  }
}

/**
 * A digit field directly followed by another digit field has no separator to
 * stop at, so it is pinned to exactly its letter count.
 */
function fixWidth(directive: Directive, adjacent: boolean): Directive {
  if (!adjacent) return directive;
  const style = directive.style;
  switch (style.type) {
    case "numeric":
      return { ...directive, style: { ...style, maxDigits: directive.count, fixed: true } };
    case "fraction":
      return {
        ...directive,
        style: { ...style, maxDigits: directive.count, fixed: true },
      };
    case "twoDigitYear":
      return { ...directive, style: { ...style, fixed: true } };
    default:
      return directive;
  }
}

function startsWithDigits(instructions: readonly Instruction[], follower: boolean): boolean {
  const first = instructions[0];
  if (first === undefined) return follower;
  switch (first.type) {
    case "field":
      return isDigitStyle(first.directive.style);
    case "literal":
      return false;
    case "optional":
      return startsWithDigits(first.instructions, false) ||
        startsWithDigits(instructions.slice(1), follower);
    case "choice":
      return first.branches.some((branch) => startsWithDigits(branch, follower));
  }
}

function withWidths(instructions: readonly Instruction[], followedByDigits: boolean): Instruction[] {
  const out: Instruction[] = [];
  for (let i = instructions.length - 1; i >= 0; i--) {
    const ins = instructions[i];
    const next = startsWithDigits(out, followedByDigits);
    switch (ins.type) {
      case "field":
        out.unshift({ type: "field", directive: fixWidth(ins.directive, next) });
        break;
      case "literal":
        out.unshift(ins);
        break;
      case "optional":
        out.unshift({ type: "optional", instructions: withWidths(ins.instructions, next) });
        break;
      case "choice":
        out.unshift({
          type: "choice",
          branches: ins.branches.map((branch) => withWidths(branch, next)),
        });
        break;
    }
  }
  return out;
}

/** Compile a pattern string into a plan. */
export function compilePattern(pattern: string): CompiledPlan {
  return new Compiler(tokenize(pattern), pattern).compile();
}
