// Canonical pattern text for compiled plans.

import type { CompiledPlan, Instruction } from "./plan.js";

/** Render a plan as its canonical pattern string. */
export function display(plan: CompiledPlan): string {
  return displayInstructions(plan.instructions);
}

function displayInstructions(instructions: readonly Instruction[]): string {
  return instructions.map(displayInstruction).join("");
}

function displayInstruction(ins: Instruction): string {
  switch (ins.type) {
    case "literal":
      return quoteLiteral(ins.text);
    case "field":
      return ins.directive.letter.repeat(ins.directive.count);
    case "optional":
      return `[${displayInstructions(ins.instructions)}]`;
    case "choice":
      // no pattern syntax for alternatives; this form is descriptive only
      return ins.branches.map(displayInstructions).join(" | ");
  }
}

function quoteLiteral(text: string): string {
  const escaped = text.replaceAll("'", "''");
  return /[A-Za-z[\]]/.test(text) ? `'${escaped}'` : escaped;
}
