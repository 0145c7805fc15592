// Compiled form of a pattern string.

export type FieldKind =
  | "era"
  | "yearOfEra"
  | "year"
  | "weekyear"
  | "weekOfWeekyear"
  | "dayOfWeek"
  | "dayOfYear"
  | "monthOfYear"
  | "dayOfMonth"
  | "halfdayOfDay"
  | "hourOfHalfday"
  | "clockhourOfHalfday"
  | "hourOfDay"
  | "clockhourOfDay"
  | "minuteOfHour"
  | "secondOfMinute"
  | "fractionOfSecond"
  | "zoneOffset"
  | "zoneId"
  | "zoneName";

export type NameWidth = "short" | "long";

// --- Field style ---

export type FieldStyle =
  | {
      type: "numeric";
      minDigits: number;
      maxDigits: number;
      signed: boolean;
      fixed: boolean;
    }
  | { type: "twoDigitYear"; fixed: boolean }
  | { type: "fraction"; digits: number; maxDigits: number; fixed: boolean }
  | { type: "text"; width: NameWidth }
  | { type: "offset"; colon: boolean; zulu: boolean; minutes: "always" | "nonZero" }
  | { type: "zoneId" }
  | { type: "zoneName"; width: NameWidth };

export interface Directive {
  letter: string;
  count: number;
  field: FieldKind;
  style: FieldStyle;
}

// --- Instructions ---

export type Instruction =
  | { type: "literal"; text: string }
  | { type: "field"; directive: Directive }
  | { type: "optional"; instructions: readonly Instruction[] }
  | { type: "choice"; branches: readonly (readonly Instruction[])[] };

export interface CompiledPlan {
  readonly instructions: readonly Instruction[];
  readonly canPrint: boolean;
  readonly canParse: boolean;
}

/** True for styles that consume digits when parsing. */
export function isDigitStyle(style: FieldStyle): boolean {
  return (
    style.type === "numeric" ||
    style.type === "twoDigitYear" ||
    style.type === "fraction"
  );
}

function someInstruction(
  instructions: readonly Instruction[],
  test: (ins: Instruction) => boolean,
): boolean {
  return instructions.some((ins) => {
    if (test(ins)) return true;
    if (ins.type === "optional") return someInstruction(ins.instructions, test);
    if (ins.type === "choice") {
      return ins.branches.some((branch) => someInstruction(branch, test));
    }
    return false;
  });
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/** Seal an instruction list into a plan, deriving its capabilities. */
export function newPlan(instructions: Instruction[]): CompiledPlan {
  const canPrint = !someInstruction(instructions, (ins) => ins.type === "choice");
  const canParse = !someInstruction(
    instructions,
    (ins) => ins.type === "field" && ins.directive.style.type === "zoneName",
  );
  return deepFreeze({ instructions, canPrint, canParse });
}

/**
 * Combine several plans into one that parses whichever alternative consumes
 * the most input. The result cannot print.
 */
export function choicePlan(plans: readonly CompiledPlan[]): CompiledPlan {
  if (plans.length === 1) return plans[0];
  return newPlan([
    { type: "choice", branches: plans.map((plan) => plan.instructions) },
  ]);
}

/** Narrow a plan's capabilities, e.g. to mark a layout as parse-only. */
export function restrictPlan(
  plan: CompiledPlan,
  capabilities: { canPrint?: boolean; canParse?: boolean },
): CompiledPlan {
  return deepFreeze({
    instructions: plan.instructions,
    canPrint: plan.canPrint && (capabilities.canPrint ?? true),
    canParse: plan.canParse && (capabilities.canParse ?? true),
  });
}
