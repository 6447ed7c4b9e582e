import { Decimal } from "decimal.js";
import { CalcError } from "./types";

export type Dec = InstanceType<typeof Decimal>;

export const CalcDecimal = Decimal.clone({ precision: 50, rounding: Decimal.ROUND_HALF_UP });

/** Largest exponent magnitude accepted by ** and pow() */
export const MAX_EXPONENT = 10000;

interface FuncDef {
  min: number;
  max: number;
  fn: (args: Dec[], pos: number) => Dec;
}

function arg(args: Dec[], index: number): Dec {
  return args[index] ?? new CalcDecimal(0);
}

function assertArity(name: string, args: Dec[], min: number, max: number, pos: number): void {
  if (args.length < min || args.length > max) {
    const expected = min === max ? `${min}` : max === Infinity ? `at least ${min}` : `${min}-${max}`;
    throw new CalcError(`${name}() expects ${expected} argument(s), got ${args.length}`, pos, "WRONG_ARITY");
  }
}

function assertDomain(cond: boolean, name: string, msg: string, pos: number): void {
  if (!cond) {
    throw new CalcError(`${name}: ${msg}`, pos, "DOMAIN_ERROR");
  }
}

export function power(base: Dec, exponent: Dec, pos: number): Dec {
  if (exponent.abs().greaterThan(MAX_EXPONENT)) {
    throw new CalcError(`Exponent too large (max ${MAX_EXPONENT})`, pos, "OVERFLOW");
  }
  if (base.isZero() && exponent.isNegative()) {
    throw new CalcError("Division by zero", pos, "DIVISION_BY_ZERO");
  }
  const result = base.pow(exponent);
  assertDomain(result.isFinite(), "pow", "result is not a real number", pos);
  return result;
}

/**
 * Allow-listed functions; nothing else is callable
 */
export const FUNCTIONS: Record<string, FuncDef> = {
  abs: { min: 1, max: 1, fn: (args) => arg(args, 0).abs() },
  // round(x) or round(x, digits), halves to even; negative digits round left of the point
  round: {
    min: 1,
    max: 2,
    fn: (args, pos) => {
      const digits = args.length > 1 ? arg(args, 1) : new CalcDecimal(0);
      assertDomain(digits.isInteger(), "round", "digits must be an integer", pos);
      assertDomain(digits.abs().lte(MAX_EXPONENT), "round", `digits must be within ±${MAX_EXPONENT}`, pos);
      const x = arg(args, 0);
      if (!digits.isNegative()) {
        return x.toDecimalPlaces(digits.toNumber(), Decimal.ROUND_HALF_EVEN);
      }
      const scale = new CalcDecimal(10).pow(digits.neg());
      return x.div(scale).toDecimalPlaces(0, Decimal.ROUND_HALF_EVEN).times(scale);
    },
  },
  min: { min: 1, max: Infinity, fn: (args) => CalcDecimal.min(...args) },
  max: { min: 1, max: Infinity, fn: (args) => CalcDecimal.max(...args) },
  pow: { min: 2, max: 2, fn: (args, pos) => power(arg(args, 0), arg(args, 1), pos) },
  sqrt: {
    min: 1,
    max: 1,
    fn: (args, pos) => {
      const x = arg(args, 0);
      assertDomain(!x.isNegative(), "sqrt", "argument must be non-negative", pos);
      return x.sqrt();
    },
  },
};

export function callFunction(name: string, args: Dec[], pos: number): Dec {
  const def = Object.hasOwn(FUNCTIONS, name) ? FUNCTIONS[name] : undefined;
  if (!def) {
    throw new CalcError(`Unknown function: ${name}`, pos, "UNKNOWN_FUNCTION");
  }
  assertArity(name, args, def.min, def.max, pos);
  return def.fn(args, pos);
}
